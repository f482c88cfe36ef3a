/**
 * Monitor key rendering
 */

import type { MonitorKey } from "../types";

function slugPart(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * `<job>_<host>`, each part lower-cased with anything outside `[a-z0-9-]`
 * collapsed to a single dash
 */
export function renderMonitorSlug(key: MonitorKey): string {
  return `${slugPart(key.jobName)}_${slugPart(key.hostname)}`;
}

/**
 * Throws when two distinct keys would report to the same check
 */
export function assertDistinctSlugs(keys: MonitorKey[]): void {
  const seen = new Map<string, MonitorKey>();
  for (const key of keys) {
    const slug = renderMonitorSlug(key);
    const previous = seen.get(slug);
    if (previous && (previous.jobName !== key.jobName || previous.hostname !== key.hostname)) {
      throw new Error(
        `Jobs "${previous.jobName}" and "${key.jobName}" on host "${key.hostname}" share the monitor slug "${slug}"`,
      );
    }
    seen.set(slug, key);
  }
}
