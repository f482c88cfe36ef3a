/**
 * Parsers for `xe` command output
 */

import type { VmHandle } from "../types";
import { CollaboratorError } from "../utils/errors";

const XEN_TIMESTAMP = /^(\d{4})(\d{2})(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Parse `--minimal` output: a single comma separated line of UUIDs
 */
export function parseUuidList(output: string): string[] {
  return output
    .replace(/[\r\n]/g, "")
    .split(",")
    .map((uuid) => uuid.trim())
    .filter((uuid) => uuid.length > 0);
}

/**
 * Parse xapi's `YYYYMMDDTHH:MM:SSZ` timestamps
 */
export function parseXenTimestamp(value: string): Date {
  const match = XEN_TIMESTAMP.exec(value.trim());
  if (!match) {
    throw new CollaboratorError(`Unrecognized Xen timestamp "${value}"`);
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    throw new CollaboratorError(`Unrecognized Xen timestamp "${value}"`);
  }
  return new Date(Date.UTC(year, month - 1, day, hour, minute, second));
}

/**
 * Parse `xe *-param-list` output. Lines look like
 * `   name-label ( RW): web01`; the access mode is dropped.
 */
export function parseParamList(output: string): Map<string, string> {
  const params = new Map<string, string>();

  for (const line of output.split("\n")) {
    const separator = line.indexOf(":");
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim().split(/\s+/)[0];
    if (!key) continue;

    params.set(key, line.slice(separator + 1).trim());
  }

  return params;
}

export function parseVm(output: string): VmHandle {
  const params = parseParamList(output);
  const uuid = params.get("uuid");
  if (!uuid) {
    throw new CollaboratorError("vm-param-list output has no uuid");
  }

  const isSnapshot = params.get("is-a-snapshot") === "true";
  const snapshotTime = params.get("snapshot-time");

  return {
    uuid,
    nameLabel: params.get("name-label") ?? "",
    nameDescription: params.get("name-description") ?? "",
    isTemplate: params.get("is-a-template") === "true",
    isSnapshot,
    snapshotTime: isSnapshot && snapshotTime ? parseXenTimestamp(snapshotTime) : null,
  };
}
