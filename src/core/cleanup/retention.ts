/**
 * Retention policy logic
 */

import type { BackupArtifact, FlatRetention, RetentionPolicy, TieredRetention } from "../../types";
import { artifactIdentityKey } from "../../utils/naming";

const DAY_MS = 24 * 60 * 60 * 1000;

export type RetentionTier = "daily" | "weekly" | "monthly" | "yearly";

/** Upper age bound (inclusive, in days) of each tier, checked in order */
const TIER_LIMITS: readonly (readonly [RetentionTier, number])[] = [
  ["daily", 1],
  ["weekly", 7],
  ["monthly", 30],
  ["yearly", 365],
];

export interface RetentionSelection {
  keep: BackupArtifact[];
  delete: BackupArtifact[];
}

/**
 * Bucket an age in (fractional) days. Anything older than a year has no
 * tier and is left alone by tiered rotation.
 */
export function classifyAge(ageDays: number): RetentionTier | null {
  for (const [tier, limit] of TIER_LIMITS) {
    if (ageDays <= limit) {
      return tier;
    }
  }
  return null;
}

export function ageInDays(artifact: BackupArtifact, now: Date): number {
  return (now.getTime() - artifact.timestamp.getTime()) / DAY_MS;
}

/**
 * A tiered policy with every count at zero disables rotation entirely
 */
export function isNoopPolicy(policy: RetentionPolicy): boolean {
  return (
    policy.type === "tiered" &&
    policy.daily === 0 &&
    policy.weekly === 0 &&
    policy.monthly === 0 &&
    policy.yearly === 0
  );
}

/**
 * Keep the `count` most recent artifacts, delete the rest.
 * Array.prototype.sort is stable, so equal timestamps keep listing order.
 */
export function selectFlat(artifacts: BackupArtifact[], policy: FlatRetention): RetentionSelection {
  const sorted = [...artifacts].sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
  return {
    keep: sorted.slice(0, policy.count),
    delete: sorted.slice(policy.count),
  };
}

/**
 * Walk oldest to newest, counting per tier. The artifact that pushes a
 * tier's counter past its limit is marked for deletion.
 */
export function selectTiered(
  artifacts: BackupArtifact[],
  policy: TieredRetention,
  now: Date,
): RetentionSelection {
  const sorted = [...artifacts].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const counters: Record<RetentionTier, number> = { daily: 0, weekly: 0, monthly: 0, yearly: 0 };
  const selection: RetentionSelection = { keep: [], delete: [] };

  for (const artifact of sorted) {
    const tier = classifyAge(ageInDays(artifact, now));
    if (tier === null) {
      selection.keep.push(artifact);
      continue;
    }

    counters[tier] += 1;
    if (counters[tier] > policy[tier]) {
      selection.delete.push(artifact);
    } else {
      selection.keep.push(artifact);
    }
  }

  return selection;
}

/**
 * Compute the deletion set for a listing. Each logical object
 * (host, kind, name) is rotated independently.
 */
export function selectForDeletion(
  artifacts: BackupArtifact[],
  policy: RetentionPolicy,
  now: Date = new Date(),
): RetentionSelection {
  if (isNoopPolicy(policy)) {
    return { keep: [...artifacts], delete: [] };
  }

  const groups = new Map<string, BackupArtifact[]>();
  for (const artifact of artifacts) {
    const key = artifactIdentityKey(artifact);
    const group = groups.get(key);
    if (group) {
      group.push(artifact);
    } else {
      groups.set(key, [artifact]);
    }
  }

  const result: RetentionSelection = { keep: [], delete: [] };
  for (const group of groups.values()) {
    const selection =
      policy.type === "flat" ? selectFlat(group, policy) : selectTiered(group, policy, now);
    result.keep.push(...selection.keep);
    result.delete.push(...selection.delete);
  }

  return result;
}
