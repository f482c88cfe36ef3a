/**
 * Snapshot selection for a VM backup
 */

import type { HypervisorClient, SnapshotConfig, VmHandle } from "../../types";
import { NoSnapshotsError } from "../../utils/errors";
import type { ScopedLogger } from "../../utils/logger";

export interface AcquiredSnapshot {
  snapshot: VmHandle;
  /** True when this run created the snapshot and must delete it */
  created: boolean;
}

/**
 * Most recent snapshot by snapshot time. Snapshots without a time sort last.
 */
export function latestSnapshot(snapshots: VmHandle[]): VmHandle | undefined {
  let latest: VmHandle | undefined;
  for (const snapshot of snapshots) {
    if (!snapshot.snapshotTime) continue;
    if (!latest?.snapshotTime || snapshot.snapshotTime > latest.snapshotTime) {
      latest = snapshot;
    }
  }
  return latest;
}

export function snapshotAgeMinutes(snapshot: VmHandle, now: Date): number | null {
  if (!snapshot.snapshotTime) return null;
  return (now.getTime() - snapshot.snapshotTime.getTime()) / 60_000;
}

/**
 * Reuse a fresh existing snapshot when allowed, otherwise create one
 */
export async function acquireSnapshot(
  client: HypervisorClient,
  vm: VmHandle,
  options: SnapshotConfig,
  now: Date,
  log: ScopedLogger,
): Promise<AcquiredSnapshot> {
  if (!options.reuseExisting) {
    return { snapshot: await client.createSnapshot(vm), created: true };
  }

  let existing: VmHandle[];
  try {
    existing = await client.listSnapshots(vm);
  } catch (err) {
    if (err instanceof NoSnapshotsError) {
      log.debug(`VM ${vm.nameLabel} has no snapshots, creating one`);
      return { snapshot: await client.createSnapshot(vm), created: true };
    }
    throw err;
  }

  const latest = latestSnapshot(existing);
  const age = latest ? snapshotAgeMinutes(latest, now) : null;

  if (latest && age !== null && age <= options.maxAgeMinutes) {
    log.info(`Reusing snapshot ${latest.uuid} of ${vm.nameLabel} (${Math.round(age)} min old)`);
    return { snapshot: latest, created: false };
  }

  log.debug(`Latest snapshot of ${vm.nameLabel} is too old, creating one`);
  return { snapshot: await client.createSnapshot(vm), created: true };
}
