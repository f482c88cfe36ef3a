/**
 * Hypervisor object descriptors
 */

import type { Readable } from "node:stream";

export interface VmHandle {
  uuid: string;
  nameLabel: string;
  nameDescription: string;
  isTemplate: boolean;
  isSnapshot: boolean;
  /** Only meaningful for snapshots */
  snapshotTime: Date | null;
}

export interface ExportStreams {
  stdout: Readable;
  stderr: Readable;
}

/**
 * Capability set the job engine needs from a hypervisor host.
 */
export interface HypervisorClient {
  readonly hostId: string;

  listVms(tags: string[], excludeTags: string[]): Promise<VmHandle[]>;

  createSnapshot(vm: VmHandle): Promise<VmHandle>;

  /**
   * Throws NoSnapshotsError when the VM has no snapshots at all
   */
  listSnapshots(vm: VmHandle): Promise<VmHandle[]>;

  markNotTemplate(snapshot: VmHandle): Promise<VmHandle>;

  rename(snapshot: VmHandle, label: string): Promise<VmHandle>;

  deleteSnapshot(uuid: string): Promise<void>;

  exportStream(snapshot: VmHandle): ExportStreams;
}
