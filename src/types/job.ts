/**
 * Backup job run type definitions
 */

import type { JobKind } from "./artifact";
import type { JobConfig } from "./config";
import type { VmHandle } from "./vm";

export interface JobStats {
  jobName: string;
  jobKind: JobKind;
  /** Machine running the job */
  hostname: string;
  schedule: string;
  job: JobConfig;
  startedAt: string;
  totalObjects: number;
  successfulObjects: number;
  failedObjects: number;
  durationSeconds: number;
  errors: string[];
}

export type JobOutcome =
  | { ok: true; stats: JobStats }
  | { ok: false; stats: JobStats; error: Error };

/**
 * A VM selected for backup, paired with the host that reported it
 */
export interface BackupTarget {
  hostId: string;
  vm: VmHandle;
}
