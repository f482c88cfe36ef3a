/**
 * Backup module exports
 */

export {
  planVmBackupJob,
  runVmBackupJob,
  type VmBackupJobDefinition,
  type VmBackupJobDependencies,
} from "./orchestrator";
export {
  type AcquiredSnapshot,
  acquireSnapshot,
  latestSnapshot,
  snapshotAgeMinutes,
} from "./snapshot";
