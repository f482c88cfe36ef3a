/**
 * Centralized type exports for hyperbak
 */

// Artifact types
export type {
  ArtifactFilter,
  BackupArtifact,
  Compression,
  JobKind,
  TimestampBound,
  TimestampRange,
} from "./artifact";
// Config types
export type {
  BorgCompression,
  BorgEncryption,
  BorgStorageConfig,
  CompressionSetting,
  FlatRetention,
  GeneralConfig,
  HealthchecksConfig,
  HostConfig,
  HyperbakConfig,
  JobConfig,
  LocalStorageConfig,
  LogLevelName,
  MailConfig,
  MonitoringConfig,
  RetentionPolicy,
  SnapshotConfig,
  StorageConfig,
  TieredRetention,
} from "./config";
// Job types
export type { BackupTarget, JobOutcome, JobStats } from "./job";
// Storage types
export type { IStorageBackend, RotateOptions, RotationResult, StorageType } from "./storage";
// Hypervisor types
export type { ExportStreams, HypervisorClient, VmHandle } from "./vm";
// Monitoring types
export type { Monitor, MonitorKey } from "./monitor";
