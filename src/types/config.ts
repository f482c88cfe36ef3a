/**
 * Configuration type definitions for hyperbak
 */

import type { Compression } from "./artifact";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface GeneralConfig {
  /** Name of the machine running hyperbak, used in notifications */
  hostname: string;
  logLevel: LogLevelName;
}

export interface HostConfig {
  /** Pool master address; "localhost" talks to the local xapi */
  server: string;
  username?: string;
  password?: string;
}

export interface FlatRetention {
  type: "flat";
  count: number;
}

export interface TieredRetention {
  type: "tiered";
  daily: number;
  weekly: number;
  monthly: number;
  yearly: number;
}

export type RetentionPolicy = FlatRetention | TieredRetention;

export type CompressionSetting = Compression | "none";

export interface LocalStorageConfig {
  type: "local";
  enabled?: boolean;
  path: string;
  compression?: CompressionSetting;
  retention: RetentionPolicy;
}

export type BorgEncryption = "none" | "repokey" | "repokey-blake2";
export type BorgCompression = "none" | "lz4" | "zstd";

export interface BorgStorageConfig {
  type: "borg";
  enabled?: boolean;
  /** Repository location, local path or ssh:// URL */
  repository: string;
  passphrase?: string;
  encryption?: BorgEncryption;
  compression?: BorgCompression;
  /** How long borg waits for the repository lock (`--lock-wait`) */
  lockWaitSeconds?: number;
  retention: RetentionPolicy;
}

export type StorageConfig = LocalStorageConfig | BorgStorageConfig;

export interface HealthchecksConfig {
  enabled: boolean;
  server: string;
  apiKey: string;
  /** Grace period in seconds */
  grace?: number;
  maxRetries?: number;
}

export interface MailConfig {
  enabled: boolean;
  smtpServer: string;
  smtpPort?: number;
  smtpUser?: string;
  smtpPassword?: string;
  smtpFrom: string;
  smtpTo: string[];
}

export interface MonitoringConfig {
  healthchecks?: HealthchecksConfig;
  mail?: MailConfig;
}

export interface SnapshotConfig {
  /** Reuse the most recent existing snapshot when it is fresh enough */
  reuseExisting: boolean;
  maxAgeMinutes: number;
}

export interface JobConfig {
  enabled?: boolean;
  schedule: string;
  timezone?: string;
  /** Names of entries in `hosts` */
  hosts: string[];
  /** Names of entries in `storage` */
  storages: string[];
  tagFilter: string[];
  tagFilterExclude?: string[];
  concurrency?: number;
  snapshot?: Partial<SnapshotConfig>;
}

export interface HyperbakConfig {
  version: string;
  general: GeneralConfig;
  hosts: Record<string, HostConfig>;
  storage: Record<string, StorageConfig>;
  monitoring?: MonitoringConfig;
  jobs: Record<string, JobConfig>;
}
