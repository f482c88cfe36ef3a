/**
 * Default configuration values
 */

import * as os from "node:os";
import type { BorgEncryption, LogLevelName, SnapshotConfig } from "../types";

export const CONFIG_FILE_NAMES = [
  "hyperbak.config.yaml",
  "hyperbak.config.yml",
  "hyperbak.config.json",
] as const;

/** Searched after the working directory */
export const SYSTEM_CONFIG_DIR = "/etc/hyperbak";

export const DEFAULT_LOG_LEVEL: LogLevelName = "info";

export const DEFAULT_CONCURRENCY = 1;

export const DEFAULT_SNAPSHOT: SnapshotConfig = {
  reuseExisting: false,
  maxAgeMinutes: 60,
};

export const DEFAULT_BORG_ENCRYPTION: BorgEncryption = "repokey";

/** Tasks of one job take turns on the borg repository lock */
export const DEFAULT_BORG_LOCK_WAIT_SECONDS = 6 * 60 * 60;

export const DEFAULT_HEALTHCHECKS = {
  grace: 3600,
  maxRetries: 3,
} as const;

export const DEFAULT_SMTP_PORT = 587;

export function defaultHostname(): string {
  return os.hostname();
}

/**
 * Snapshot settings of a job with every field filled in
 */
export function resolveSnapshotConfig(snapshot: Partial<SnapshotConfig> | undefined): SnapshotConfig {
  return {
    reuseExisting: snapshot?.reuseExisting ?? DEFAULT_SNAPSHOT.reuseExisting,
    maxAgeMinutes: snapshot?.maxAgeMinutes ?? DEFAULT_SNAPSHOT.maxAgeMinutes,
  };
}
