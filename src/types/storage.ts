/**
 * Storage backend interface definitions
 */

import type { Readable } from "node:stream";
import type { ArtifactFilter, BackupArtifact, Compression } from "./artifact";
import type { RetentionPolicy } from "./config";

export type StorageType = "local" | "borg";

export interface RotateOptions {
  /** Compute the selection without deleting anything */
  dryRun?: boolean;
  /** Reference time for age-based policies */
  now?: Date;
}

export interface RotationResult {
  kept: BackupArtifact[];
  deleted: BackupArtifact[];
}

export interface IStorageBackend {
  readonly type: StorageType;
  readonly name: string;
  readonly retention: RetentionPolicy;
  /** Compression applied to artifacts written by this backend */
  readonly compression: Compression | undefined;

  /**
   * Prepare the backend. Safe to call repeatedly.
   */
  initialize(): Promise<void>;

  /**
   * List stored artifacts matching every non-empty field of the filter
   */
  list(filter?: ArtifactFilter): Promise<BackupArtifact[]>;

  /**
   * Apply the retention policy to the filtered listing
   */
  rotate(filter: ArtifactFilter, options?: RotateOptions): Promise<RotationResult>;

  /**
   * Store an export stream. Any byte on stderr fails the store, and a
   * failed store leaves no artifact behind.
   */
  consumeExportStream(
    artifact: BackupArtifact,
    stdout: Readable,
    stderr: Readable,
  ): Promise<BackupArtifact>;

  /**
   * Delete one stored artifact
   */
  remove(artifact: BackupArtifact): Promise<void>;
}
