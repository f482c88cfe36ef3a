/**
 * Backup artifact type definitions
 */

export type JobKind = "vm-backup";

export type Compression = "gzip" | "zstd";

/**
 * One stored backup unit. Never persisted as a record: the encoded
 * name is the persisted form.
 */
export interface BackupArtifact {
  /** Hypervisor host the object was exported from ("" in single-host layouts) */
  hostId: string;
  jobKind: JobKind;
  /** VM name label, trimmed */
  objectName: string;
  timestamp: Date;
  /** Stored size in bytes, when known */
  size?: number;
  compression?: Compression;
}

export interface TimestampBound {
  at: Date;
  inclusive: boolean;
}

export interface TimestampRange {
  start?: TimestampBound;
  end?: TimestampBound;
}

/**
 * Query restricting a storage listing. Every non-empty field must match.
 */
export interface ArtifactFilter {
  hostIds?: string[];
  jobKinds?: JobKind[];
  objectNames?: string[];
  timestamp?: TimestampRange;
  compressions?: Compression[];
}
