/**
 * Behaviour shared by every storage backend
 */

import type { Readable } from "node:stream";
import { isNoopPolicy, selectForDeletion } from "../core/cleanup/retention";
import type {
  ArtifactFilter,
  BackupArtifact,
  Compression,
  IStorageBackend,
  RetentionPolicy,
  RotateOptions,
  RotationResult,
  StorageType,
} from "../types";
import { RotationError } from "../utils/errors";
import type { ScopedLogger } from "../utils/logger";
import { scoped } from "../utils/logger";
import { encodeArtifactName } from "../utils/naming";

export abstract class BaseStorageBackend implements IStorageBackend {
  abstract readonly type: StorageType;
  protected readonly log: ScopedLogger;
  /** Storage handle each listed artifact was decoded from */
  private readonly handles = new WeakMap<BackupArtifact, string>();

  constructor(
    readonly name: string,
    readonly retention: RetentionPolicy,
    readonly compression: Compression | undefined,
  ) {
    this.log = scoped(`storage:${name}`);
  }

  abstract initialize(): Promise<void>;

  abstract list(filter?: ArtifactFilter): Promise<BackupArtifact[]>;

  abstract consumeExportStream(
    artifact: BackupArtifact,
    stdout: Readable,
    stderr: Readable,
  ): Promise<BackupArtifact>;

  abstract remove(artifact: BackupArtifact): Promise<void>;

  protected rememberHandle(artifact: BackupArtifact, handle: string): BackupArtifact {
    this.handles.set(artifact, handle);
    return artifact;
  }

  /**
   * The handle an artifact was listed under, or its encoded name for
   * artifacts that did not come from a listing
   */
  protected handleOf(artifact: BackupArtifact, includeExtension: boolean): string {
    return this.handles.get(artifact) ?? encodeArtifactName(artifact, includeExtension);
  }

  async rotate(filter: ArtifactFilter, options: RotateOptions = {}): Promise<RotationResult> {
    const artifacts = await this.list(filter);

    if (isNoopPolicy(this.retention)) {
      this.log.info("Retention tiers are all zero, skipping rotation");
      return { kept: artifacts, deleted: [] };
    }

    const selection = selectForDeletion(artifacts, this.retention, options.now ?? new Date());

    for (const artifact of selection.delete) {
      const name = encodeArtifactName(artifact, false);
      if (options.dryRun) {
        this.log.info(`Would delete ${name}`);
        continue;
      }

      try {
        await this.remove(artifact);
      } catch (err) {
        throw new RotationError(`Failed to delete ${name} from storage "${this.name}"`, {
          cause: err,
        });
      }
      this.log.info(`Deleted ${name}`);
    }

    this.log.debug(
      `Rotation kept ${selection.keep.length}, deleted ${selection.delete.length} artifact(s)`,
    );

    return { kept: selection.keep, deleted: selection.delete };
  }
}
