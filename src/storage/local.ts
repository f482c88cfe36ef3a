/**
 * Local filesystem storage backend
 */

import { createWriteStream } from "node:fs";
import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ArtifactFilter, BackupArtifact, Compression, LocalStorageConfig } from "../types";
import { BackendInitError, StreamConsumptionError } from "../utils/errors";
import { encodeArtifactName, tryDecodeArtifactName } from "../utils/naming";
import { isPathWithinDir } from "../utils/path";
import type { CommandRunner } from "../utils/process";
import { defaultRunner, readStreamText } from "../utils/process";
import { BaseStorageBackend } from "./base";
import { createCompressor, STREAM_BUFFER_SIZE } from "./compression";
import { applyFilter } from "./filter";

const PARTIAL_SUFFIX = ".partial";

export class LocalStorageBackend extends BaseStorageBackend {
  readonly type = "local" as const;
  readonly path: string;

  constructor(
    name: string,
    config: LocalStorageConfig,
    private readonly runner: CommandRunner = defaultRunner,
  ) {
    super(name, config.retention, toCompression(config.compression));
    this.path = path.resolve(config.path);
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.path, { recursive: true });
    } catch (err) {
      throw new BackendInitError(this.name, `cannot create directory ${this.path}`, {
        cause: err,
      });
    }
    this.log.debug(`Storage directory ready: ${this.path}`);
  }

  async list(filter: ArtifactFilter = {}): Promise<BackupArtifact[]> {
    const entries = await readdir(this.path, { withFileTypes: true });
    const decoded: BackupArtifact[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || entry.name.endsWith(PARTIAL_SUFFIX)) {
        continue;
      }

      const artifact = tryDecodeArtifactName(entry.name);
      if (!artifact) {
        this.log.debug(`Ignoring foreign file: ${entry.name}`);
        continue;
      }
      decoded.push(this.rememberHandle(artifact, entry.name));
    }

    // other tasks may rotate this directory while it is being listed
    const artifacts: BackupArtifact[] = [];
    for (const artifact of applyFilter(decoded, filter)) {
      const fileName = this.handleOf(artifact, true);
      const size = await this.sizeOf(path.join(this.path, fileName));
      if (size === null) {
        this.log.debug(`File removed while listing: ${fileName}`);
        continue;
      }
      artifact.size = size;
      artifacts.push(artifact);
    }

    return artifacts;
  }

  /**
   * Size of a stored file, or null once it is gone
   */
  private async sizeOf(filePath: string): Promise<number | null> {
    try {
      return (await stat(filePath)).size;
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
  }

  async consumeExportStream(
    artifact: BackupArtifact,
    stdout: Readable,
    stderr: Readable,
  ): Promise<BackupArtifact> {
    const stored: BackupArtifact = { ...artifact };
    if (this.compression) {
      stored.compression = this.compression;
    } else {
      delete stored.compression;
    }

    const fileName = encodeArtifactName(stored, true);
    const finalPath = path.join(this.path, fileName);
    const partialPath = `${finalPath}${PARTIAL_SUFFIX}`;

    this.log.debug(`Writing ${partialPath}`);

    let renamed = false;
    try {
      const compressor = createCompressor(this.compression, this.runner);
      const destination = createWriteStream(partialPath, { highWaterMark: STREAM_BUFFER_SIZE });

      // settle everything so the partial file is closed before it is removed
      const [written, compressed, errorOutput] = await Promise.allSettled([
        pipeline(stdout, compressor.stream, destination),
        compressor.done,
        readStreamText(stderr),
      ]);

      for (const result of [written, compressed, errorOutput]) {
        if (result.status === "rejected") throw result.reason;
      }
      if (errorOutput.status === "fulfilled" && errorOutput.value.length > 0) {
        throw new Error(`export reported an error: ${errorOutput.value.trim()}`);
      }

      await rename(partialPath, finalPath);
      renamed = true;
      stored.size = (await stat(finalPath)).size;
    } catch (err) {
      await rm(renamed ? finalPath : partialPath, { force: true });
      throw new StreamConsumptionError(`Failed to store ${fileName} in storage "${this.name}"`, {
        cause: err,
      });
    }

    this.log.info(`Stored ${fileName} (${stored.size} bytes)`);
    return stored;
  }

  async remove(artifact: BackupArtifact): Promise<void> {
    const filePath = path.join(this.path, this.handleOf(artifact, true));
    if (!isPathWithinDir(filePath, this.path)) {
      throw new Error(`Refusing to delete outside storage directory: ${filePath}`);
    }
    await rm(filePath);
    this.log.debug(`Deleted local file: ${filePath}`);
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export function toCompression(setting: Compression | "none" | undefined): Compression | undefined {
  return setting === undefined || setting === "none" ? undefined : setting;
}
