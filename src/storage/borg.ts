/**
 * Borg repository storage backend
 */

import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type {
  ArtifactFilter,
  BackupArtifact,
  BorgCompression,
  BorgEncryption,
  BorgStorageConfig,
} from "../types";
import { DEFAULT_BORG_LOCK_WAIT_SECONDS } from "../config/defaults";
import { BackendInitError, CollaboratorError, StreamConsumptionError } from "../utils/errors";
import { baseExtension, encodeArtifactName, tryDecodeArtifactName } from "../utils/naming";
import type { CommandResult, CommandRunner } from "../utils/process";
import { defaultRunner, readStreamText } from "../utils/process";
import { BaseStorageBackend } from "./base";
import { applyFilter } from "./filter";

const BORG = "borg";

export class BorgStorageBackend extends BaseStorageBackend {
  readonly type = "borg" as const;
  readonly repository: string;
  readonly encryption: BorgEncryption;
  readonly borgCompression: BorgCompression;
  readonly lockWaitSeconds: number;
  private readonly passphrase: string | undefined;

  constructor(
    name: string,
    config: BorgStorageConfig,
    private readonly runner: CommandRunner = defaultRunner,
  ) {
    // borg compresses internally, archives carry no compression suffix
    super(name, config.retention, undefined);
    this.repository = config.repository;
    this.encryption = config.encryption ?? "repokey";
    this.borgCompression = config.compression ?? "none";
    this.lockWaitSeconds = config.lockWaitSeconds ?? DEFAULT_BORG_LOCK_WAIT_SECONDS;
    this.passphrase = config.passphrase ?? process.env.BORG_PASSPHRASE;
  }

  private env(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env };
    if (this.passphrase !== undefined) {
      env.BORG_PASSPHRASE = this.passphrase;
    }
    return env;
  }

  private archiveRef(archive: string): string {
    return `${this.repository}::${archive}`;
  }

  /**
   * Arguments for `borg <subcommand>`. Every task of a job shares the
   * repository lock, so each call waits for it instead of failing.
   */
  private borgArgs(subcommand: string, rest: string[]): string[] {
    return [subcommand, "--lock-wait", String(this.lockWaitSeconds), ...rest];
  }

  private async borg(subcommand: string, rest: string[]): Promise<CommandResult> {
    const args = this.borgArgs(subcommand, rest);
    this.log.debug(`Running: ${BORG} ${args.join(" ")}`);
    return this.runner.run(BORG, args, { env: this.env() });
  }

  async initialize(): Promise<void> {
    if (this.encryption !== "none" && this.passphrase === undefined) {
      throw new BackendInitError(
        this.name,
        `encryption "${this.encryption}" needs a passphrase (config or BORG_PASSPHRASE)`,
      );
    }

    let result: CommandResult;
    try {
      result = await this.borg("init", [`--encryption=${this.encryption}`, this.repository]);
    } catch (err) {
      throw new BackendInitError(this.name, "cannot run borg", { cause: err });
    }

    if (result.success) {
      this.log.info(`Initialized borg repository ${this.repository}`);
      return;
    }
    if (/already exists/i.test(result.stderr)) {
      this.log.debug(`Borg repository already exists: ${this.repository}`);
      return;
    }

    throw new BackendInitError(this.name, result.stderr || `borg init exited ${result.exitCode}`);
  }

  async list(filter: ArtifactFilter = {}): Promise<BackupArtifact[]> {
    const result = await this.borg("list", ["--short", this.repository]);
    if (!result.success) {
      throw new CollaboratorError(
        `borg list failed for repository ${this.repository}`,
        result.stderr,
      );
    }

    const artifacts: BackupArtifact[] = [];
    for (const line of result.stdout.split("\n")) {
      const archive = line.trim();
      if (archive.length === 0) continue;

      const artifact = tryDecodeArtifactName(archive);
      if (!artifact) {
        this.log.debug(`Ignoring foreign archive: ${archive}`);
        continue;
      }
      artifacts.push(this.rememberHandle(artifact, archive));
    }

    return applyFilter(artifacts, filter);
  }

  async consumeExportStream(
    artifact: BackupArtifact,
    stdout: Readable,
    stderr: Readable,
  ): Promise<BackupArtifact> {
    const stored: BackupArtifact = { ...artifact };
    delete stored.compression;

    const archive = encodeArtifactName(stored, false);
    const stdinName = `${archive}.${baseExtension(stored.jobKind)}`;
    const args = this.borgArgs("create", [
      "--stdin-name",
      stdinName,
      "--compression",
      this.borgCompression,
      this.archiveRef(archive),
      "-",
    ]);

    this.log.debug(`Running: ${BORG} ${args.join(" ")}`);
    const child = this.runner.spawn(BORG, args, { env: this.env() });

    // a broken export must not reach borg as end of input
    const feed = pipeline(stdout, child.stdin).catch((err: unknown) => {
      child.kill();
      throw err;
    });

    try {
      // settle everything, borg included, before anything is discarded
      const [fed, exportErrors, borgErrors] = await Promise.allSettled([
        feed,
        readStreamText(stderr),
        readStreamText(child.stderr),
        readStreamText(child.stdout),
      ]);
      const status = await child.exited;

      if (status.error) {
        throw status.error;
      }
      const feedError: unknown = fed.status === "rejected" ? fed.reason : undefined;
      if (status.exitCode !== 0) {
        throw new CollaboratorError(
          `borg create exited with code ${status.exitCode ?? status.signal ?? "unknown"}`,
          borgErrors.status === "fulfilled" ? borgErrors.value.trim() : undefined,
          feedError === undefined ? undefined : { cause: feedError },
        );
      }
      if (feedError !== undefined) {
        throw feedError;
      }
      if (exportErrors.status === "rejected") {
        throw exportErrors.reason;
      }
      if (exportErrors.value.length > 0) {
        throw new Error(`export reported an error: ${exportErrors.value.trim()}`);
      }
    } catch (err) {
      await this.discardArchive(archive);
      throw new StreamConsumptionError(`Failed to store ${archive} in storage "${this.name}"`, {
        cause: err,
      });
    }

    this.log.info(`Stored archive ${archive}`);
    return stored;
  }

  /**
   * Remove a half-written archive once borg create has exited. borg may
   * not have created it at all, so a failure here is only logged.
   */
  private async discardArchive(archive: string): Promise<void> {
    try {
      const result = await this.borg("delete", [this.archiveRef(archive)]);
      if (!result.success) {
        this.log.warn(`Could not delete incomplete archive ${archive}: ${result.stderr}`);
      }
    } catch (err) {
      this.log.warn(`Could not delete incomplete archive ${archive}`, err);
    }
  }

  async remove(artifact: BackupArtifact): Promise<void> {
    const archive = this.handleOf(artifact, false);
    const result = await this.borg("delete", [this.archiveRef(archive)]);
    if (!result.success) {
      throw new CollaboratorError(`borg delete failed for ${archive}`, result.stderr);
    }
  }
}
