import { PassThrough, Readable } from "node:stream";
import { BaseStorageBackend } from "../src/storage/base";
import { applyFilter } from "../src/storage/filter";
import type {
  ArtifactFilter,
  BackupArtifact,
  Compression,
  ExportStreams,
  HypervisorClient,
  JobStats,
  RetentionPolicy,
  VmHandle,
} from "../src/types";
import { NoSnapshotsError, StreamConsumptionError } from "../src/utils/errors";
import { createArtifact, encodeArtifactName } from "../src/utils/naming";
import type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  ExitStatus,
  SpawnedCommand,
} from "../src/utils/process";
import { readStreamText } from "../src/utils/process";

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

export function vmArtifact(
  objectName: string,
  timestamp: Date,
  hostId = "xen01",
): BackupArtifact {
  return createArtifact({ hostId, jobKind: "vm-backup", objectName, timestamp });
}

export function vm(uuid: string, nameLabel: string, snapshotTime: Date | null = null): VmHandle {
  return {
    uuid,
    nameLabel,
    nameDescription: "",
    isTemplate: false,
    isSnapshot: snapshotTime !== null,
    snapshotTime,
  };
}

export function ok(stdout = ""): CommandResult {
  return { success: true, stdout, stderr: "", exitCode: 0 };
}

export function failed(stderr: string, exitCode = 1): CommandResult {
  return { success: false, stdout: "", stderr, exitCode };
}

/**
 * Stats of a finished nightly run, as the job engine reports them
 */
export function sampleStats(overrides: Partial<JobStats> = {}): JobStats {
  return {
    jobName: "nightly",
    jobKind: "vm-backup",
    hostname: "backup01",
    schedule: "0 2 * * *",
    job: {
      enabled: true,
      schedule: "0 2 * * *",
      hosts: ["xen01"],
      storages: ["local"],
      tagFilter: ["backup"],
      tagFilterExclude: [],
      concurrency: 1,
      snapshot: { reuseExisting: false, maxAgeMinutes: 60 },
    },
    startedAt: "2024-03-01T02:00:00.000Z",
    totalObjects: 2,
    successfulObjects: 2,
    failedObjects: 0,
    durationSeconds: 42,
    errors: [],
    ...overrides,
  };
}

export interface RecordedCall {
  command: string;
  args: string[];
  options?: CommandOptions;
}

/**
 * In-process command runner. `run` answers through `respond`; `spawn`
 * hands back streams the test drives.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  readonly spawned: FakeProcess[] = [];

  constructor(
    private readonly respond: (command: string, args: string[]) => CommandResult = () => ok(),
    private readonly onSpawn: (child: FakeProcess) => void = (child) => child.finish(0),
  ) {}

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    return this.respond(command, args);
  }

  spawn(command: string, args: string[], options?: CommandOptions): SpawnedCommand {
    this.calls.push({ command, args, options });
    const child = new FakeProcess(command, args);
    this.spawned.push(child);
    this.onSpawn(child);
    return child;
  }

  argsOf(subcommand: string): string[][] {
    return this.calls.filter((call) => call.args.includes(subcommand)).map((call) => call.args);
  }
}

export class FakeProcess implements SpawnedCommand {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly exited: Promise<ExitStatus>;
  /** Everything written to stdin, up to its end or its destruction */
  readonly input: Promise<string>;
  /** Set once the process has exited */
  exitStatus: ExitStatus | null = null;
  killed = false;
  /** Error the stdin pipe was destroyed with, if any */
  stdinError: Error | null = null;
  private resolveExit: (status: ExitStatus) => void = () => {};

  constructor(
    readonly command: string,
    readonly args: string[],
  ) {
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
    this.input = new Promise((resolve) => {
      const chunks: Buffer[] = [];
      this.stdin.on("data", (chunk: Buffer) => chunks.push(chunk));
      this.stdin.on("error", (err) => {
        this.stdinError = err;
      });
      this.stdin.on("close", () => resolve(Buffer.concat(chunks).toString("utf8")));
    });
  }

  kill(): void {
    if (this.exitStatus) return;
    this.killed = true;
    this.stdout.end();
    this.stderr.end();
    this.exit({ exitCode: null, signal: "SIGTERM" });
  }

  /**
   * End the output streams once stdin is drained, then exit with `code`
   */
  finish(code: number, output: { stderr?: string; stdout?: (input: string) => string } = {}): void {
    void this.input.then((input) => {
      if (this.killed) return;
      if (output.stdout) this.stdout.write(output.stdout(input));
      if (output.stderr) this.stderr.write(output.stderr);
      this.stdout.end();
      this.stderr.end();
      this.exit({ exitCode: code, signal: null });
    });
  }

  private exit(status: ExitStatus): void {
    this.exitStatus = status;
    this.resolveExit(status);
  }
}

/**
 * Streams of a finished export
 */
export function exportOf(data: string, errorText = ""): ExportStreams {
  return {
    stdout: Readable.from([Buffer.from(data)]),
    stderr: Readable.from(errorText ? [Buffer.from(errorText)] : []),
  };
}

export interface FakeHypervisorOptions {
  /** VM names whose export reports an error */
  failingExports?: string[];
  /** Existing snapshots per VM uuid */
  snapshots?: Record<string, VmHandle[]>;
  /** Delay export streams so concurrent tasks overlap */
  exportDelayMs?: number;
}

/**
 * In-memory hypervisor recording the calls the job engine makes
 */
export class FakeHypervisor implements HypervisorClient {
  readonly created: VmHandle[] = [];
  readonly deleted: string[] = [];
  readonly renamed: Array<{ uuid: string; label: string }> = [];
  readonly exported: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private snapshotCount = 0;
  private readonly snapshotOf = new Map<string, VmHandle>();

  constructor(
    readonly hostId: string,
    private readonly vms: VmHandle[],
    private readonly options: FakeHypervisorOptions = {},
    private readonly now: () => Date = () => new Date("2024-03-01T12:00:00Z"),
  ) {}

  async listVms(): Promise<VmHandle[]> {
    return this.vms;
  }

  async createSnapshot(source: VmHandle): Promise<VmHandle> {
    this.snapshotCount++;
    const snapshot = vm(`snap-${this.snapshotCount}`, `snapshot of ${source.nameLabel}`, this.now());
    snapshot.isTemplate = true;
    this.created.push(snapshot);
    this.snapshotOf.set(snapshot.uuid, source);
    return snapshot;
  }

  async listSnapshots(source: VmHandle): Promise<VmHandle[]> {
    const existing = this.options.snapshots?.[source.uuid] ?? [];
    if (existing.length === 0) {
      throw new NoSnapshotsError(source.uuid);
    }
    for (const snapshot of existing) {
      this.snapshotOf.set(snapshot.uuid, source);
    }
    return existing;
  }

  async markNotTemplate(snapshot: VmHandle): Promise<VmHandle> {
    return { ...snapshot, isTemplate: false };
  }

  async rename(snapshot: VmHandle, label: string): Promise<VmHandle> {
    this.renamed.push({ uuid: snapshot.uuid, label });
    return { ...snapshot, nameLabel: label };
  }

  async deleteSnapshot(uuid: string): Promise<void> {
    this.deleted.push(uuid);
  }

  exportStream(snapshot: VmHandle): ExportStreams {
    const source = this.snapshotOf.get(snapshot.uuid);
    const name = source?.nameLabel ?? snapshot.nameLabel;
    this.exported.push(name);

    const stdout = new PassThrough();
    const stderr = new PassThrough();
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    setTimeout(() => {
      this.inFlight--;
      if (this.options.failingExports?.includes(name)) {
        stderr.end(`The VM ${name} could not be exported`);
      } else {
        stderr.end();
      }
      stdout.end(`xva:${name}`);
    }, this.options.exportDelayMs ?? 0);

    return { stdout, stderr };
  }
}

/**
 * Storage backend keeping artifacts in memory, keyed by encoded name
 */
export class MemoryStorageBackend extends BaseStorageBackend {
  readonly type = "local" as const;
  readonly stored = new Map<string, { artifact: BackupArtifact; data: string }>();
  readonly removed: string[] = [];
  initialized = 0;

  constructor(
    name: string,
    retention: RetentionPolicy = { type: "flat", count: 10 },
    compression?: Compression,
    private readonly initError?: Error,
  ) {
    super(name, retention, compression);
  }

  async initialize(): Promise<void> {
    this.initialized++;
    if (this.initError) throw this.initError;
  }

  async list(filter: ArtifactFilter = {}): Promise<BackupArtifact[]> {
    const artifacts = [...this.stored.values()].map(({ artifact }) => ({ ...artifact }));
    return applyFilter(artifacts, filter);
  }

  add(artifact: BackupArtifact, data = ""): void {
    this.stored.set(encodeArtifactName(artifact, true), { artifact, data });
  }

  async consumeExportStream(
    artifact: BackupArtifact,
    stdout: Readable,
    stderr: Readable,
  ): Promise<BackupArtifact> {
    const [data, errors] = await Promise.all([readStreamText(stdout), readStreamText(stderr)]);
    if (errors.length > 0) {
      throw new StreamConsumptionError(`Failed to store ${artifact.objectName}: ${errors}`);
    }
    this.add(artifact, data);
    return artifact;
  }

  async remove(artifact: BackupArtifact): Promise<void> {
    const name = encodeArtifactName(artifact, true);
    this.stored.delete(name);
    this.removed.push(name);
  }
}
