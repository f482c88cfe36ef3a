/**
 * VM backup job orchestration
 */

import { DEFAULT_CONCURRENCY, resolveSnapshotConfig } from "../../config/defaults";
import type {
  BackupArtifact,
  BackupTarget,
  HypervisorClient,
  IStorageBackend,
  JobConfig,
  JobOutcome,
  JobStats,
  SnapshotConfig,
} from "../../types";
import { describeError, JobFailedError, VmBackupError } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import type { ScopedLogger } from "../../utils/logger";
import { scoped } from "../../utils/logger";
import { createArtifact, encodeArtifactName, filterForArtifact } from "../../utils/naming";
import { Semaphore } from "../../utils/semaphore";
import type { AcquiredSnapshot } from "./snapshot";
import { acquireSnapshot } from "./snapshot";

export interface VmBackupJobDefinition {
  name: string;
  /** Machine running the job, reported in stats */
  hostname: string;
  job: JobConfig;
}

export interface VmBackupJobDependencies {
  /** One client per host linked to the job */
  hypervisors: HypervisorClient[];
  /** Backends in the order the job lists them */
  backends: IStorageBackend[];
  now?: () => Date;
}

interface TaskResult {
  target: BackupTarget;
  error: Error | null;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function createStats(definition: VmBackupJobDefinition, startedAt: Date): JobStats {
  return {
    jobName: definition.name,
    jobKind: "vm-backup",
    hostname: definition.hostname,
    schedule: definition.job.schedule,
    job: definition.job,
    startedAt: startedAt.toISOString(),
    totalObjects: 0,
    successfulObjects: 0,
    failedObjects: 0,
    durationSeconds: 0,
    errors: [],
  };
}

function describeTarget(target: BackupTarget): string {
  return `${target.vm.nameLabel} [${target.vm.uuid}] on host ${target.hostId}`;
}

/**
 * Ask every linked host for the VMs matching the job's tag filter. The
 * same VM reported twice by one host is backed up once.
 */
async function resolveTargets(
  definition: VmBackupJobDefinition,
  hypervisors: HypervisorClient[],
  log: ScopedLogger,
): Promise<BackupTarget[]> {
  const { tagFilter, tagFilterExclude = [] } = definition.job;
  const seen = new Set<string>();
  const targets: BackupTarget[] = [];

  for (const client of hypervisors) {
    const vms = await client.listVms(tagFilter, tagFilterExclude);
    log.debug(`Host ${client.hostId} reported ${vms.length} VM(s)`);

    for (const vm of vms) {
      const key = `${client.hostId}\0${vm.uuid}`;
      if (seen.has(key)) continue;
      seen.add(key);
      targets.push({ hostId: client.hostId, vm });
    }
  }

  if (targets.length === 0) {
    log.warn(`No VMs matched tags [${tagFilter.join(", ")}]`);
  }

  return targets;
}

/**
 * Resolve targets only, for dry runs
 */
export async function planVmBackupJob(
  definition: VmBackupJobDefinition,
  dependencies: Pick<VmBackupJobDependencies, "hypervisors">,
): Promise<BackupTarget[]> {
  return resolveTargets(definition, dependencies.hypervisors, scoped(`job:${definition.name}`));
}

/**
 * Export a prepared snapshot into every backend in turn, rotating each
 * backend right after its store succeeds.
 */
async function exportToBackends(
  client: HypervisorClient,
  target: BackupTarget,
  acquired: AcquiredSnapshot,
  backends: IStorageBackend[],
  now: () => Date,
  log: ScopedLogger,
): Promise<void> {
  let snapshot = await client.markNotTemplate(acquired.snapshot);

  const artifact = createArtifact({
    hostId: target.hostId,
    jobKind: "vm-backup",
    objectName: target.vm.nameLabel,
    timestamp: snapshot.snapshotTime ?? now(),
  });

  if (acquired.created) {
    snapshot = await client.rename(snapshot, encodeArtifactName(artifact, false));
  }

  for (const backend of backends) {
    const pending: BackupArtifact = backend.compression
      ? { ...artifact, compression: backend.compression }
      : artifact;

    const { stdout, stderr } = client.exportStream(snapshot);
    const stored = await backend.consumeExportStream(pending, stdout, stderr);
    log.info(`Stored ${target.vm.nameLabel} in ${backend.name}`);

    await backend.rotate(filterForArtifact(stored), { now: now() });
  }
}

/**
 * Back up one VM. An engine-created snapshot is deleted exactly once,
 * whatever happened to the export; a reused one is left alone.
 */
async function backupTarget(
  client: HypervisorClient,
  target: BackupTarget,
  backends: IStorageBackend[],
  snapshotConfig: SnapshotConfig,
  now: () => Date,
  log: ScopedLogger,
): Promise<void> {
  try {
    const acquired = await acquireSnapshot(client, target.vm, snapshotConfig, now(), log);

    let exportError: Error | null = null;
    try {
      await exportToBackends(client, target, acquired, backends, now, log);
    } catch (err) {
      exportError = toError(err);
    }

    if (acquired.created) {
      try {
        await client.deleteSnapshot(acquired.snapshot.uuid);
      } catch (err) {
        if (!exportError) throw err;
        log.error(`Failed to delete snapshot ${acquired.snapshot.uuid}`, err);
      }
    }

    if (exportError) throw exportError;
  } catch (err) {
    throw new VmBackupError(`Failed to backup VM ${describeTarget(target)}`, { cause: err });
  }
}

/**
 * Run one VM backup job to completion. Failures are reported through the
 * returned outcome; the promise itself does not reject.
 */
export async function runVmBackupJob(
  definition: VmBackupJobDefinition,
  dependencies: VmBackupJobDependencies,
): Promise<JobOutcome> {
  const now = dependencies.now ?? (() => new Date());
  const startedAt = now();
  const stats = createStats(definition, startedAt);
  const log = scoped(`job:${definition.name}`);

  const finish = (): void => {
    stats.durationSeconds = (now().getTime() - startedAt.getTime()) / 1000;
  };

  log.info(`Starting backup job ${definition.name}`);

  let targets: BackupTarget[];
  try {
    targets = await resolveTargets(definition, dependencies.hypervisors, log);
    for (const backend of dependencies.backends) {
      await backend.initialize();
    }
  } catch (err) {
    const error = toError(err);
    stats.errors.push(describeError(error));
    finish();
    log.error(`Backup job ${definition.name} aborted`, error);
    return { ok: false, stats, error };
  }

  const clients = new Map(dependencies.hypervisors.map((client) => [client.hostId, client]));
  const snapshotConfig = resolveSnapshotConfig(definition.job.snapshot);
  const semaphore = new Semaphore(definition.job.concurrency ?? DEFAULT_CONCURRENCY);
  const tasks: Promise<TaskResult>[] = [];

  for (const target of targets) {
    const release = await semaphore.acquire();
    const client = clients.get(target.hostId);

    const task = client
      ? backupTarget(client, target, dependencies.backends, snapshotConfig, now, log)
      : Promise.reject(new Error(`No hypervisor client for host ${target.hostId}`));

    tasks.push(
      task
        .then(
          (): TaskResult => ({ target, error: null }),
          (err: unknown): TaskResult => ({ target, error: toError(err) }),
        )
        .finally(release),
    );
  }

  const results = await Promise.all(tasks);

  stats.totalObjects = results.length;
  for (const result of results) {
    if (result.error) {
      stats.failedObjects++;
      stats.errors.push(describeError(result.error));
      log.error(describeError(result.error));
    } else {
      stats.successfulObjects++;
    }
  }
  finish();

  log.info(
    `Backup job ${definition.name} finished in ${formatDuration(stats.durationSeconds * 1000)}: ` +
      `${stats.successfulObjects}/${stats.totalObjects} succeeded`,
  );

  if (stats.failedObjects > 0) {
    return { ok: false, stats, error: new JobFailedError(definition.name, stats.failedObjects) };
  }
  return { ok: true, stats };
}
