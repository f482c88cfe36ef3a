/**
 * Wiring shared by the CLI commands
 */

import { findAndLoadConfig } from "../config/loader";
import { getJob } from "../config/resolver";
import type { VmBackupJobDefinition, VmBackupJobDependencies } from "../core/backup";
import { runVmBackupJob } from "../core/backup";
import { runMonitoredJob } from "../core/scheduler";
import type { CheckDefinition } from "../monitoring";
import { createStorageBackends } from "../storage";
import type { HyperbakConfig, JobOutcome, Monitor, MonitorKey } from "../types";
import { setLogLevel } from "../utils/logger";
import type { CommandRunner } from "../utils/process";
import { defaultRunner } from "../utils/process";
import { createXenClients } from "../xen";

/**
 * Load the config and apply its log level; `--verbose` wins over it
 */
export async function loadCommandConfig(
  configPath: string | undefined,
  verbose: boolean,
): Promise<HyperbakConfig> {
  const config = await findAndLoadConfig(configPath);
  setLogLevel(verbose ? "debug" : config.general.logLevel);
  return config;
}

export function monitorKey(config: HyperbakConfig, jobName: string): MonitorKey {
  return { hostname: config.general.hostname, jobName };
}

export function checkDefinitions(config: HyperbakConfig, jobNames: string[]): CheckDefinition[] {
  return jobNames.map((name) => {
    const job = getJob(config, name);
    const check: CheckDefinition = { key: monitorKey(config, name), schedule: job.schedule };
    if (job.timezone) check.timezone = job.timezone;
    return check;
  });
}

export interface PreparedJob {
  definition: VmBackupJobDefinition;
  dependencies: VmBackupJobDependencies;
}

/**
 * Build a job's collaborators from configuration. Called once per run so
 * that no backend state outlives the run.
 */
export function prepareJob(
  config: HyperbakConfig,
  jobName: string,
  runner: CommandRunner = defaultRunner,
): PreparedJob {
  const job = getJob(config, jobName);
  return {
    definition: { name: jobName, hostname: config.general.hostname, job },
    dependencies: {
      hypervisors: createXenClients(config.hosts, job.hosts, runner),
      backends: createStorageBackends(config, job.storages, runner),
    },
  };
}

/**
 * Run a job through the monitoring notification sequence
 */
export function runJobWithMonitors(
  config: HyperbakConfig,
  jobName: string,
  monitors: Monitor[],
  runner: CommandRunner = defaultRunner,
): Promise<JobOutcome> {
  return runMonitoredJob(monitorKey(config, jobName), monitors, () => {
    const { definition, dependencies } = prepareJob(config, jobName, runner);
    return runVmBackupJob(definition, dependencies);
  });
}
