/**
 * Configuration path resolution and job lookup
 */

import * as path from "node:path";
import type { HyperbakConfig, JobConfig } from "../types";
import { ConfigError } from "./validator";

/**
 * Resolve relative local storage paths against the config file's directory
 */
export function resolvePaths(config: HyperbakConfig, configPath: string): HyperbakConfig {
  const configDir = path.dirname(path.resolve(configPath));

  for (const storage of Object.values(config.storage)) {
    if (storage.type === "local" && !path.isAbsolute(storage.path)) {
      storage.path = path.resolve(configDir, storage.path);
    }
  }

  return config;
}

export function getJob(config: HyperbakConfig, jobName: string): JobConfig {
  const job = config.jobs[jobName];
  if (!job) {
    throw new ConfigError(`Job "${jobName}" not found`);
  }
  return job;
}

export function getEnabledJobNames(config: HyperbakConfig): string[] {
  return Object.entries(config.jobs)
    .filter(([, job]) => job.enabled !== false)
    .map(([name]) => name);
}

/**
 * Storage names to operate on: the requested ones, or every configured one
 */
export function resolveStorageNames(config: HyperbakConfig, requested: string[] = []): string[] {
  if (requested.length === 0) {
    return Object.keys(config.storage);
  }
  for (const name of requested) {
    if (!config.storage[name]) {
      throw new ConfigError(`Storage "${name}" not found`);
    }
  }
  return requested;
}
