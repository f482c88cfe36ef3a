/**
 * Configuration validation
 */

import { parseCron } from "../core/scheduler/cron-parser";
import type {
  BorgStorageConfig,
  GeneralConfig,
  HealthchecksConfig,
  HostConfig,
  HyperbakConfig,
  JobConfig,
  LocalStorageConfig,
  MailConfig,
  MonitoringConfig,
  RetentionPolicy,
  SnapshotConfig,
  StorageConfig,
} from "../types";
import { isLogLevel } from "../utils/logger";
import {
  DEFAULT_BORG_ENCRYPTION,
  DEFAULT_BORG_LOCK_WAIT_SECONDS,
  DEFAULT_CONCURRENCY,
  DEFAULT_HEALTHCHECKS,
  DEFAULT_LOG_LEVEL,
  DEFAULT_SMTP_PORT,
  DEFAULT_SNAPSHOT,
  defaultHostname,
} from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): Raw {
  if (!isRecord(value)) {
    throw new ConfigError(`${path} must be an object`);
  }
  return value;
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new ConfigError(`${path} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined ? undefined : requireString(value, path);
}

function optionalBoolean(value: unknown, path: string, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(`${path} must be a boolean`);
  }
  return value;
}

function requireInteger(value: unknown, path: string, min: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${path} must be an integer >= ${min}`);
  }
  return value;
}

function optionalInteger(value: unknown, path: string, min: number, fallback: number): number {
  return value === undefined ? fallback : requireInteger(value, path, min);
}

function requireStringArray(value: unknown, path: string, allowEmpty = false): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path} must be an array of strings`);
  }
  const items: string[] = [];
  for (const [index, item] of value.entries()) {
    items.push(requireString(item, `${path}[${index}]`));
  }
  if (!allowEmpty && items.length === 0) {
    throw new ConfigError(`${path} must not be empty`);
  }
  return items;
}

function oneOf<T extends string>(
  value: unknown,
  allowed: readonly T[],
  path: string,
  fallback?: T,
): T {
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`${path} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}

function parseGeneral(value: unknown): GeneralConfig {
  const general = value === undefined ? {} : requireRecord(value, "general");
  const logLevel = general.logLevel ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(logLevel)) {
    throw new ConfigError("general.logLevel must be one of: debug, info, warn, error");
  }
  return {
    hostname: optionalString(general.hostname, "general.hostname") ?? defaultHostname(),
    logLevel,
  };
}

function parseHosts(value: unknown): Record<string, HostConfig> {
  const hosts = requireRecord(value, "hosts");
  const result: Record<string, HostConfig> = {};

  for (const [name, raw] of Object.entries(hosts)) {
    const host = requireRecord(raw, `hosts.${name}`);
    const config: HostConfig = { server: requireString(host.server, `hosts.${name}.server`) };
    const username = optionalString(host.username, `hosts.${name}.username`);
    if (username !== undefined) config.username = username;
    if (host.password !== undefined) {
      if (typeof host.password !== "string") {
        throw new ConfigError(`hosts.${name}.password must be a string`);
      }
      config.password = host.password;
    }
    result[name] = config;
  }

  if (Object.keys(result).length === 0) {
    throw new ConfigError("Config must have at least one host");
  }
  return result;
}

function parseRetention(value: unknown, path: string): RetentionPolicy {
  const retention = requireRecord(value, path);
  const type = oneOf(retention.type, ["flat", "tiered"] as const, `${path}.type`);

  if (type === "flat") {
    return { type, count: requireInteger(retention.count, `${path}.count`, 1) };
  }
  return {
    type,
    daily: optionalInteger(retention.daily, `${path}.daily`, 0, 0),
    weekly: optionalInteger(retention.weekly, `${path}.weekly`, 0, 0),
    monthly: optionalInteger(retention.monthly, `${path}.monthly`, 0, 0),
    yearly: optionalInteger(retention.yearly, `${path}.yearly`, 0, 0),
  };
}

function parseStorageEntry(name: string, value: unknown): StorageConfig {
  const path = `storage.${name}`;
  const storage = requireRecord(value, path);
  const type = oneOf(storage.type, ["local", "borg"] as const, `${path}.type`);
  const enabled = optionalBoolean(storage.enabled, `${path}.enabled`, true);
  const retention = parseRetention(storage.retention, `${path}.retention`);

  if (type === "local") {
    const local: LocalStorageConfig = {
      type,
      enabled,
      path: requireString(storage.path, `${path}.path`),
      compression: oneOf(
        storage.compression,
        ["none", "gzip", "zstd"] as const,
        `${path}.compression`,
        "none",
      ),
      retention,
    };
    return local;
  }

  const borg: BorgStorageConfig = {
    type,
    enabled,
    repository: requireString(storage.repository, `${path}.repository`),
    encryption: oneOf(
      storage.encryption,
      ["none", "repokey", "repokey-blake2"] as const,
      `${path}.encryption`,
      DEFAULT_BORG_ENCRYPTION,
    ),
    compression: oneOf(
      storage.compression,
      ["none", "lz4", "zstd"] as const,
      `${path}.compression`,
      "none",
    ),
    lockWaitSeconds: optionalInteger(
      storage.lockWaitSeconds,
      `${path}.lockWaitSeconds`,
      0,
      DEFAULT_BORG_LOCK_WAIT_SECONDS,
    ),
    retention,
  };
  const passphrase = optionalString(storage.passphrase, `${path}.passphrase`);
  if (passphrase !== undefined) borg.passphrase = passphrase;
  return borg;
}

function parseStorage(value: unknown): Record<string, StorageConfig> {
  const storage = requireRecord(value, "storage");
  const result: Record<string, StorageConfig> = {};
  for (const [name, raw] of Object.entries(storage)) {
    result[name] = parseStorageEntry(name, raw);
  }
  if (Object.keys(result).length === 0) {
    throw new ConfigError("Config must have at least one storage");
  }
  return result;
}

function parseHealthchecks(value: unknown): HealthchecksConfig {
  const hc = requireRecord(value, "monitoring.healthchecks");
  const enabled = optionalBoolean(hc.enabled, "monitoring.healthchecks.enabled", false);
  return {
    enabled,
    server: enabled
      ? requireString(hc.server, "monitoring.healthchecks.server")
      : (optionalString(hc.server, "monitoring.healthchecks.server") ?? ""),
    apiKey: enabled
      ? requireString(hc.apiKey, "monitoring.healthchecks.apiKey")
      : (optionalString(hc.apiKey, "monitoring.healthchecks.apiKey") ?? ""),
    grace: optionalInteger(hc.grace, "monitoring.healthchecks.grace", 0, DEFAULT_HEALTHCHECKS.grace),
    maxRetries: optionalInteger(
      hc.maxRetries,
      "monitoring.healthchecks.maxRetries",
      0,
      DEFAULT_HEALTHCHECKS.maxRetries,
    ),
  };
}

function parseMail(value: unknown): MailConfig {
  const mail = requireRecord(value, "monitoring.mail");
  const enabled = optionalBoolean(mail.enabled, "monitoring.mail.enabled", false);
  const config: MailConfig = {
    enabled,
    smtpServer: enabled
      ? requireString(mail.smtpServer, "monitoring.mail.smtpServer")
      : (optionalString(mail.smtpServer, "monitoring.mail.smtpServer") ?? ""),
    smtpPort: optionalInteger(mail.smtpPort, "monitoring.mail.smtpPort", 1, DEFAULT_SMTP_PORT),
    smtpFrom: enabled
      ? requireString(mail.smtpFrom, "monitoring.mail.smtpFrom")
      : (optionalString(mail.smtpFrom, "monitoring.mail.smtpFrom") ?? ""),
    smtpTo:
      enabled || mail.smtpTo !== undefined
        ? requireStringArray(mail.smtpTo, "monitoring.mail.smtpTo", !enabled)
        : [],
  };
  const user = optionalString(mail.smtpUser, "monitoring.mail.smtpUser");
  if (user !== undefined) config.smtpUser = user;
  const password = optionalString(mail.smtpPassword, "monitoring.mail.smtpPassword");
  if (password !== undefined) config.smtpPassword = password;
  return config;
}

function parseMonitoring(value: unknown): MonitoringConfig | undefined {
  if (value === undefined) return undefined;
  const monitoring = requireRecord(value, "monitoring");
  const result: MonitoringConfig = {};
  if (monitoring.healthchecks !== undefined) {
    result.healthchecks = parseHealthchecks(monitoring.healthchecks);
  }
  if (monitoring.mail !== undefined) {
    result.mail = parseMail(monitoring.mail);
  }
  return result;
}

function parseSnapshot(value: unknown, path: string): SnapshotConfig {
  if (value === undefined) return { ...DEFAULT_SNAPSHOT };
  const snapshot = requireRecord(value, path);
  return {
    reuseExisting: optionalBoolean(
      snapshot.reuseExisting,
      `${path}.reuseExisting`,
      DEFAULT_SNAPSHOT.reuseExisting,
    ),
    maxAgeMinutes: optionalInteger(
      snapshot.maxAgeMinutes,
      `${path}.maxAgeMinutes`,
      0,
      DEFAULT_SNAPSHOT.maxAgeMinutes,
    ),
  };
}

function parseJob(
  name: string,
  value: unknown,
  hostNames: string[],
  storageNames: string[],
): JobConfig {
  const path = `jobs.${name}`;
  const job = requireRecord(value, path);
  const schedule = requireString(job.schedule, `${path}.schedule`);
  const timezone = optionalString(job.timezone, `${path}.timezone`);

  try {
    parseCron(schedule, { timezone });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${path}.schedule is invalid: ${reason}`);
  }

  const hosts = requireStringArray(job.hosts, `${path}.hosts`);
  for (const host of hosts) {
    if (!hostNames.includes(host)) {
      throw new ConfigError(`${path}.hosts references unknown host "${host}"`);
    }
  }

  const storages = requireStringArray(job.storages, `${path}.storages`);
  for (const storage of storages) {
    if (!storageNames.includes(storage)) {
      throw new ConfigError(`${path}.storages references unknown storage "${storage}"`);
    }
  }

  const config: JobConfig = {
    enabled: optionalBoolean(job.enabled, `${path}.enabled`, true),
    schedule,
    hosts,
    storages,
    tagFilter: requireStringArray(job.tagFilter, `${path}.tagFilter`),
    tagFilterExclude:
      job.tagFilterExclude === undefined
        ? []
        : requireStringArray(job.tagFilterExclude, `${path}.tagFilterExclude`, true),
    concurrency: optionalInteger(job.concurrency, `${path}.concurrency`, 1, DEFAULT_CONCURRENCY),
    snapshot: parseSnapshot(job.snapshot, `${path}.snapshot`),
  };
  if (timezone !== undefined) config.timezone = timezone;
  return config;
}

function parseJobs(
  value: unknown,
  hostNames: string[],
  storageNames: string[],
): Record<string, JobConfig> {
  const jobs = requireRecord(value, "jobs");
  const result: Record<string, JobConfig> = {};
  for (const [name, raw] of Object.entries(jobs)) {
    result[name] = parseJob(name, raw, hostNames, storageNames);
  }
  if (Object.keys(result).length === 0) {
    throw new ConfigError("Config must have at least one job");
  }
  return result;
}

/**
 * Validate a parsed config file and fill in defaults
 */
export function validateConfig(config: unknown): HyperbakConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  if (typeof config.version !== "string" || config.version.length === 0) {
    throw new ConfigError("Config must have a 'version' field");
  }

  const hosts = parseHosts(config.hosts);
  const storage = parseStorage(config.storage);
  const result: HyperbakConfig = {
    version: config.version,
    general: parseGeneral(config.general),
    hosts,
    storage,
    jobs: parseJobs(config.jobs, Object.keys(hosts), Object.keys(storage)),
  };

  const monitoring = parseMonitoring(config.monitoring);
  if (monitoring) result.monitoring = monitoring;
  return result;
}
