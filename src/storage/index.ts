/**
 * Storage module exports
 */

import type { HyperbakConfig, IStorageBackend, StorageConfig } from "../types";
import type { CommandRunner } from "../utils/process";
import { defaultRunner } from "../utils/process";
import { BorgStorageBackend } from "./borg";
import { LocalStorageBackend } from "./local";

export { BaseStorageBackend } from "./base";
export { BorgStorageBackend } from "./borg";
export type { Compressor } from "./compression";
export { createCompressor, STREAM_BUFFER_SIZE } from "./compression";
export { applyFilter, matchesFilter } from "./filter";
export { LocalStorageBackend, toCompression } from "./local";

export function createStorageBackend(
  name: string,
  config: StorageConfig,
  runner: CommandRunner = defaultRunner,
): IStorageBackend {
  switch (config.type) {
    case "local":
      return new LocalStorageBackend(name, config, runner);
    case "borg":
      return new BorgStorageBackend(name, config, runner);
  }
}

/**
 * Create storage backends based on config. With `names`, only those
 * entries are built, in the given order; disabled storages are skipped.
 */
export function createStorageBackends(
  config: HyperbakConfig,
  names?: string[],
  runner: CommandRunner = defaultRunner,
): IStorageBackend[] {
  const selected = names ?? Object.keys(config.storage);
  const backends: IStorageBackend[] = [];

  for (const name of selected) {
    const storage = config.storage[name];
    if (!storage) {
      throw new Error(`Storage "${name}" is not configured`);
    }
    if (storage.enabled === false) {
      continue;
    }
    backends.push(createStorageBackend(name, storage, runner));
  }

  return backends;
}
