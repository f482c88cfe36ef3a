/**
 * Configuration module exports
 */

// Defaults
export {
  CONFIG_FILE_NAMES,
  DEFAULT_CONCURRENCY,
  DEFAULT_SNAPSHOT,
  resolveSnapshotConfig,
} from "./defaults";
// Loader
export {
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export { getEnabledJobNames, getJob, resolvePaths, resolveStorageNames } from "./resolver";
// Validator
export { validateConfig } from "./validator";
