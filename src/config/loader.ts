/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { HyperbakConfig } from "../types";
import { CONFIG_FILE_NAMES, SYSTEM_CONFIG_DIR } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<HyperbakConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf8");
  const ext = path.extname(absolutePath).toLowerCase();

  const parsed = parseConfigContent(content, ext);
  const config = validateConfig(parsed);

  return resolvePaths(config, absolutePath);
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function isFile(filePath: string): boolean {
  return existsSync(filePath) && statSync(filePath).isFile();
}

/**
 * Find a config file in the given directory, then in /etc/hyperbak
 */
export function findConfigFile(
  startDir: string = process.cwd(),
  searchDirs: string[] = [startDir, SYSTEM_CONFIG_DIR],
): string | null {
  for (const dir of searchDirs) {
    for (const name of CONFIG_FILE_NAMES) {
      const configPath = path.join(dir, name);
      if (isFile(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<HyperbakConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      `No config file found. Create hyperbak.config.yaml or specify --config path`,
    );
  }

  return loadConfig(found);
}
