/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { VaultsyncConfig } from "../types";
import { errorCode, errorMessage } from "../utils";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_NAMES = ["vaultsync.config.yaml", "vaultsync.config.yml", "vaultsync.config.json"];

/**
 * Directory searched after the working directory
 */
export function userConfigDir(home: string = os.homedir()): string {
  return path.join(home, ".config", "vaultsync");
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<VaultsyncConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Could not read config file ${absolutePath}: ${errorMessage(error)}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  return parseConfig(content, ext, absolutePath);
}

/**
 * Parse, merge with defaults, validate and resolve config text. `configPath`
 * anchors relative paths.
 */
export function parseConfig(content: string, ext: string, configPath: string): VaultsyncConfig {
  const parsed = parseConfigContent(content, ext);
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge(DEFAULT_CONFIG, parsed);
  validateConfig(merged);

  return resolvePaths(merged, configPath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function isFile(candidate: string): boolean {
  return fs.statSync(candidate, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Find a config file in the given directory or the user config directory
 */
export function findConfigFile(startDir: string = process.cwd(), home: string = os.homedir()): string | null {
  const searchDirs = [startDir, userConfigDir(home)];

  for (const dir of searchDirs) {
    for (const name of CONFIG_NAMES) {
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
export async function findAndLoadConfig(configPath?: string): Promise<VaultsyncConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      `No config file found. Create vaultsync.config.yaml (here or in ${userConfigDir()}) or specify --config path`,
    );
  }

  return loadConfig(found);
}
