/**
 * Configuration path resolution and profile selection
 */

import * as path from "node:path";
import type { ProfileConfig, ResolvedProfile, RunConfiguration, VaultsyncConfig } from "../types";
import { expandHome, resolveFrom } from "../utils";
import { ConfigError } from "./validator";

/**
 * Resolve `~` and relative paths in config to absolute paths. Relative paths
 * are anchored at the config file's directory.
 */
export function resolvePaths(config: VaultsyncConfig, configPath: string): VaultsyncConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const remotePath = config.remote.path?.trim();

  return {
    ...config,
    baseDir: resolveFrom(configDir, config.baseDir),
    remote: {
      ...config.remote,
      path: remotePath ? expandHome(remotePath) : null,
    },
    secrets: { path: resolveFrom(configDir, config.secrets.path) },
    elevation: { ...config.elevation, ruleFile: resolveFrom(configDir, config.elevation.ruleFile) },
  };
}

/**
 * Make a profile's container and sources absolute against `baseDir`.
 */
export function resolveProfile(config: VaultsyncConfig, profile: ProfileConfig): ResolvedProfile {
  return {
    id: profile.id,
    name: profile.name,
    containerIdentity: profile.container,
    container: resolveFrom(config.baseDir, profile.container),
    sources: profile.sources.map((source) => resolveFrom(config.baseDir, source)),
  };
}

/**
 * Look up a profile by id. Without an id the only profile is returned; with
 * several profiles and no id, `null` lets the caller ask.
 */
export function findProfile(config: VaultsyncConfig, id?: string): ProfileConfig | null {
  if (id) {
    const profile = config.profiles.find((p) => p.id === id);
    if (!profile) {
      throw new ConfigError(`Profile "${id}" not found. Available: ${config.profiles.map((p) => p.id).join(", ")}`);
    }
    return profile;
  }
  return config.profiles.length === 1 ? (config.profiles[0] ?? null) : null;
}

/**
 * Snapshot the settings a run needs.
 */
export function buildRunConfiguration(config: VaultsyncConfig): RunConfiguration {
  return {
    remotePath: config.remote.path ?? null,
    remoteBackupDir: config.remote.backupDir,
    networkQuality: config.networkQuality,
    autoMountRemote: config.remote.autoMount,
    requireRemote: config.remote.required,
  };
}
