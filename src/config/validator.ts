/**
 * Configuration validation
 */

import * as path from "node:path";
import { NETWORK_QUALITIES, type VaultsyncConfig } from "../types";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function requireSection(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = c[name];
  if (!isPlainObject(section)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return section;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function validateProfile(profile: unknown, index: number, seen: Set<string>): void {
  if (!isPlainObject(profile)) {
    throw new ConfigError(`profiles[${index}] must be an object`);
  }
  if (!isNonEmptyString(profile.id)) {
    throw new ConfigError(`profiles[${index}].id must be a non-empty string`);
  }
  if (seen.has(profile.id)) {
    throw new ConfigError(`profiles[${index}].id "${profile.id}" is used more than once`);
  }
  seen.add(profile.id);

  if (!isNonEmptyString(profile.name)) {
    throw new ConfigError(`profiles.${profile.id}.name must be a non-empty string`);
  }
  if (!isNonEmptyString(profile.container)) {
    throw new ConfigError(`profiles.${profile.id}.container must be a non-empty string`);
  }
  if (!Array.isArray(profile.sources)) {
    throw new ConfigError(`profiles.${profile.id}.sources must be an array of paths`);
  }
  for (const source of profile.sources) {
    if (!isNonEmptyString(source)) {
      throw new ConfigError(`profiles.${profile.id}.sources must contain only non-empty strings`);
    }
  }
}

const validators: Validator[] = [
  (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  (c) => {
    if (!isNonEmptyString(c.baseDir)) {
      throw new ConfigError("baseDir must be a non-empty string");
    }
  },

  (c) => {
    const quality = c.networkQuality;
    if (!NETWORK_QUALITIES.some((q) => q === quality)) {
      throw new ConfigError(`networkQuality must be one of: ${NETWORK_QUALITIES.join(", ")}`);
    }
  },

  (c) => {
    const remote = requireSection(c, "remote");
    if (remote.path !== undefined && remote.path !== null && typeof remote.path !== "string") {
      throw new ConfigError("remote.path must be a string");
    }
    if (!isNonEmptyString(remote.backupDir)) {
      throw new ConfigError("remote.backupDir must be a non-empty string");
    }
    const normalized = path.normalize(remote.backupDir);
    if (path.isAbsolute(normalized) || normalized === ".." || normalized.startsWith(`..${path.sep}`)) {
      throw new ConfigError("remote.backupDir must be a relative path inside remote.path");
    }
    if (typeof remote.autoMount !== "boolean") {
      throw new ConfigError("remote.autoMount must be a boolean");
    }
    if (typeof remote.required !== "boolean") {
      throw new ConfigError("remote.required must be a boolean");
    }
    if (remote.required && !isNonEmptyString(remote.path)) {
      throw new ConfigError("remote.path must be set when remote.required is true");
    }
  },

  (c) => {
    const elevation = requireSection(c, "elevation");
    if (typeof elevation.enabled !== "boolean") {
      throw new ConfigError("elevation.enabled must be a boolean");
    }
    if (!isNonEmptyString(elevation.ruleFile)) {
      throw new ConfigError("elevation.ruleFile must be a non-empty string");
    }
  },

  (c) => {
    const secrets = requireSection(c, "secrets");
    if (!isNonEmptyString(secrets.path)) {
      throw new ConfigError("secrets.path must be a non-empty string");
    }
  },

  (c) => {
    if (!Array.isArray(c.profiles) || c.profiles.length === 0) {
      throw new ConfigError("Config must have at least one entry in 'profiles'");
    }
    const seen = new Set<string>();
    c.profiles.forEach((profile, index) => validateProfile(profile, index, seen));
  },
];

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is VaultsyncConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of validators) {
    validate(config);
  }
}
