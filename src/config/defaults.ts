/**
 * Default configuration values
 */

import type { VaultsyncConfig } from "../types";
import { DEFAULT_RULE_FILE } from "../core/command/elevation";

export const DEFAULT_SECRETS_PATH = "~/.config/vaultsync/secrets.json";

// version and profiles are intentionally NOT defaulted - they must be specified by the user
export const DEFAULT_CONFIG: Omit<VaultsyncConfig, "version" | "profiles"> = {
  baseDir: "~",
  networkQuality: "good",
  remote: {
    backupDir: "Backups",
    autoMount: true,
    required: false,
  },
  elevation: {
    enabled: true,
    ruleFile: DEFAULT_RULE_FILE,
  },
  secrets: {
    path: DEFAULT_SECRETS_PATH,
  },
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced,
 * not merged.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
