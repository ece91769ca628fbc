/**
 * Shared command setup: config, profile selection, elevation and secrets
 */

import { buildRunConfiguration, findAndLoadConfig, findProfile, resolveProfile } from "../config";
import { isPasswordlessElevationConfigured, verifyElevationPassword } from "../core";
import { FileSecretStore, type SecretStore } from "../secrets";
import type { Elevation, ResolvedProfile, RunConfiguration, VaultsyncConfig } from "../types";
import { createLogger } from "../utils";
import { ui } from "./ui";

const log = createLogger("cli");

export interface CommandContext {
  config: VaultsyncConfig;
  profile: ResolvedProfile;
  run: RunConfiguration;
  secrets: SecretStore;
}

/**
 * Load config and pick a profile, prompting when several exist and none was
 * named. Resolves `null` when the user cancels the prompt.
 */
export async function loadCommandContext(configPath?: string, profileId?: string): Promise<CommandContext | null> {
  const config = await findAndLoadConfig(configPath);

  let selected = findProfile(config, profileId);
  if (!selected) {
    const choice = await ui.select<{ value: string; label: string; hint: string }[], string>({
      message: "Select a profile",
      options: config.profiles.map((profile) => ({
        value: profile.id,
        label: profile.name,
        hint: profile.container,
      })),
    });
    if (ui.isCancel(choice)) {
      return null;
    }
    selected = findProfile(config, choice);
  }
  if (!selected) {
    return null;
  }

  const profile = resolveProfile(config, selected);
  log.debug(`Using profile ${profile.id}`, profile);

  return {
    config,
    profile,
    run: buildRunConfiguration(config),
    secrets: new FileSecretStore(config.secrets.path),
  };
}

/**
 * Decide how the encryption tool gets root. `undefined` means the user
 * cancelled or gave a wrong password and the command should stop.
 */
export async function resolveElevation(config: VaultsyncConfig): Promise<Elevation | undefined> {
  if (!config.elevation.enabled) {
    return null;
  }

  if (await isPasswordlessElevationConfigured(config.elevation.ruleFile)) {
    log.debug(`Passwordless sudo rule found at ${config.elevation.ruleFile}`);
    return "";
  }

  const entered = await ui.password({
    message: "Administrator password (for sudo)",
    validate: (value) => (value ? undefined : "Password is required"),
  });
  if (ui.isCancel(entered)) {
    return undefined;
  }

  if (!(await verifyElevationPassword(entered))) {
    ui.error("The administrator password is incorrect.");
    return undefined;
  }
  return entered;
}
