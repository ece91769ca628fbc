/**
 * sudo helpers: the passwordless rule for the encryption tool and password checks
 */

import { access } from "node:fs/promises";
import type { CommandRunner, LogSink } from "../../types";
import { runCommand } from "./runner";

export const DEFAULT_RULE_FILE = "/etc/sudoers.d/vaultsync";
export const DEFAULT_TOOL_PATH = "/usr/bin/veracrypt";

export interface RuleChange {
  ok: boolean;
  message: string;
}

export interface RuleOptions {
  ruleFile?: string;
  runner?: CommandRunner;
  onLog?: LogSink;
}

export interface InstallRuleOptions extends RuleOptions {
  /** Absolute path of the encryption tool the rule grants */
  toolPath?: string;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * sudoers line letting members of the `sudo` group run the tool as root without a password.
 */
export function passwordlessRule(toolPath: string = DEFAULT_TOOL_PATH): string {
  return `%sudo ALL=(root) NOPASSWD: ${toolPath}`;
}

/**
 * The passwordless rule is considered configured when its drop-in file exists.
 */
export async function isPasswordlessElevationConfigured(ruleFile: string = DEFAULT_RULE_FILE): Promise<boolean> {
  return access(ruleFile).then(
    () => true,
    () => false,
  );
}

/**
 * Validate a sudo password by running a no-op (`sudo -S true`).
 */
export async function verifyElevationPassword(
  password: string,
  runner: CommandRunner = runCommand,
): Promise<boolean> {
  if (!password) {
    return false;
  }
  const result = await runner(["true"], { elevation: password });
  return result !== null;
}

/**
 * Write the passwordless rule as root (`sudo -S sh -c ...`) and make it 0440,
 * the mode sudo requires for drop-in files.
 */
export async function installPasswordlessRule(
  password: string,
  options: InstallRuleOptions = {},
): Promise<RuleChange> {
  const { ruleFile = DEFAULT_RULE_FILE, toolPath = DEFAULT_TOOL_PATH, runner = runCommand, onLog } = options;
  if (!password) {
    return { ok: false, message: "A sudo password is required to create the rule." };
  }
  if (!toolPath.startsWith("/")) {
    return { ok: false, message: `The rule needs an absolute tool path, got '${toolPath}'.` };
  }

  const file = shellQuote(ruleFile);
  const script = `printf '%s\\n' ${shellQuote(passwordlessRule(toolPath))} > ${file} && chmod 0440 ${file}`;
  const result = await runner(["sh", "-c", script], { elevation: password, onLog });
  return result
    ? { ok: true, message: `Passwordless sudo rule created at ${ruleFile}.` }
    : { ok: false, message: "Could not create the sudoers file. Sudo may have rejected the password." };
}

/**
 * Delete the passwordless rule as root (`sudo -S rm -f`).
 */
export async function removePasswordlessRule(password: string, options: RuleOptions = {}): Promise<RuleChange> {
  const { ruleFile = DEFAULT_RULE_FILE, runner = runCommand, onLog } = options;
  if (!password) {
    return { ok: false, message: "A sudo password is required to remove the rule." };
  }

  const result = await runner(["rm", "-f", ruleFile], { elevation: password, onLog });
  return result
    ? { ok: true, message: `Passwordless sudo rule removed from ${ruleFile}.` }
    : { ok: false, message: "Could not remove the sudoers file. Sudo may have rejected the password." };
}
