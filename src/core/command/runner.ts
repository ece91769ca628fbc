/**
 * External command execution with optional sudo elevation
 */

import { spawn } from "node:child_process";
import { constants as fsConstants } from "node:fs";
import { access } from "node:fs/promises";
import * as path from "node:path";
import type { CommandOptions, CommandResult, Elevation } from "../../types";
import { createLogger, errorMessage } from "../../utils";

const log = createLogger("command");

export const PASSWORD_FLAG = "--password";
export const PASSWORD_MASK = "'********'";

/**
 * Build a log-safe string from an argv, masking the value that follows `--password`.
 */
export function redactCommand(argv: readonly string[]): string {
  const safe = [...argv];
  const pwIdx = safe.indexOf(PASSWORD_FLAG);
  if (pwIdx !== -1 && pwIdx + 1 < safe.length) {
    safe[pwIdx + 1] = PASSWORD_MASK;
  }
  return safe.join(" ");
}

/**
 * Prefix an argv with sudo according to the elevation mode.
 */
export function buildElevatedCommand(argv: readonly string[], elevation: Elevation | undefined): string[] {
  if (elevation === null || elevation === undefined) {
    return [...argv];
  }
  // -n fails fast when the passwordless rule is missing instead of prompting on the tty
  return elevation === "" ? ["sudo", "-n", ...argv] : ["sudo", "-S", ...argv];
}

interface SpawnOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function spawnAndCapture(argv: readonly string[], input: string | null): Promise<SpawnOutcome> {
  const [file, ...args] = argv;
  if (file === undefined) {
    return Promise.reject(new Error("Empty command"));
  }

  return new Promise((resolve, reject) => {
    const child = spawn(file, args, { stdio: ["pipe", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.once("error", reject);
    child.once("close", (code, signal) => {
      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });

    // EPIPE when the process exits without reading stdin is not interesting
    child.stdin.on("error", (error) => log.debug(`stdin closed early for ${file}`, error));
    if (input !== null) {
      child.stdin.write(`${input}\n`);
    }
    child.stdin.end();
  });
}

function applyFilter(stdout: string, filter: CommandOptions["outputFilter"]): string {
  const trimmed = stdout.trim();
  if (!filter) {
    return trimmed;
  }
  const kept: string[] = [];
  for (const line of trimmed.split("\n")) {
    if (!line) continue;
    const processed = filter(line);
    if (processed) {
      kept.push(processed);
    }
  }
  return kept.join("\n");
}

/**
 * Run an external command, capturing its output.
 *
 * Resolves `null` when the command exits non-zero or cannot be started; the
 * details go to `onLog`. Secrets never reach the log: sudo passwords travel on
 * stdin and `--password` values are masked.
 */
export async function runCommand(
  argv: readonly string[],
  options: CommandOptions = {},
): Promise<CommandResult | null> {
  const { elevation, onLog, outputFilter } = options;
  const fullCommand = buildElevatedCommand(argv, elevation);
  const safeCommand = redactCommand(fullCommand);
  const input = elevation ? elevation : null;

  onLog?.(`-> Running: ${safeCommand}`);
  log.debug(`Running: ${safeCommand}`);

  let outcome: SpawnOutcome;
  try {
    outcome = await spawnAndCapture(fullCommand, input);
  } catch (error) {
    onLog?.(`ERROR: Command not found or failed to execute: ${errorMessage(error)}`);
    log.debug(`Failed to start ${safeCommand}`, error);
    return null;
  }

  if (outcome.exitCode !== 0) {
    onLog?.(
      `ERROR executing command: ${safeCommand}\n` +
        `Return code: ${outcome.exitCode}\n` +
        `Output:\n${outcome.stdout.trim()}\n` +
        `Error Output:\n${outcome.stderr.trim()}`,
    );
    return null;
  }

  if (onLog && outcome.stdout) {
    const output = applyFilter(outcome.stdout, outputFilter);
    if (output) {
      onLog(output);
    }
  }

  // Some tools report statistics on stderr even when they succeed
  if (onLog && outcome.stderr.trim()) {
    onLog(`Info (stderr):\n${outcome.stderr.trim()}`);
  }

  return outcome;
}

/**
 * Locate an executable on PATH (or at the given path). Resolves its path, or
 * `null` when nothing executable is found.
 */
export async function findExecutable(command: string, envPath = process.env.PATH ?? ""): Promise<string | null> {
  const normalized = command.trim();
  if (normalized.length === 0) {
    return null;
  }

  const candidates = normalized.includes(path.sep)
    ? [normalized]
    : envPath
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, normalized));

  for (const candidate of candidates) {
    const executable = await access(candidate, fsConstants.X_OK).then(
      () => true,
      () => false,
    );
    if (executable) {
      return candidate;
    }
  }
  return null;
}

export async function isCommandAvailable(command: string, envPath = process.env.PATH ?? ""): Promise<boolean> {
  return (await findExecutable(command, envPath)) !== null;
}
