/**
 * Remote mount probing, auto-mount and destination preparation.
 *
 * Every probe is an external command run under the watchdog, never a direct
 * filesystem call on the mount.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { CommandRunner, LogSink, TimeoutProfile } from "../../types";
import { errorMessage, TimeoutFailure } from "../../utils";
import { throwIfCancelled } from "../cancellation";
import { runWithTimeout } from "../io/watchdog";
import { parseRemoteAccount } from "./account";

export const MOUNT_TOOL = "gio";
export const READY_POLL_ATTEMPTS = 5;
export const READY_POLL_DELAY_MS = 1000;

export interface RemoteOpsContext {
  runner: CommandRunner;
  timeouts: TimeoutProfile;
  onLog: LogSink;
  onStatus?: (message: string) => void;
  signal?: AbortSignal;
  /** Overridable for tests */
  delay?: (ms: number) => Promise<void>;
}

export type DirectoryResult = { ok: true } | { ok: false; reason: string };

/**
 * Lightweight existence test of the remote base path (`test -d`), bounded by
 * the probe timeout. A timeout counts as "not accessible".
 */
export async function probeRemotePath(remotePath: string, ctx: RemoteOpsContext): Promise<boolean> {
  try {
    const result = await runWithTimeout(
      `test -d ${remotePath}`,
      () => ctx.runner(["test", "-d", remotePath]),
      ctx.timeouts.probeTimeoutMs,
    );
    return result !== null;
  } catch (error) {
    if (error instanceof TimeoutFailure) {
      ctx.onLog(`Probe of ${remotePath} is not responding: ${error.message}`);
      return false;
    }
    throw error;
  }
}

/**
 * Try to mount the remote with the desktop mount helper. Returns whether the
 * mount command itself succeeded; readiness is polled separately.
 */
export async function attemptRemoteMount(remotePath: string, ctx: RemoteOpsContext): Promise<boolean> {
  throwIfCancelled(ctx.signal);

  const parsed = parseRemoteAccount(remotePath);
  if (!parsed.ok) {
    ctx.onLog(`Skipping auto-mount: ${parsed.reason}`);
    return false;
  }

  ctx.onLog(`Attempting to mount remote for ${parsed.account}...`);
  ctx.onStatus?.("Attempting to mount remote...");

  try {
    const result = await runWithTimeout(
      `${MOUNT_TOOL} mount`,
      () => ctx.runner([MOUNT_TOOL, "mount", parsed.uri], { onLog: ctx.onLog }),
      ctx.timeouts.cmdTimeoutMs,
    );
    if (!result) {
      ctx.onLog("Remote mount failed");
      return false;
    }
    ctx.onLog("Remote mount successful");
    return true;
  } catch (error) {
    if (error instanceof TimeoutFailure) {
      ctx.onLog("Remote mount attempt timed out");
      return false;
    }
    ctx.onLog(`Error attempting to mount remote: ${errorMessage(error)}`);
    return false;
  }
}

/**
 * Poll the remote path after a mount until it answers, with a fixed delay
 * between attempts and none after the last.
 */
export async function waitForRemote(
  remotePath: string,
  ctx: RemoteOpsContext,
  attempts: number = READY_POLL_ATTEMPTS,
  delayMs: number = READY_POLL_DELAY_MS,
): Promise<boolean> {
  const delay = ctx.delay ?? ((ms: number) => sleep(ms));
  for (let i = 0; i < attempts; i++) {
    throwIfCancelled(ctx.signal);
    if (await probeRemotePath(remotePath, ctx)) {
      ctx.onLog("Remote path now accessible after auto-mount.");
      return true;
    }
    if (i < attempts - 1) {
      ctx.onLog(`Path not ready yet, retrying in ${delayMs / 1000} second(s)... (${i + 1}/${attempts - 1})`);
      await delay(delayMs);
    }
  }
  return false;
}

/**
 * `mkdir -p` on the remote, bounded by the command timeout.
 */
export async function ensureRemoteDirectory(dirPath: string, ctx: RemoteOpsContext): Promise<DirectoryResult> {
  ctx.onLog(`Ensuring backup directory exists: ${dirPath}`);
  try {
    const result = await runWithTimeout(
      `mkdir -p ${dirPath}`,
      () => ctx.runner(["mkdir", "-p", dirPath], { onLog: ctx.onLog }),
      ctx.timeouts.cmdTimeoutMs,
    );
    return result ? { ok: true } : { ok: false, reason: `Could not create remote directory: ${dirPath}` };
  } catch (error) {
    if (error instanceof TimeoutFailure) {
      return { ok: false, reason: `Could not create remote directory: ${dirPath}\nError: ${error.message}` };
    }
    throw error;
  }
}
