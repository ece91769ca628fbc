/**
 * Backup pipeline: mount, sync, unmount, copy off-site, verify
 */

import { access } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import * as path from "node:path";
import type { SecretStore } from "../../secrets";
import type {
  CommandRunner,
  Elevation,
  PipelineEvent,
  PipelineListener,
  PipelineStep,
  ResolvedProfile,
  RunConfiguration,
  RunOutcome,
  TerminalStatus,
  TimeoutProfile,
} from "../../types";
import { CancelledError, createLogger, errorMessage } from "../../utils";
import { isCancelled, throwIfCancelled } from "../cancellation";
import { isCommandAvailable, runCommand } from "../command/runner";
import { copyToRemote, DEFAULT_CHUNK_SIZE, digestLocalFile, digestRemoteFile, removeRemoteFile } from "../io/integrity";
import {
  attemptRemoteMount,
  ensureRemoteDirectory,
  probeRemotePath,
  type RemoteOpsContext,
  waitForRemote,
} from "../remote/probe";
import { resolveMountPoint } from "../vault/mount-resolver";
import { dismountCommand, mountCommand, VERACRYPT } from "../vault/veracrypt";
import { classifyError } from "./classify";
import { selectTimeoutProfile } from "./timeouts";

const log = createLogger("pipeline");

export const RSYNC = "rsync";
// itemize-changes instead of verbose so only changed files are reported
export const RSYNC_OPTIONS = "-azhi";

/**
 * Keep only rsync itemize lines for transferred files (`>f+++++++++ name`).
 */
export function rsyncChangedFilesFilter(line: string): string | null {
  return line.startsWith(">") ? line : null;
}

/**
 * Collaborators the pipeline reaches the outside world through.
 */
export interface PipelineDeps {
  runner: CommandRunner;
  isCommandAvailable: (command: string) => Promise<boolean>;
  copy: typeof copyToRemote;
  digestLocal: typeof digestLocalFile;
  digestRemote: typeof digestRemoteFile;
  delay: (ms: number) => Promise<void>;
  chunkSize: number;
}

const DEFAULT_DEPS: PipelineDeps = {
  runner: runCommand,
  isCommandAvailable,
  copy: copyToRemote,
  digestLocal: digestLocalFile,
  digestRemote: digestRemoteFile,
  delay: (ms) => sleep(ms),
  chunkSize: DEFAULT_CHUNK_SIZE,
};

export interface BackupPipelineOptions {
  profile: ResolvedProfile;
  run: RunConfiguration;
  secrets: SecretStore;
  /** sudo mode for the encryption tool; `null` runs it unelevated */
  elevation?: Elevation;
  /** Cancellation requested by the caller; observed at safe points only */
  signal?: AbortSignal;
  onEvent?: PipelineListener;
  deps?: Partial<PipelineDeps>;
}

/**
 * A failure the pipeline recognised itself, with its final status already decided.
 */
class StepFailure extends Error {
  constructor(
    readonly status: TerminalStatus,
    detail: string,
  ) {
    super(detail);
    this.name = "StepFailure";
  }
}

function fail(status: TerminalStatus, detail: string): never {
  throw new StepFailure(status, detail);
}

interface MountState {
  /** Mount point considered open; cleared once this run unmounts it */
  mountPoint: string | null;
  didMountMyself: boolean;
}

export class BackupPipeline {
  readonly timeouts: TimeoutProfile;

  private readonly profile: ResolvedProfile;
  private readonly config: RunConfiguration;
  private readonly secrets: SecretStore;
  private readonly elevation: Elevation;
  private readonly signal: AbortSignal | undefined;
  private readonly listener: PipelineListener | undefined;
  private readonly deps: PipelineDeps;
  private currentStep: PipelineStep | null = null;
  private started = false;

  constructor(options: BackupPipelineOptions) {
    this.profile = options.profile;
    this.config = options.run;
    this.secrets = options.secrets;
    this.elevation = options.elevation ?? null;
    this.signal = options.signal;
    this.listener = options.onEvent;
    this.deps = { ...DEFAULT_DEPS, ...options.deps };
    this.timeouts = selectTimeoutProfile(this.config.networkQuality);
  }

  get step(): PipelineStep | null {
    return this.currentStep;
  }

  /**
   * Execute the pipeline once. Always resolves with exactly one outcome; the
   * safety unmount runs whatever happened before it.
   */
  async run(): Promise<RunOutcome> {
    if (this.started) {
      throw new Error("A pipeline instance can only run once");
    }
    this.started = true;

    const state: MountState = { mountPoint: null, didMountMyself: false };
    let cancelled = false;
    let failure: RunOutcome | null = null;

    try {
      await this.execute(state);
    } catch (error) {
      if (error instanceof CancelledError || isCancelled(this.signal)) {
        cancelled = true;
        this.log(`--- ${error instanceof CancelledError ? error.message : "Backup cancelled by user."} ---`);
      } else if (error instanceof StepFailure) {
        failure = { status: error.status, detail: error.message };
      } else {
        failure = { status: classifyError(error), detail: errorMessage(error) };
        log.debug(`Step ${this.currentStep ?? "?"} failed`, error);
      }
    }

    const outcome: RunOutcome = cancelled
      ? { status: "stopped", detail: "" }
      : (failure ?? { status: "complete", detail: "" });

    // a mount that was already there before the run is left alone on success
    if (state.mountPoint && (state.didMountMyself || outcome.status !== "complete")) {
      this.log("Ensuring vault is unmounted after an issue...");
      await this.safetyUnmount(state.mountPoint);
    }

    this.emit({ type: "outcome", outcome });
    return outcome;
  }

  private async execute(state: MountState): Promise<void> {
    this.setStep("starting");
    await this.checkPrerequisites();
    const password = await this.loadPassword();

    this.setStep("checking-mount");
    this.status("Step 1: Checking vault status...");
    throwIfCancelled(this.signal);
    const existing = await resolveMountPoint(this.profile.container, {
      runner: this.deps.runner,
      elevation: this.elevation,
      onLog: (message) => this.log(message),
    });

    let mountPoint: string;
    if (existing) {
      mountPoint = existing;
      this.status(`Vault already mounted at ${mountPoint}. Skipping mount step.`);
    } else {
      mountPoint = await this.mountContainer(state, password);
    }
    state.mountPoint = mountPoint;

    await this.syncSources(mountPoint);

    if (state.didMountMyself) {
      this.setStep("unmounting");
      this.status("Step 3: Unmounting vault...");
      // failure is not fatal; a later dismount reconciles the state
      await this.deps.runner(dismountCommand(mountPoint), {
        elevation: this.elevation,
        onLog: (message) => this.log(message),
      });
      state.mountPoint = null;
    }

    this.setStep("preparing-remote");
    this.status("Step 4: Starting off-site copy...");
    const remotePath = this.config.remotePath;
    if (!remotePath) {
      if (this.config.requireRemote) {
        fail("general-error", "Remote path is not configured.");
      }
      this.log("Remote path not configured. Skipping off-site copy.");
      this.setStep("done");
      return;
    }

    const destDir = path.join(remotePath, this.config.remoteBackupDir);
    await this.prepareRemote(remotePath, destDir);

    this.setStep("copying-to-remote");
    const destFile = path.join(destDir, path.basename(this.profile.container));
    await this.deps.copy(this.profile.container, destFile, this.guardedOptions());

    this.setStep("verifying-hash");
    await this.verify(destFile);

    this.setStep("done");
    this.status("Backup complete.");
  }

  private async checkPrerequisites(): Promise<void> {
    const required = [VERACRYPT, RSYNC];
    if (this.elevation !== null) {
      required.push("sudo");
    }
    for (const tool of required) {
      if (!(await this.deps.isCommandAvailable(tool))) {
        fail("general-error", `'${tool}' command not found.`);
      }
    }
  }

  private async loadPassword(): Promise<string> {
    this.status("Retrieving credentials...");
    let password: string | null;
    try {
      password = await this.secrets.get(this.profile.containerIdentity);
    } catch (error) {
      fail("general-error", `Could not retrieve the container password: ${errorMessage(error)}`);
    }
    if (!password) {
      fail("general-error", "No password stored for this container. Save it with 'vaultsync password'.");
    }
    return password;
  }

  private async mountContainer(state: MountState, password: string): Promise<string> {
    const container = this.profile.container;
    const onLog = (message: string) => this.log(message);

    this.setStep("mounting");
    this.status("Step 1: Mounting vault...");
    const exists = await access(container).then(
      () => true,
      () => false,
    );
    if (!exists) {
      fail("general-error", `Container not found at '${container}'.`);
    }

    throwIfCancelled(this.signal);
    const mounted = await this.deps.runner(mountCommand(container, password), {
      elevation: this.elevation,
      onLog,
    });
    if (!mounted) {
      fail("general-error", "Failed to mount the container.");
    }

    state.didMountMyself = true;
    const mountPoint = await resolveMountPoint(container, {
      runner: this.deps.runner,
      elevation: this.elevation,
      onLog,
    });
    if (!mountPoint) {
      // mounted somewhere we cannot see; dismount by container path, result ignored
      await this.deps.runner(dismountCommand(container), { elevation: this.elevation, onLog });
      fail("general-error", "Could not determine mount point after mounting.");
    }
    return mountPoint;
  }

  private async syncSources(mountPoint: string): Promise<void> {
    this.setStep("rsyncing");
    this.status(`Vault is ready at: ${mountPoint}`);
    this.status("Step 2: Backing up directories with rsync...");

    for (const source of this.profile.sources) {
      const exists = await access(source).then(
        () => true,
        () => false,
      );
      if (!exists) {
        this.log(`Warning: Source directory not found, skipping: ${source}`);
        continue;
      }
      throwIfCancelled(this.signal);

      this.log(`\nBacking up '${path.basename(source)}'...`);
      const result = await this.deps.runner([RSYNC, RSYNC_OPTIONS, source, mountPoint], {
        onLog: (message) => this.log(message),
        outputFilter: rsyncChangedFilesFilter,
      });
      if (!result) {
        this.log(`ERROR: Failed to back up ${source}. Continuing...`);
      }
    }

    this.status("Local backup to vault complete.");
  }

  private async prepareRemote(remotePath: string, destDir: string): Promise<void> {
    const ctx: RemoteOpsContext = {
      runner: this.deps.runner,
      timeouts: this.timeouts,
      onLog: (message) => this.log(message),
      onStatus: (message) => this.status(message),
      signal: this.signal,
      delay: this.deps.delay,
    };

    this.status("Verifying remote is mounted...");
    throwIfCancelled(this.signal);

    this.log(`Probing remote base path: ${remotePath}`);
    let accessible = await probeRemotePath(remotePath, ctx);

    if (!accessible && this.config.autoMountRemote && (await attemptRemoteMount(remotePath, ctx))) {
      this.log("Auto-mount successful, waiting for filesystem to become responsive...");
      accessible = await waitForRemote(remotePath, ctx);
    }

    if (!accessible) {
      fail("remote-not-mounted", `Remote path is not accessible or not responding: ${remotePath}`);
    }

    const created = await ensureRemoteDirectory(destDir, ctx);
    if (!created.ok) {
      fail("remote-write-failed", created.reason);
    }
  }

  private async verify(destFile: string): Promise<void> {
    const sourceDigest = await this.deps.digestLocal(this.profile.container, {
      signal: this.signal,
      chunkSize: this.deps.chunkSize,
      onStatus: (message) => this.status(message),
      onLog: (message) => this.log(message),
    });
    const destDigest = await this.deps.digestRemote(destFile, this.guardedOptions());
    this.emit({ type: "progress", percent: 0 });

    if (sourceDigest && destDigest && sourceDigest === destDigest) {
      this.log(`SHA-256 verified: ${sourceDigest}`);
      return;
    }

    try {
      await removeRemoteFile(destFile, this.timeouts.ioTimeoutMs);
      this.log("The corrupt destination file has been deleted.");
    } catch (error) {
      this.log(`ERROR: Could not delete corrupt file: ${errorMessage(error)}`);
    }
    fail("verification-failed", "The SHA-256 digests of the source and destination files do not match.");
  }

  private async safetyUnmount(mountPoint: string): Promise<void> {
    try {
      const result = await this.deps.runner(dismountCommand(mountPoint), {
        elevation: this.elevation,
        onLog: (message) => this.log(message),
      });
      if (!result) {
        this.log(`Warning: safety unmount of ${mountPoint} failed`);
      }
    } catch (error) {
      this.log(`Warning: safety unmount of ${mountPoint} failed: ${errorMessage(error)}`);
    }
  }

  private guardedOptions() {
    return {
      signal: this.signal,
      ioTimeoutMs: this.timeouts.ioTimeoutMs,
      chunkSize: this.deps.chunkSize,
      onStatus: (message: string) => this.status(message),
      onProgress: (percent: number) => this.emit({ type: "progress", percent }),
      onLog: (message: string) => this.log(message),
    };
  }

  private setStep(step: PipelineStep): void {
    this.currentStep = step;
    log.debug(`Step: ${step}`);
    this.emit({ type: "step", step });
  }

  private status(message: string): void {
    this.emit({ type: "status", message });
  }

  private log(message: string): void {
    this.emit({ type: "log", message });
  }

  private emit(event: PipelineEvent): void {
    this.listener?.(event);
  }
}

/**
 * Convenience wrapper: build a pipeline and run it.
 */
export async function runBackup(options: BackupPipelineOptions): Promise<RunOutcome> {
  return new BackupPipeline(options).run();
}
