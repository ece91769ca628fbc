/**
 * One-shot vault actions outside the backup pipeline
 */

import { access, readdir, rm } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, Elevation, LogSink } from "../../types";
import { createLogger, errorMessage, isPathWithinDir } from "../../utils";
import { runCommand } from "../command/runner";
import { resolveMountPoint } from "./mount-resolver";
import { dismountCommand, mountCommand, testCommand } from "./veracrypt";

const log = createLogger("vault");

export class VaultActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultActionError";
  }
}

export interface VaultActionOptions {
  /** Absolute path of the container file */
  container: string;
  elevation?: Elevation;
  runner?: CommandRunner;
  onLog?: LogSink;
}

export interface VaultStatus {
  mounted: boolean;
  mountPoint: string | null;
}

export interface MountChange {
  action: "mount" | "unmount";
  /** Whether the mount state ended up where the action intended */
  changed: boolean;
  status: VaultStatus;
}

export interface CredentialCheck {
  ok: boolean;
  message: string;
}

export class VaultActionRunner {
  private readonly container: string;
  private readonly elevation: Elevation;
  private readonly runner: CommandRunner;
  private readonly onLog: LogSink;

  constructor(options: VaultActionOptions) {
    this.container = options.container;
    this.elevation = options.elevation ?? null;
    this.runner = options.runner ?? runCommand;
    this.onLog = options.onLog ?? ((message) => log.debug(message));
  }

  async status(): Promise<VaultStatus> {
    const mountPoint = await resolveMountPoint(this.container, {
      runner: this.runner,
      elevation: this.elevation,
    });
    return { mounted: mountPoint !== null, mountPoint };
  }

  async mount(password: string): Promise<MountChange> {
    const before = await this.status();
    if (before.mounted) {
      this.onLog(`Vault is already mounted at ${before.mountPoint}`);
      return { action: "mount", changed: false, status: before };
    }

    this.onLog("--- Mounting vault... ---");
    await this.runner(mountCommand(this.container, password), {
      elevation: this.elevation,
      onLog: this.onLog,
    });

    const after = await this.status();
    if (after.mounted) {
      this.onLog(`Mount successful. New mount point: ${after.mountPoint}`);
    } else {
      this.onLog("Mount state did not change as expected. Check the log for details.");
    }
    return { action: "mount", changed: after.mounted, status: after };
  }

  async unmount(): Promise<MountChange> {
    const before = await this.status();
    if (!before.mountPoint) {
      this.onLog("Vault is not mounted");
      return { action: "unmount", changed: false, status: before };
    }

    this.onLog("--- Unmounting vault... ---");
    await this.runner(dismountCommand(before.mountPoint), {
      elevation: this.elevation,
      onLog: this.onLog,
    });

    const after = await this.status();
    if (!after.mounted) {
      this.onLog("Unmount successful.");
    } else {
      this.onLog("Unmount state did not change as expected. Check the log for details.");
    }
    return { action: "unmount", changed: !after.mounted, status: after };
  }

  async toggle(password: string): Promise<MountChange> {
    const current = await this.status();
    return current.mounted ? this.unmount() : this.mount(password);
  }

  /**
   * Delete everything inside the mounted vault. Returns the removed entry names.
   */
  async empty(): Promise<string[]> {
    const { mountPoint } = await this.status();
    if (!mountPoint) {
      throw new VaultActionError("Vault must be mounted to be emptied.");
    }

    this.onLog("--- Emptying vault... ---");
    const removed: string[] = [];
    try {
      for (const entry of await readdir(mountPoint)) {
        const entryPath = path.join(mountPoint, entry);
        if (!isPathWithinDir(entryPath, mountPoint)) continue;
        await rm(entryPath, { recursive: true, force: true });
        removed.push(entry);
      }
    } catch (error) {
      throw new VaultActionError(`Failed to empty vault: ${errorMessage(error)}`);
    }
    this.onLog("Vault emptied successfully.");
    return removed;
  }

  /**
   * Check a container password with the encryption tool's test mode.
   */
  async testCredentials(password: string): Promise<CredentialCheck> {
    const exists = await access(this.container).then(
      () => true,
      () => false,
    );
    if (!exists) {
      return { ok: false, message: `The container was not found at: ${this.container}` };
    }

    const result = await this.runner(testCommand(this.container, password), { onLog: this.onLog });
    return result
      ? { ok: true, message: "The password is correct for this container." }
      : { ok: false, message: "Credential test failed. See the log for the tool's output." };
  }
}
