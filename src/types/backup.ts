/**
 * Backup pipeline type definitions
 */

import type { NetworkQuality } from "./config";

/**
 * A profile with every path made absolute. Never mutated during a run.
 */
export interface ResolvedProfile {
  readonly id: string;
  readonly name: string;
  /** Identity used as the secret-store key (the container path as configured) */
  readonly containerIdentity: string;
  readonly container: string;
  readonly sources: readonly string[];
}

/**
 * Snapshot of the run-relevant settings, taken when the run starts.
 */
export interface RunConfiguration {
  readonly remotePath: string | null;
  readonly remoteBackupDir: string;
  readonly networkQuality: NetworkQuality;
  readonly autoMountRemote: boolean;
  readonly requireRemote: boolean;
}

export interface TimeoutProfile {
  readonly ioTimeoutMs: number;
  readonly cmdTimeoutMs: number;
  readonly probeTimeoutMs: number;
}

export type PipelineStep =
  | "starting"
  | "checking-mount"
  | "mounting"
  | "rsyncing"
  | "unmounting"
  | "preparing-remote"
  | "copying-to-remote"
  | "verifying-hash"
  | "done";

export type RunStatus =
  | "idle"
  | "running"
  | "complete"
  | "stopped"
  | "remote-not-mounted"
  | "remote-write-failed"
  | "permission-denied"
  | "disk-full"
  | "network-error"
  | "verification-failed"
  | "general-error";

/** Statuses a finished run can end in */
export type TerminalStatus = Exclude<RunStatus, "idle" | "running">;

export interface RunOutcome {
  status: TerminalStatus;
  detail: string;
}

export type PipelineEvent =
  | { type: "log"; message: string }
  | { type: "status"; message: string }
  | { type: "step"; step: PipelineStep }
  | { type: "progress"; percent: number }
  | { type: "outcome"; outcome: RunOutcome };

export type PipelineListener = (event: PipelineEvent) => void;
