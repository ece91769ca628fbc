/**
 * Map failures onto the run status taxonomy
 */

import type { RunStatus, TerminalStatus } from "../../types";
import { CancelledError, errorCode, IOFailure, TimeoutFailure } from "../../utils";

const PERMISSION_CODES = new Set(["EACCES", "EPERM"]);
const DISK_FULL_CODES = new Set(["ENOSPC", "EDQUOT"]);
const NETWORK_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ENOTCONN",
]);

/**
 * Classify an error thrown out of a pipeline step. Order matters: cancellation,
 * then remote hangs, then other remote failures, then local causes.
 */
export function classifyError(error: unknown): TerminalStatus {
  if (error instanceof CancelledError) {
    return "stopped";
  }

  if (error instanceof IOFailure && error.remote) {
    return error.timedOut ? "remote-not-mounted" : "remote-write-failed";
  }

  const code = error instanceof IOFailure ? error.code : errorCode(error);
  if (code !== undefined && PERMISSION_CODES.has(code)) {
    return "permission-denied";
  }
  if (code !== undefined && DISK_FULL_CODES.has(code)) {
    return "disk-full";
  }
  if (error instanceof TimeoutFailure) {
    return "network-error";
  }
  if (error instanceof IOFailure && error.cause instanceof TimeoutFailure) {
    return "network-error";
  }
  if (code !== undefined && NETWORK_CODES.has(code)) {
    return "network-error";
  }

  return "general-error";
}

export interface StatusDescription {
  title: string;
  detail: string;
  isError: boolean;
}

export function describeStatus(status: RunStatus, detail = ""): StatusDescription {
  switch (status) {
    case "idle":
      return { title: "IDLE", detail: detail || "Ready to back up.", isError: false };
    case "running":
      return { title: "RUNNING", detail: "Backup in progress...", isError: false };
    case "complete":
      return { title: "COMPLETE", detail: "All operations complete.", isError: false };
    case "stopped":
      return { title: "STOPPED", detail: "Backup was stopped by user request.", isError: false };
    case "remote-not-mounted":
      return {
        title: "Error: Remote Not Mounted?",
        detail: "The remote path is not responding. Check that it is mounted.",
        isError: true,
      };
    case "remote-write-failed":
      return {
        title: "Error: Failed to write to remote",
        detail: "A file operation failed. Check permissions and path in the log.",
        isError: true,
      };
    case "permission-denied":
      return {
        title: "Error: Permission Denied",
        detail: "Access was denied. Check file and folder permissions.",
        isError: true,
      };
    case "disk-full":
      return {
        title: "Error: Disk Full",
        detail: "Insufficient disk space to complete the operation.",
        isError: true,
      };
    case "network-error":
      return {
        title: "Error: Network Issue",
        detail: "Network connection failed. Check your connection.",
        isError: true,
      };
    case "verification-failed":
      return {
        title: "Error: Verification Failed",
        detail: "The remote copy was corrupt and has been removed. The next run will copy it again.",
        isError: true,
      };
    case "general-error":
      return {
        title: "ERROR",
        detail: detail ? `CRITICAL ERROR: ${detail}` : "An unexpected error occurred.",
        isError: true,
      };
  }
}
