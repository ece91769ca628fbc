/**
 * Typed failures raised by the I/O, command and configuration layers.
 * The pipeline classifies these structurally instead of matching messages.
 */

export class TimeoutFailure extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`Operation '${operation}' timed out after ${formatSeconds(timeoutMs)}`);
    this.name = "TimeoutFailure";
  }
}

export class IOFailure extends Error {
  readonly code: string | undefined;

  constructor(
    message: string,
    readonly path: string,
    readonly remote: boolean,
    cause?: unknown,
  ) {
    super(cause === undefined ? message : `${message}: ${errorMessage(cause)}`, { cause });
    this.name = "IOFailure";
    this.code = errorCode(cause);
  }

  /** True when the underlying cause was a watchdog timeout or an OS-level timeout. */
  get timedOut(): boolean {
    return this.cause instanceof TimeoutFailure || this.code === "ETIMEDOUT";
  }
}

export class CancelledError extends Error {
  constructor(message = "Backup cancelled by user.") {
    super(message);
    this.name = "CancelledError";
  }
}

export class SecretStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SecretStoreError";
  }
}

/**
 * Extract a Node.js system error code (`ENOENT`, `EACCES`, ...) if present.
 */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(2)}s`;
}
