/**
 * Wall-clock bound for operations that may hang on a dead network mount
 */

import { createLogger, TimeoutFailure } from "../../utils";

const log = createLogger("watchdog");

export interface WatchdogOptions<T> {
  /**
   * Called with the value of an operation that settled after its bound expired,
   * e.g. to close a file handle nobody is waiting for any more.
   */
  onAbandoned?: (value: T) => void | Promise<void>;
}

/**
 * Run `fn` and wait at most `timeoutMs` for it.
 *
 * With `timeoutMs === null` the operation is awaited without a bound. On expiry
 * the returned promise rejects with a {@link TimeoutFailure}; the operation itself
 * keeps running because a blocked filesystem call cannot be interrupted safely.
 */
export async function runWithTimeout<T>(
  operation: string,
  fn: () => Promise<T>,
  timeoutMs: number | null,
  options: WatchdogOptions<T> = {},
): Promise<T> {
  if (timeoutMs === null) {
    return fn();
  }

  const pending = fn();
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      reject(new TimeoutFailure(operation, timeoutMs));
    }, timeoutMs);
  });

  // Observe the abandoned operation so a late rejection is never unhandled
  void pending.then(
    async (value) => {
      if (!expired) return;
      log.debug(`'${operation}' completed after its ${timeoutMs}ms bound`);
      if (options.onAbandoned) {
        try {
          await options.onAbandoned(value);
        } catch (error) {
          log.debug(`Cleanup of abandoned '${operation}' failed`, error);
        }
      }
    },
    (error: unknown) => {
      if (expired) {
        log.debug(`'${operation}' failed after its ${timeoutMs}ms bound`, error);
      }
    },
  );

  try {
    return await Promise.race([pending, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
