/**
 * Cooperative cancellation on top of AbortSignal
 */

import { CancelledError } from "../utils";

export function isCancelled(signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true;
}

/**
 * Throw a {@link CancelledError} if cancellation has been requested.
 * Call at every safe stopping point; nothing is interrupted pre-emptively.
 */
export function throwIfCancelled(signal: AbortSignal | undefined, message?: string): void {
  if (isCancelled(signal)) {
    throw new CancelledError(message);
  }
}
