/**
 * Utility exports
 */

export {
  CancelledError,
  errorCode,
  errorMessage,
  IOFailure,
  SecretStoreError,
  TimeoutFailure,
} from "./errors";
export { formatBytes, formatDuration } from "./format";
export type { Logger, LogLevel } from "./logger";
export {
  createLogger,
  debug,
  error,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogLevel,
  warn,
} from "./logger";
export { expandHome, isPathWithinDir, resolveFrom } from "./path";
