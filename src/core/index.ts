/**
 * Core module exports
 */

// Backup
export {
  BackupPipeline,
  type BackupPipelineOptions,
  classifyError,
  describeStatus,
  type PipelineDeps,
  runBackup,
  selectTimeoutProfile,
  type StatusDescription,
} from "./backup";

// Cancellation
export { isCancelled, throwIfCancelled } from "./cancellation";

// Commands
export {
  DEFAULT_RULE_FILE,
  DEFAULT_TOOL_PATH,
  installPasswordlessRule,
  isPasswordlessElevationConfigured,
  passwordlessRule,
  removePasswordlessRule,
  type RuleChange,
  verifyElevationPassword,
} from "./command/elevation";
export {
  buildElevatedCommand,
  findExecutable,
  isCommandAvailable,
  redactCommand,
  runCommand,
} from "./command/runner";

// I/O
export { copyToRemote, digestLocalFile, digestRemoteFile, removeRemoteFile } from "./io/integrity";
export { runWithTimeout } from "./io/watchdog";

// Remote
export { parseRemoteAccount, type RemoteAccount } from "./remote/account";

// Vault
export {
  type CredentialCheck,
  type MountChange,
  VaultActionError,
  VaultActionRunner,
  type VaultStatus,
} from "./vault/actions";
export { resolveMountPoint } from "./vault/mount-resolver";
export { VERACRYPT } from "./vault/veracrypt";
