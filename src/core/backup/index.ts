/**
 * Backup module exports
 */

export { classifyError, describeStatus, type StatusDescription } from "./classify";
export {
  BackupPipeline,
  type BackupPipelineOptions,
  type PipelineDeps,
  RSYNC,
  RSYNC_OPTIONS,
  rsyncChangedFilesFilter,
  runBackup,
} from "./orchestrator";
export { selectTimeoutProfile, TIMEOUTS_GOOD, TIMEOUTS_POOR, TIMEOUTS_TERRIBLE } from "./timeouts";
