/**
 * Centralized type exports for vaultsync
 */

export type {
  PipelineEvent,
  PipelineListener,
  PipelineStep,
  ResolvedProfile,
  RunConfiguration,
  RunOutcome,
  RunStatus,
  TerminalStatus,
  TimeoutProfile,
} from "./backup";
export type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  Elevation,
  LogSink,
  OutputFilter,
} from "./command";
export type {
  ElevationConfig,
  NetworkQuality,
  ProfileConfig,
  RemoteConfig,
  SecretsConfig,
  VaultsyncConfig,
} from "./config";
export { NETWORK_QUALITIES } from "./config";
