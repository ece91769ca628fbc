/**
 * Configuration type definitions for vaultsync
 */

export type NetworkQuality = "good" | "poor" | "terrible";

export const NETWORK_QUALITIES: readonly NetworkQuality[] = ["good", "poor", "terrible"];

/**
 * One encrypted container and the directories synced into it.
 * Paths are relative to `baseDir` unless absolute.
 */
export interface ProfileConfig {
  id: string;
  name: string;
  container: string;
  sources: string[];
}

export interface RemoteConfig {
  /** Base path of the off-site mount, e.g. a gvfs FUSE path. Empty disables the remote copy. */
  path?: string | null;
  /** Subdirectory under `path` receiving the container copy */
  backupDir: string;
  /** Try `gio mount` when the remote path is not accessible */
  autoMount: boolean;
  /** Treat a missing `path` as a configuration error instead of a local-only run */
  required: boolean;
}

export interface ElevationConfig {
  /** Run the encryption tool through sudo */
  enabled: boolean;
  /** A sudoers drop-in granting passwordless access to the encryption tool */
  ruleFile: string;
}

export interface SecretsConfig {
  path: string;
}

export interface VaultsyncConfig {
  version: string;
  baseDir: string;
  networkQuality: NetworkQuality;
  remote: RemoteConfig;
  elevation: ElevationConfig;
  secrets: SecretsConfig;
  profiles: ProfileConfig[];
}
