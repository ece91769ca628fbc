/**
 * Resolve where a container is mounted from the encryption tool's listing
 */

import { stat } from "node:fs/promises";
import type { CommandRunner, Elevation, LogSink } from "../../types";
import { runCommand } from "../command/runner";
import { listCommand } from "./veracrypt";

export interface ResolveMountOptions {
  runner?: CommandRunner;
  elevation?: Elevation;
  onLog?: LogSink;
}

async function isDirectory(candidate: string): Promise<boolean> {
  return stat(candidate).then(
    (stats) => stats.isDirectory(),
    () => false,
  );
}

/**
 * Pick the mount point for `containerPath` out of `--list` output.
 *
 * A line such as `1: /home/u/vault.hc /dev/mapper/veracrypt1 /media/veracrypt1`
 * matches when the container path follows the slot number as a whole token, so
 * `vault.hc` never matches `vault.hc.old`. Its last token is accepted only if it
 * is an existing directory. The first accepted line wins.
 */
export async function parseMountPoint(listing: string, containerPath: string): Promise<string | null> {
  for (const line of listing.trim().split("\n")) {
    const volume = line.trim().replace(/^\d+:\s+/, "");
    if (!volume.startsWith(`${containerPath} `)) continue;
    const parts = line.trim().split(/\s+/);
    const candidate = parts[parts.length - 1];
    if (parts.length > 2 && candidate !== undefined && (await isDirectory(candidate))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Find the mount point of a container. Returns `null` both when it is not
 * mounted and when the listing command fails; callers decide how to react.
 */
export async function resolveMountPoint(
  containerPath: string,
  options: ResolveMountOptions = {},
): Promise<string | null> {
  const { runner = runCommand, elevation = null, onLog } = options;
  const result = await runner(listCommand(), { elevation, onLog });
  if (!result) {
    return null;
  }
  return parseMountPoint(result.stdout, containerPath);
}
