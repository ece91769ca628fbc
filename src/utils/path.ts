/**
 * Path helpers
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Check if a file path is within a directory (the directory itself excluded).
 */
export function isPathWithinDir(filePath: string, dir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(dir);

  return normalizedPath.startsWith(normalizedDir + path.sep);
}

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(value: string, home: string = os.homedir()): string {
  if (value === "~") return home;
  if (value.startsWith("~/")) return path.join(home, value.slice(2));
  return value;
}

/**
 * Resolve a possibly relative, possibly `~`-prefixed path against a base directory.
 */
export function resolveFrom(baseDir: string, value: string): string {
  const expanded = expandHome(value);
  return path.isAbsolute(expanded) ? path.normalize(expanded) : path.resolve(baseDir, expanded);
}
