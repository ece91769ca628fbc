/**
 * External command type definitions
 */

/**
 * How to elevate a command:
 * - `null`: run as the current user
 * - `""`: sudo with a pre-authorised passwordless rule
 * - any other string: sudo, reading this password from stdin
 */
export type Elevation = string | null;

/** Keep (possibly transformed) a stdout line by returning it, drop it with `null` */
export type OutputFilter = (line: string) => string | null;

export type LogSink = (message: string) => void;

export interface CommandOptions {
  elevation?: Elevation;
  onLog?: LogSink;
  outputFilter?: OutputFilter;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs an external command. Resolves `null` on a non-zero exit or when the
 * executable cannot be started; never rejects for those cases.
 */
export type CommandRunner = (argv: readonly string[], options?: CommandOptions) => Promise<CommandResult | null>;
