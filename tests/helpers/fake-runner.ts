import type { CommandOptions, CommandResult, CommandRunner } from "../../src/types";

export interface RecordedCall {
  argv: string[];
  options: CommandOptions | undefined;
}

/** Return `null` for a failed command, a string for its stdout, or a full result. */
export type FakeResponse = CommandResult | string | null | Promise<CommandResult | string | null>;

export type FakeHandler = (argv: string[], options: CommandOptions | undefined) => FakeResponse;

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
  /** Calls whose argv starts with `prefix` */
  callsTo(...prefix: string[]): RecordedCall[];
}

/**
 * In-process stand-in for external tools. Unhandled commands succeed with no output.
 */
export function createFakeRunner(handler: FakeHandler = () => ""): FakeRunner {
  const calls: RecordedCall[] = [];

  const runner: CommandRunner = async (argv, options) => {
    const copy = [...argv];
    calls.push({ argv: copy, options });
    const response = await handler(copy, options);
    if (response === null) {
      return null;
    }
    return typeof response === "string" ? { stdout: response, stderr: "", exitCode: 0 } : response;
  };

  return {
    runner,
    calls,
    callsTo: (...prefix) => calls.filter((call) => prefix.every((part, i) => call.argv[i] === part)),
  };
}
