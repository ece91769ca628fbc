/**
 * Encryption tool command lines
 */

export const VERACRYPT = "veracrypt";

const BASE_COMMAND = [VERACRYPT, "--text", "--non-interactive"] as const;

export function listCommand(): string[] {
  return [VERACRYPT, "--text", "--list"];
}

export function mountCommand(container: string, password: string): string[] {
  return [...BASE_COMMAND, "--mount", container, "--password", password];
}

/**
 * Dismount by mount point or by container path; the tool accepts either.
 */
export function dismountCommand(target: string): string[] {
  return [...BASE_COMMAND, "--dismount", target];
}

export function testCommand(container: string, password: string): string[] {
  return [VERACRYPT, "--text", "--test", "--password", password, "--non-interactive", container];
}
