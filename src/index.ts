#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { elevationCommand } from "./cli/commands/elevation";
import { emptyCommand } from "./cli/commands/empty";
import { mountCommand, unmountCommand } from "./cli/commands/mount";
import { passwordCommand } from "./cli/commands/password";
import { statusCommand } from "./cli/commands/status";
import { NAME, VERSION } from "./cli/ui";

function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Encrypted vault backups with verified off-site copies`);

  p.note(
    `${color.cyan("backup")}      Sync directories into the vault and copy it off-site
${color.cyan("status")}      Show whether each vault is mounted
${color.cyan("mount")}       Mount a vault
${color.cyan("unmount")}     Unmount a vault
${color.cyan("empty")}       Delete everything inside a mounted vault
${color.cyan("password")}    Store or remove a container password
${color.cyan("elevation")}   Install or remove the passwordless sudo rule`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `vaultsync backup                  ${color.dim("# Interactive profile selection")}
vaultsync backup -p main          ${color.dim("# Back up one profile")}
vaultsync password -p main        ${color.dim("# Save the container password")}
vaultsync status                  ${color.dim("# Mount state of every vault")}
vaultsync elevation --install     ${color.dim("# Allow unattended runs")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "status":
      return statusCommand(commandArgs);

    case "mount":
      return mountCommand(commandArgs);

    case "unmount":
      return unmountCommand(commandArgs);

    case "empty":
      return emptyCommand(commandArgs);

    case "password":
      return passwordCommand(commandArgs);

    case "elevation":
      return elevationCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
