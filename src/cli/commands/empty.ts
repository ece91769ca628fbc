import { parseArgs } from "node:util";
import { VaultActionRunner } from "../../core";
import { createLogger, errorMessage, setLogLevel } from "../../utils";
import { loadCommandContext, resolveElevation } from "../context";
import { color, ui } from "../ui";

const log = createLogger("empty");

export async function emptyCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      profile: { type: "string", short: "p" },
      yes: { type: "boolean", short: "y", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    ui.banner("empty");
    const context = await loadCommandContext(values.config, values.profile);
    if (!context) {
      ui.cancel("Empty cancelled");
      return 1;
    }

    const elevation = await resolveElevation(context.config);
    if (elevation === undefined) {
      ui.cancel("Empty cancelled");
      return 1;
    }

    const vault = new VaultActionRunner({
      container: context.profile.container,
      elevation,
      onLog: (message) => log.debug(message),
    });

    const { mountPoint } = await vault.status();
    if (!mountPoint) {
      ui.error(`The vault must be mounted first. Run ${color.cyan("vaultsync mount")}.`);
      return 1;
    }

    if (!values.yes) {
      const confirmed = await ui.confirm({
        message: `Permanently delete everything inside ${mountPoint}?`,
        initialValue: false,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Empty cancelled");
        return 1;
      }
    }

    const removed = await vault.empty();
    ui.success(`Removed ${removed.length} item(s) from ${mountPoint}`);
    ui.outro("Vault emptied");
    return 0;
  } catch (error) {
    ui.error(`Empty failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("vaultsync empty")} - Delete everything inside a mounted vault

${color.dim("USAGE:")}
  vaultsync empty [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -p, --profile <id>      Profile whose vault to empty
  -y, --yes               Skip the confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
