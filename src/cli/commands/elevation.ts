import { parseArgs } from "node:util";
import { findAndLoadConfig } from "../../config";
import {
  DEFAULT_TOOL_PATH,
  findExecutable,
  installPasswordlessRule,
  isPasswordlessElevationConfigured,
  passwordlessRule,
  removePasswordlessRule,
  VERACRYPT,
} from "../../core";
import { createLogger, errorMessage, setLogLevel } from "../../utils";
import { color, ui } from "../ui";

const log = createLogger("elevation");

export async function elevationCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      install: { type: "boolean", default: false },
      remove: { type: "boolean", default: false },
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

  if (values.install === values.remove) {
    ui.error(`Pass exactly one of ${color.cyan("--install")} or ${color.cyan("--remove")}.`);
    return 1;
  }

  try {
    ui.banner("elevation");
    const config = await findAndLoadConfig(values.config);
    const { ruleFile } = config.elevation;
    const configured = await isPasswordlessElevationConfigured(ruleFile);

    if (values.install && configured) {
      ui.warn(`A passwordless rule already exists at ${ruleFile}`);
      ui.outro("Nothing to do");
      return 0;
    }
    if (values.remove && !configured) {
      ui.warn(`No passwordless rule found at ${ruleFile}`);
      ui.outro("Nothing to do");
      return 0;
    }

    const toolPath = (await findExecutable(VERACRYPT)) ?? DEFAULT_TOOL_PATH;

    if (!values.yes) {
      const confirmed = await ui.confirm({
        message: values.install
          ? `Write '${passwordlessRule(toolPath)}' to ${ruleFile}? ` +
            `Unattended backups need it, at the cost of root access to ${VERACRYPT} without a password.`
          : `Remove ${ruleFile}? Backups will ask for the sudo password again.`,
        initialValue: false,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Elevation change cancelled");
        return 1;
      }
    }

    const password = await ui.password({
      message: "Administrator password (for sudo)",
      validate: (value) => (value ? undefined : "Password is required"),
    });
    if (ui.isCancel(password)) {
      ui.cancel("Elevation change cancelled");
      return 1;
    }

    const onLog = (message: string) => log.debug(message);
    const change = values.install
      ? await installPasswordlessRule(password, { ruleFile, toolPath, onLog })
      : await removePasswordlessRule(password, { ruleFile, onLog });

    if (!change.ok) {
      ui.error(change.message);
      return 1;
    }
    ui.outro(change.message);
    return 0;
  } catch (error) {
    ui.error(`Elevation change failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("vaultsync elevation")} - Manage the passwordless sudo rule for the encryption tool

${color.dim("USAGE:")}
  vaultsync elevation --install|--remove [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
      --install           Create the rule at elevation.ruleFile
      --remove            Delete the rule
  -y, --yes               Skip the confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
