import { parseArgs } from "node:util";
import { VaultActionRunner } from "../../core";
import { createLogger, errorMessage, setLogLevel } from "../../utils";
import { loadCommandContext } from "../context";
import { color, ui } from "../ui";

const log = createLogger("password");

export async function passwordCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      profile: { type: "string", short: "p" },
      delete: { type: "boolean", default: false },
      "skip-test": { type: "boolean", default: false },
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
    ui.banner("password");
    const context = await loadCommandContext(values.config, values.profile);
    if (!context) {
      ui.cancel("Password update cancelled");
      return 1;
    }
    const identity = context.profile.containerIdentity;

    if (values.delete) {
      const deleted = await context.secrets.delete(identity);
      if (deleted) {
        ui.outro(`Stored password for ${context.profile.name} removed`);
      } else {
        ui.warn(`No password was stored for ${context.profile.name}`);
      }
      return 0;
    }

    const entered = await ui.password({
      message: `Container password for ${context.profile.name}`,
      validate: (value) => (value ? undefined : "Password is required"),
    });
    if (ui.isCancel(entered)) {
      ui.cancel("Password update cancelled");
      return 1;
    }

    if (!values["skip-test"]) {
      const s = ui.spinner();
      s.start("Testing the password against the container...");
      const vault = new VaultActionRunner({
        container: context.profile.container,
        onLog: (message) => log.debug(message),
      });
      const check = await vault.testCredentials(entered);
      s.stop(check.message);
      if (!check.ok) {
        ui.error("Password was not saved.");
        return 1;
      }
    }

    await context.secrets.set(identity, entered);
    ui.outro(`Password saved for ${context.profile.name}`);
    return 0;
  } catch (error) {
    ui.error(`Password update failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("vaultsync password")} - Store the container password used by backups

${color.dim("USAGE:")}
  vaultsync password [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -p, --profile <id>      Profile whose container password to store
      --skip-test         Save without testing it against the container
      --delete            Remove the stored password
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
