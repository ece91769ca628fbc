import { parseArgs } from "node:util";
import { VaultActionRunner } from "../../core";
import { createLogger, errorMessage, setLogLevel } from "../../utils";
import { loadCommandContext, resolveElevation } from "../context";
import { color, ui } from "../ui";

const log = createLogger("mount");

type MountAction = "mount" | "unmount";

async function runMountAction(action: MountAction, args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      profile: { type: "string", short: "p" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp(action);
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    ui.banner(action);
    const context = await loadCommandContext(values.config, values.profile);
    if (!context) {
      ui.cancel(`${action} cancelled`);
      return 1;
    }

    const elevation = await resolveElevation(context.config);
    if (elevation === undefined) {
      ui.cancel(`${action} cancelled`);
      return 1;
    }

    const vault = new VaultActionRunner({
      container: context.profile.container,
      elevation,
      onLog: (message) => log.debug(message),
    });

    const s = ui.spinner();
    if (action === "mount") {
      const password = await context.secrets.get(context.profile.containerIdentity);
      if (!password) {
        ui.error(`No password stored for ${context.profile.name}. Run ${color.cyan("vaultsync password")} first.`);
        return 1;
      }
      s.start("Mounting vault...");
      const change = await vault.mount(password);
      s.stop(change.status.mounted ? `Mounted at ${change.status.mountPoint}` : "Vault is not mounted");
      return change.status.mounted ? 0 : 1;
    }

    s.start("Unmounting vault...");
    const change = await vault.unmount();
    s.stop(change.status.mounted ? `Still mounted at ${change.status.mountPoint}` : "Vault is unmounted");
    return change.status.mounted ? 1 : 0;
  } catch (error) {
    ui.error(`${action} failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

export async function mountCommand(args: string[]): Promise<number> {
  return runMountAction("mount", args);
}

export async function unmountCommand(args: string[]): Promise<number> {
  return runMountAction("unmount", args);
}

function printHelp(action: MountAction): void {
  const summary = action === "mount" ? "Mount a vault with its stored password" : "Unmount a vault";
  console.log(`
${color.bold(`vaultsync ${action}`)} - ${summary}

${color.dim("USAGE:")}
  vaultsync ${action} [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -p, --profile <id>      Profile whose vault to ${action}
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
