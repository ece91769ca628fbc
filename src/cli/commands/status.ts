import { parseArgs } from "node:util";
import { findAndLoadConfig, resolveProfile } from "../../config";
import { VaultActionRunner } from "../../core";
import { createLogger, errorMessage, setLogLevel } from "../../utils";
import { resolveElevation } from "../context";
import { color, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const log = createLogger("status");

export async function statusCommand(args: string[]): Promise<number> {
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
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    ui.banner("status");
    const config = await findAndLoadConfig(values.config);
    const profiles = values.profile ? config.profiles.filter((p) => p.id === values.profile) : config.profiles;
    if (profiles.length === 0) {
      ui.error(`Profile "${values.profile}" not found`);
      return 1;
    }

    const elevation = await resolveElevation(config);
    if (elevation === undefined) {
      ui.cancel("Status cancelled");
      return 1;
    }

    const widths = [TABLE_WIDTHS.profile, TABLE_WIDTHS.name, TABLE_WIDTHS.state, TABLE_WIDTHS.mountPoint];
    const rows = [formatTableRow(["Profile", "Name", "State", "Mount point"], widths), formatTableSeparator(widths)];

    for (const entry of profiles) {
      const profile = resolveProfile(config, entry);
      const vault = new VaultActionRunner({
        container: profile.container,
        elevation,
        onLog: (message) => log.debug(message),
      });
      const status = await vault.status();
      rows.push(
        formatTableRow(
          [
            profile.id,
            profile.name,
            status.mounted ? color.green("mounted") : color.dim("unmounted"),
            status.mountPoint ?? "",
          ],
          widths,
        ),
      );
    }

    ui.note(rows.join("\n"), "Vaults");
    ui.outro(`${profiles.length} profile(s)`);
    return 0;
  } catch (error) {
    ui.error(`Status failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("vaultsync status")} - Show whether each vault is mounted

${color.dim("USAGE:")}
  vaultsync status [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file
  -p, --profile <id>      Only show this profile
  -v, --verbose           Verbose output
  -h, --help              Show this help message
`);
}
