import { parseArgs } from "node:util";
import { describeStatus, runBackup } from "../../core";
import { NETWORK_QUALITIES, type NetworkQuality, type PipelineEvent, type RunConfiguration } from "../../types";
import { createLogger, errorMessage, formatDuration, setLogLevel } from "../../utils";
import { loadCommandContext, resolveElevation } from "../context";
import { color, colorStatus, formatProgress, formatSummary, ui } from "../ui";

const log = createLogger("backup");

function parseNetworkQuality(value: string | undefined): NetworkQuality | undefined {
  if (value === undefined) return undefined;
  const quality = NETWORK_QUALITIES.find((q) => q === value);
  if (!quality) {
    throw new Error(`--network must be one of: ${NETWORK_QUALITIES.join(", ")}`);
  }
  return quality;
}

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      profile: { type: "string", short: "p" },
      network: { type: "string", short: "n" },
      "local-only": { type: "boolean", default: false },
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
    ui.banner("backup");
    const networkQuality = parseNetworkQuality(values.network);

    const context = await loadCommandContext(values.config, values.profile);
    if (!context) {
      ui.cancel("Backup cancelled");
      return 1;
    }

    const elevation = await resolveElevation(context.config);
    if (elevation === undefined) {
      ui.cancel("Backup cancelled");
      return 1;
    }

    const run: RunConfiguration = {
      ...context.run,
      ...(networkQuality && { networkQuality }),
      ...(values["local-only"] && { remotePath: null, requireRemote: false }),
    };

    const controller = new AbortController();
    const s = ui.spinner();
    let currentStatus = "Starting backup...";

    // first Ctrl+C stops at the next safe point, a second one exits immediately
    const onSigint = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      controller.abort();
      s.message("Stopping after the current operation...");
    };
    process.on("SIGINT", onSigint);

    const onEvent = (event: PipelineEvent) => {
      switch (event.type) {
        case "status":
          currentStatus = event.message;
          s.message(currentStatus);
          break;
        case "progress":
          s.message(formatProgress(currentStatus, event.percent));
          break;
        case "log":
          log.debug(event.message);
          break;
        case "step":
        case "outcome":
          break;
      }
    };

    const startedAt = Date.now();
    s.start(currentStatus);
    const outcome = await runBackup({
      profile: context.profile,
      run,
      elevation,
      secrets: context.secrets,
      signal: controller.signal,
      onEvent,
    }).finally(() => process.off("SIGINT", onSigint));

    const description = describeStatus(outcome.status, outcome.detail);
    s.stop(description.title);

    ui.note(
      formatSummary([
        { label: "Profile", value: context.profile.name },
        { label: "Container", value: context.profile.container },
        { label: "Remote", value: run.remotePath ?? "(local only)" },
        { label: "Network", value: run.networkQuality },
        { label: "Duration", value: formatDuration(Date.now() - startedAt) },
        { label: "Status", value: colorStatus(outcome.status) },
        { label: "Detail", value: outcome.status === "general-error" ? null : outcome.detail || null },
      ]),
      "Backup Summary",
    );

    if (outcome.status === "complete") {
      ui.outro("Backup complete!");
      return 0;
    }
    if (description.isError) {
      ui.error(description.detail);
    } else {
      ui.warn(description.detail);
    }
    return 1;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("vaultsync backup")} - Sync directories into the vault and copy it off-site

${color.dim("USAGE:")}
  vaultsync backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./vaultsync.config.yaml)
  -p, --profile <id>      Profile to back up. Prompted for when several exist.
  -n, --network <q>       Network quality override: good, poor, terrible
      --local-only        Skip the off-site copy
  -v, --verbose           Verbose output, including tool output
  -h, --help              Show this help message

Press Ctrl+C once to stop at the next safe point (the vault is unmounted
before exiting); press it again to exit immediately.

${color.dim("EXAMPLES:")}
  vaultsync backup                      # Interactive profile selection
  vaultsync backup -p main              # Back up the "main" profile
  vaultsync backup -p main -n poor      # Longer timeouts for a slow remote
  vaultsync backup --local-only         # Sync into the vault only
`);
}
