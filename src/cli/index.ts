import { loadConfig } from "../config";
import { runExtract, runExtractPreview, runMerge, runPipeline, runSeed, runStatus } from "../core/commands";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "extract" | "merge" | "run" | "status" | "seed";

const COMMANDS: readonly CommandName[] = ["extract", "merge", "run", "status", "seed"];

export interface ParsedCliArgs {
  command: CommandName;
  dryRun: boolean;
  ignoreHttpsErrors: boolean;
  configPath?: string;
  calendarPath?: string;
}

const HELP_TEXT = `
Usage:
  race-results-harvester <command> [options]

Commands:
  extract          Fetch and extract every eligible target, stage the results
  merge            Fold staged results into the master CSV
  run              extract, then merge
  status           Count targets per status, staged files and master records
  seed             Add targets from an event calendar CSV (--calendar)

Options:
  --config <path>        Optional path to JSON config file
  --dry-run              extract only: list what would be attempted, change nothing
  --calendar <path>      Calendar CSV for seed (semicolon separated, V-Nr and Datum columns)
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const calendarPath = optionValue(argv, "--calendar");
  if (command === "seed" && !calendarPath) {
    return "help";
  }

  // Only extract has a preview.
  const dryRun = argv.includes("--dry-run");
  if (dryRun && command !== "extract") {
    return "help";
  }

  return {
    command,
    dryRun,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    configPath: optionValue(argv, "--config"),
    calendarPath,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }

  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });

  // Ctrl-C stops the extraction pass between targets; attempted targets are still saved.
  const abort = new AbortController();
  const onSigint = () => {
    logger.warn("abort_requested");
    abort.abort();
  };
  process.once("SIGINT", onSigint);

  const context = { runId, config, store, sink, logger, metrics, signal: abort.signal };
  logger.info("command_start", {
    command: parsed.command,
    dryRun: parsed.dryRun,
    storeType: config.storeType,
    duplicateDocumentPolicy: config.duplicateDocumentPolicy,
    corruptStagedPolicy: config.corruptStagedPolicy,
  });

  try {
    switch (parsed.command) {
      case "extract":
        if (parsed.dryRun) {
          await runExtractPreview({ ...context, logger: logger.child("dry_run") });
        } else {
          await runExtract({ ...context, logger: logger.child("extract") });
        }
        break;
      case "merge":
        await runMerge({ ...context, logger: logger.child("merge") });
        break;
      case "run":
        await runPipeline({ ...context, logger: logger.child("pipeline") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      case "seed":
        await runSeed({ ...context, logger: logger.child("seed") }, parsed.calendarPath ?? "");
        break;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
    await store.close();
    metrics.printSummary(runId);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
