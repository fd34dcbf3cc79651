import { AppConfig, loadConfig, validateConfig } from "../config";
import { runDiscover, runDownload, runHarvest, runRetryFailed, runStatus } from "../core/commands";
import { errorMessage, isFatalHarvestError } from "../core/errors";
import { createFetchTransport } from "../core/fetch";
import { PlaywrightGridBrowser, playwrightOptionsFromConfig } from "../crawl";
import { NodeFileStore } from "../download";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";
import { RunSummary } from "../types";

export type CommandName = "harvest" | "discover" | "download" | "retry-failed" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  maxPages?: number;
  maxRetries?: number;
  destFolder?: string;
  concurrency?: number;
  headful: boolean;
  ignoreHttpsErrors: boolean;
  logLevel?: string;
  logFile?: string;
}

export const EXIT_OK = 0;
export const EXIT_HALTED = 2;
export const EXIT_ITEMS_FAILED = 3;

const HELP_TEXT = `
Usage:
  tariff-harvester <command> [options]

Commands:
  harvest        Walk the tariff grid, then download every export
  discover       Walk the grid and record export ids only
  download       Download every recorded id
  retry-failed   Download the ids whose last attempt failed
  status         Show ledger counts

Options:
  --config <path>        Optional path to JSON config file
  --max-pages <n>        Pagination safety bound
  --max-retries <n>      Retries per download after the first attempt
  --dest <dir>           Destination folder for XML files
  --concurrency <n>      Parallel downloads (1-8)
  --headful              Show the browser window
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --log-level <level>    debug, info, warn or error
  --log-file <path>      Also append log lines to this file
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (
    raw === "harvest" ||
    raw === "discover" ||
    raw === "download" ||
    raw === "retry-failed" ||
    raw === "status"
  ) {
    return raw;
  }

  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    maxPages: intOption(argv, "--max-pages"),
    maxRetries: intOption(argv, "--max-retries"),
    destFolder: optionValue(argv, "--dest"),
    concurrency: intOption(argv, "--concurrency"),
    headful: argv.includes("--headful"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    logLevel: optionValue(argv, "--log-level"),
    logFile: optionValue(argv, "--log-file"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return validateConfig({
    ...config,
    maxPages: parsed.maxPages ?? config.maxPages,
    maxRetries: parsed.maxRetries ?? config.maxRetries,
    destFolder: parsed.destFolder ?? config.destFolder,
    downloadConcurrency: parsed.concurrency ?? config.downloadConcurrency,
    headless: parsed.headful ? false : config.headless,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
  });
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.haltedBy) {
    return EXIT_HALTED;
  }
  return summary.failed > 0 ? EXIT_ITEMS_FAILED : EXIT_OK;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({
    component: "cli",
    runId,
    minLevel: parseLogLevel(parsed.logLevel ?? process.env.LOG_LEVEL),
    filePath: parsed.logFile ?? process.env.LOG_FILE,
  });

  let stopRequested = false;
  const onSigint = (): void => {
    if (stopRequested) {
      logger.warn("stop_forced");
      process.exit(130);
    }
    stopRequested = true;
    logger.warn("stop_requested", { hint: "finishing the current page or item; press Ctrl+C again to abort" });
  };
  process.on("SIGINT", onSigint);

  const context = {
    runId,
    config,
    store,
    sink,
    logger,
    metrics,
    transport: createFetchTransport(config.ignoreHttpsErrors),
    files: new NodeFileStore(),
    openBrowser: () => PlaywrightGridBrowser.launch(playwrightOptionsFromConfig(config)),
    shouldStop: () => stopRequested,
  };

  logger.info("command_start", {
    command: parsed.command,
    baseUrl: config.baseUrl,
    destFolder: config.destFolder,
    maxPages: config.maxPages,
    maxRetries: config.maxRetries,
    concurrency: config.downloadConcurrency,
    headless: config.headless,
  });

  try {
    let summary: RunSummary | undefined;
    switch (parsed.command) {
      case "harvest":
        summary = await runHarvest({ ...context, logger: logger.child("harvest") });
        break;
      case "discover":
        summary = await runDiscover({ ...context, logger: logger.child("discover") });
        break;
      case "download":
        summary = await runDownload({ ...context, logger: logger.child("download") });
        break;
      case "retry-failed":
        summary = await runRetryFailed({ ...context, logger: logger.child("retry_failed") });
        break;
      case "status":
        await runStatus({ ...context, logger: logger.child("status") });
        break;
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return summary ? exitCodeFor(summary) : EXIT_OK;
  } catch (error) {
    if (isFatalHarvestError(error)) {
      logger.error("command_halted", { command: parsed.command, errorKind: error.kind, error: errorMessage(error) });
      return EXIT_HALTED;
    }
    throw error;
  } finally {
    process.off("SIGINT", onSigint);
    await store.close();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
