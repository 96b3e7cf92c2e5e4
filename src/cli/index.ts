import { AppConfig, loadConfig, parseForms, PLACEHOLDER_USER_AGENT } from "../config";
import { FetchLike, ArchiveClient } from "../core/archiveClient";
import { runExtractFile, runIndex, runReport } from "../core/commands";
import { ConfigError } from "../core/errors";
import { closeFetchDispatchers } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";

export type CommandName = "report" | "index" | "extract";

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 2;

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  bundlePath?: string;
  formType?: string;
  tickersCsv?: string;
  tickerColumn?: string;
  forms?: string[];
  date?: string;
  lookbackDays?: number;
  includeWeekends: boolean;
  output?: string;
  assetsDir?: string;
  title?: string;
  userAgent?: string;
  concurrency?: number;
  continueOnError: boolean;
  ignoreHttpsErrors: boolean;
}

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchLike;
  now?: Date;
}

const HELP_TEXT = `
Usage:
  edgar-item-watch [command] [options]

Commands:
  report                 Build the HTML report (default)
  index                  List matched filings without fetching their documents
  extract <bundle-file>  Extract items from a saved submission (.txt)

Options:
  --config <path>          Optional path to JSON config file
  --tickers-csv <path>     CSV with a Ticker column (default: tickers.csv)
  --ticker-column <name>   Column holding tickers (default: Ticker)
  --forms <list>           Comma-separated forms (default: 8-K,8-K/A,DEF 14A,DEFA14A)
  --date <YYYY-MM-DD>      Report on this date instead of searching backwards
  --lookback-days <n>      Days to search back when --date is not set (default: 7)
  --include-weekends       Also check Saturday and Sunday
  --output <path>          Output HTML file (default: sec_report_<date>.html)
  --assets-dir <path>      Logo/favicon folder copied next to the report (default: assets)
  --title <text>           Report title
  --user-agent <text>      Archive-compliant User-Agent with contact info
  --form <type>            Form type of the bundle (extract command, default: 8-K)
  --concurrency <n>        Filings enriched in parallel (default: 1)
  --continue-on-error      Report a filing without items when its document cannot be fetched
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help
`;

const VALUE_FLAGS = new Set([
  "--config",
  "--tickers-csv",
  "--ticker-column",
  "--forms",
  "--date",
  "--lookback-days",
  "--output",
  "--assets-dir",
  "--title",
  "--user-agent",
  "--form",
  "--concurrency",
]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "report" || raw === "index" || raw === "extract") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index >= 0 && argv[index + 1] !== undefined) {
    return argv[index + 1];
  }
  return undefined;
}

function readIntOption(argv: string[], flag: string): number | undefined {
  const raw = readOption(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

function positionalArgs(argv: string[]): string[] {
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    if (VALUE_FLAGS.has(argv[i])) {
      i += 1;
      continue;
    }
    if (!argv[i].startsWith("-")) {
      positional.push(argv[i]);
    }
  }
  return positional;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const [first, second] = positionalArgs(argv);
  const command = first === undefined ? "report" : parseCommand(first);
  if (!command) {
    return "help";
  }

  const forms = readOption(argv, "--forms");
  return {
    command,
    configPath: readOption(argv, "--config"),
    bundlePath: command === "extract" ? second : undefined,
    formType: readOption(argv, "--form"),
    tickersCsv: readOption(argv, "--tickers-csv"),
    tickerColumn: readOption(argv, "--ticker-column"),
    forms: forms !== undefined ? parseForms(forms) : undefined,
    date: readOption(argv, "--date"),
    lookbackDays: readIntOption(argv, "--lookback-days"),
    includeWeekends: argv.includes("--include-weekends"),
    output: readOption(argv, "--output"),
    assetsDir: readOption(argv, "--assets-dir"),
    title: readOption(argv, "--title"),
    userAgent: readOption(argv, "--user-agent"),
    concurrency: readIntOption(argv, "--concurrency"),
    continueOnError: argv.includes("--continue-on-error"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    userAgent: parsed.userAgent ?? config.userAgent,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    enrichConcurrency: parsed.concurrency ?? config.enrichConcurrency,
    continueOnFilingError: parsed.continueOnError || config.continueOnFilingError,
    forms: parsed.forms ?? config.forms,
    reportDate: parsed.date ?? config.reportDate,
    lookbackDays: parsed.lookbackDays ?? config.lookbackDays,
    includeWeekends: parsed.includeWeekends || config.includeWeekends,
    watchlist: {
      path: parsed.tickersCsv ?? config.watchlist.path,
      column: parsed.tickerColumn ?? config.watchlist.column,
    },
    report: {
      path: parsed.output ?? config.report.path,
      assetsDir: parsed.assetsDir ?? config.report.assetsDir,
      title: parsed.title ?? config.report.title,
    },
  };
}

export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }

  const env = options.env ?? process.env;
  const runId = createRunId(parsed.command);
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(env.LOG_LEVEL) });

  let config: AppConfig;
  try {
    config = applyCliOverrides(loadConfig(parsed.configPath, env), parsed);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_error", { error: error.message });
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  }

  if (!config.userAgent.trim()) {
    logger.warn("user_agent_missing", {
      hint: 'export SEC_USER_AGENT="edgar-item-watch (you@example.com)"',
    });
    config = { ...config, userAgent: PLACEHOLDER_USER_AGENT };
  }

  const client = new ArchiveClient({
    userAgent: config.userAgent,
    timeoutMs: config.requestTimeoutMs,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    fetchFn: options.fetchFn,
  });
  const metrics = new MetricsRegistry();
  const context = { runId, config, client, logger, metrics, now: options.now };

  logger.info("command_start", {
    command: parsed.command,
    forms: config.forms,
    date: config.reportDate,
    lookbackDays: config.lookbackDays,
    includeWeekends: config.includeWeekends,
    concurrency: config.enrichConcurrency,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "report":
        await runReport({ ...context, logger: logger.child("report") });
        break;
      case "index":
        await runIndex({ ...context, logger: logger.child("index") });
        break;
      case "extract": {
        if (!parsed.bundlePath) {
          throw new ConfigError("extract needs the path of a saved submission file");
        }
        const result = await runExtractFile(
          { ...context, logger: logger.child("extract") },
          parsed.bundlePath,
          parsed.formType ?? "8-K",
        );
        console.log(JSON.stringify(result, null, 2));
        break;
      }
    }

    logger.info("command_complete", { command: parsed.command });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error("config_error", { error: error.message });
      return EXIT_CONFIG_ERROR;
    }
    throw error;
  } finally {
    await closeFetchDispatchers();
    metrics.printSummary(runId);
  }
}
