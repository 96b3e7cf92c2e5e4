import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "../core/errors";
import { AppConfig, ConfigOverrides } from "./types";

export const DEFAULT_FORMS = ["8-K", "8-K/A", "DEF 14A", "DEFA14A"];

export const PLACEHOLDER_USER_AGENT = "edgar-item-watch (set SEC_USER_AGENT with your email)";

const DEFAULT_CONFIG: AppConfig = {
  archiveBaseUrl: "https://www.sec.gov/Archives",
  tickersUrl: "https://www.sec.gov/files/company_tickers.json",
  userAgent: "",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  enrichConcurrency: 1,
  continueOnFilingError: false,
  forms: [...DEFAULT_FORMS],
  reportDate: undefined,
  lookbackDays: 7,
  includeWeekends: false,
  watchlist: {
    path: "tickers.csv",
    column: "Ticker",
  },
  report: {
    path: "",
    assetsDir: "assets",
    title: "SEC Filing Summary Report",
  },
};

const configFileSchema = z
  .object({
    archiveBaseUrl: z.string(),
    tickersUrl: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    enrichConcurrency: z.number().int().positive(),
    continueOnFilingError: z.boolean(),
    forms: z.array(z.string()),
    reportDate: z.string(),
    lookbackDays: z.number().int().nonnegative(),
    includeWeekends: z.boolean(),
    watchlist: z.object({ path: z.string(), column: z.string() }).partial(),
    report: z.object({ path: z.string(), assetsDir: z.string(), title: z.string() }).partial(),
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

/** Splits a comma-joined form list, dropping blanks. */
export function parseForms(value: string): string[] {
  return value
    .split(",")
    .map((form) => form.trim())
    .filter((form) => form.length > 0);
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    watchlist: {
      ...DEFAULT_CONFIG.watchlist,
      ...(fileConfig.watchlist ?? {}),
    },
    report: {
      ...DEFAULT_CONFIG.report,
      ...(fileConfig.report ?? {}),
    },
  };

  return {
    ...merged,
    archiveBaseUrl: env.ARCHIVE_BASE_URL ?? merged.archiveBaseUrl,
    tickersUrl: env.TICKERS_URL ?? merged.tickersUrl,
    userAgent: env.SEC_USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    enrichConcurrency: toInt(env.ENRICH_CONCURRENCY, merged.enrichConcurrency),
    continueOnFilingError: toBool(env.CONTINUE_ON_FILING_ERROR, merged.continueOnFilingError),
    forms: env.FORMS ? parseForms(env.FORMS) : merged.forms,
    reportDate: env.REPORT_DATE || merged.reportDate,
    lookbackDays: toInt(env.LOOKBACK_DAYS, merged.lookbackDays),
    includeWeekends: toBool(env.INCLUDE_WEEKENDS, merged.includeWeekends),
    watchlist: {
      path: env.TICKERS_CSV ?? merged.watchlist.path,
      column: env.TICKER_COLUMN ?? merged.watchlist.column,
    },
    report: {
      path: env.OUTPUT_PATH ?? merged.report.path,
      assetsDir: env.ASSETS_DIR ?? merged.report.assetsDir,
      title: env.REPORT_TITLE ?? merged.report.title,
    },
  };
}

export { DEFAULT_CONFIG };
