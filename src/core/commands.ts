import fs from "node:fs";
import path from "node:path";
import { locateIndex, parseReportDate } from "../archive";
import { AppConfig } from "../config";
import { DEFAULT_ITEM_CATALOG, enrichFilings, extractItems, ItemCatalog, selectPrimaryDocument, sortedPriorityItems } from "../extract";
import { attachTickers, matchFilings } from "../match";
import { Logger, MetricsRegistry } from "../observability";
import { fetchRegistry, resolveWatchlist } from "../registry";
import { defaultReportPath, hasPriorityItem, writeReport } from "../report";
import { ItemDisclosure, MatchedFiling } from "../types";
import { loadWatchlist } from "../watchlist";
import { ArchiveClient } from "./archiveClient";
import { ConfigError } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  client: ArchiveClient;
  logger: Logger;
  metrics: MetricsRegistry;
  catalog?: ItemCatalog;
  now?: Date;
}

export interface MatchSelection {
  reportDate: string;
  filings: MatchedFiling[];
}

export interface ReportSummary {
  reportDate: string;
  totalFilings: number;
  priorityFilings: number;
  outputPath: string;
}

export interface BundleExtraction {
  formType: string;
  primaryDocument?: string;
  items: ItemDisclosure[];
}

const MISSING_TICKERS_SHOWN = 10;

/**
 * Watchlist, ticker resolution, index lookup and filtering. Configuration
 * problems surface before the first request is made.
 */
export async function selectMatchingFilings(ctx: CommandContext): Promise<MatchSelection | undefined> {
  const { config, logger } = ctx;
  const explicitDate = config.reportDate ? parseReportDate(config.reportDate) : undefined;

  const tickers = loadWatchlist(config.watchlist.path, config.watchlist.column);
  if (tickers.size === 0) {
    throw new ConfigError(`No tickers found in ${config.watchlist.path}. Check the column name.`);
  }
  const forms = new Set(config.forms);
  logger.info("watchlist_loaded", { tickers: tickers.size, forms: [...forms].sort() });

  logger.info("registry_fetch_start", { url: config.tickersUrl });
  const mapping = await fetchRegistry(ctx.client, config.tickersUrl);
  const { ids, missing } = resolveWatchlist(mapping, tickers);
  logger.info("registry_resolved", { mapped: ids.size, missing: missing.length });
  if (missing.length > 0) {
    logger.warn("registry_tickers_missing", { tickers: missing.slice(0, MISSING_TICKERS_SHOWN) });
  }

  const location = await locateIndex(
    {
      client: ctx.client,
      archiveBaseUrl: config.archiveBaseUrl,
      logger,
      metrics: ctx.metrics,
    },
    {
      date: explicitDate,
      now: ctx.now,
      lookbackDays: config.lookbackDays,
      includeWeekends: config.includeWeekends,
    },
  );
  if (!location) {
    logger.info("index_not_found", { lookbackDays: config.lookbackDays, date: config.reportDate });
    return undefined;
  }

  const filings = attachTickers(matchFilings(location.records, ids, forms), mapping);
  ctx.metrics.incrementCounter("filings_matched", filings.length);
  logger.info("filings_matched", { date: location.reportDate, matched: filings.length });
  return { reportDate: location.reportDate, filings };
}

export async function runReport(ctx: CommandContext): Promise<ReportSummary | undefined> {
  const { config, logger } = ctx;
  const catalog = ctx.catalog ?? DEFAULT_ITEM_CATALOG;
  logger.info("report_start", { date: config.reportDate, lookbackDays: config.lookbackDays });

  const selection = await selectMatchingFilings(ctx);
  if (!selection) {
    logger.info("report_skipped", { reason: "no filings found in the requested window" });
    return undefined;
  }

  const filings = await enrichFilings(selection.filings, {
    client: ctx.client,
    logger,
    metrics: ctx.metrics,
    catalog,
    concurrency: config.enrichConcurrency,
    continueOnError: config.continueOnFilingError,
  });

  const priorityItems = sortedPriorityItems(catalog);
  const outputPath = await writeReport(filings, {
    outputPath: config.report.path || defaultReportPath(selection.reportDate),
    reportDate: selection.reportDate,
    title: config.report.title,
    assetsDir: config.report.assetsDir || undefined,
    priorityItems,
  });

  const summary: ReportSummary = {
    reportDate: selection.reportDate,
    totalFilings: filings.length,
    priorityFilings: filings.filter(hasPriorityItem).length,
    outputPath,
  };
  logger.info("report_complete", {
    ...summary,
    priorityItems: priorityItems.join(", "),
    openInBrowser: `file://${outputPath}`,
  });
  return summary;
}

export async function runIndex(ctx: CommandContext): Promise<MatchedFiling[]> {
  const selection = await selectMatchingFilings(ctx);
  if (!selection) {
    return [];
  }

  for (const filing of selection.filings) {
    ctx.logger.info("filing_matched", {
      date: selection.reportDate,
      ticker: filing.ticker,
      formType: filing.formType,
      accession: filing.accession,
      url: filing.url,
    });
  }
  return selection.filings;
}

/** Offline extraction from a submission saved to disk. */
export async function runExtractFile(ctx: CommandContext, bundlePath: string, formType: string): Promise<BundleExtraction> {
  const absolutePath = path.resolve(bundlePath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Bundle file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, "utf-8");
  const items = extractItems(content, ctx.catalog ?? DEFAULT_ITEM_CATALOG);
  const result: BundleExtraction = {
    formType,
    primaryDocument: selectPrimaryDocument(content, formType),
    items,
  };
  ctx.metrics.incrementCounter("items_extracted", items.length);
  ctx.logger.info("extract_file_complete", { url: absolutePath, formType, items: items.length });
  return result;
}
