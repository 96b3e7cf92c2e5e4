import { ArchiveClient } from "../core/archiveClient";
import { ConfigError } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { IndexRecord } from "../types";
import { buildDailyIndexUrl, fetchDailyIndex, formatReportDate } from "./dailyIndex";

export interface IndexLocation {
  reportDate: string;
  records: IndexRecord[];
}

interface ProbeDependencies {
  client: ArchiveClient;
  archiveBaseUrl: string;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ProbeOptions {
  /** Fetch exactly this date instead of searching backwards. */
  date?: Date;
  now?: Date;
  lookbackDays: number;
  includeWeekends: boolean;
}

const REPORT_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

export function parseReportDate(value: string): Date {
  const match = REPORT_DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid date "${value}". Use YYYY-MM-DD.`);
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new ConfigError(`Invalid date "${value}". Use YYYY-MM-DD.`);
  }
  return date;
}

function isWeekend(date: Date): boolean {
  const day = date.getDay();
  return day === 0 || day === 6;
}

/** Newest first, starting with `now` itself. */
export function candidateDates(now: Date, lookbackDays: number, includeWeekends: boolean): Date[] {
  const dates: Date[] = [];
  for (let daysAgo = 0; daysAgo < lookbackDays; daysAgo += 1) {
    const date = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysAgo);
    if (isWeekend(date) && !includeWeekends) {
      continue;
    }
    dates.push(date);
  }
  return dates;
}

async function probe(deps: ProbeDependencies, date: Date): Promise<IndexRecord[]> {
  const url = buildDailyIndexUrl(deps.archiveBaseUrl, date);
  deps.logger.info("index_fetch_start", { date: formatReportDate(date), url });
  const stopTimer = deps.metrics.startTimer("index_fetch_ms");
  const records = await fetchDailyIndex(deps.client, deps.archiveBaseUrl, date);
  const durationMs = stopTimer();

  deps.metrics.incrementCounter("index_fetches", 1);
  deps.metrics.incrementCounter("index_records_parsed", records.length);
  deps.logger.info("index_fetch_complete", { date: formatReportDate(date), records: records.length, durationMs });
  return records;
}

/**
 * Finds the index to report on. Missing index files (weekends, holidays,
 * not yet published) read as empty and the search moves one day further back.
 */
export async function locateIndex(deps: ProbeDependencies, options: ProbeOptions): Promise<IndexLocation | undefined> {
  if (options.date) {
    const records = await probe(deps, options.date);
    if (records.length === 0) {
      return undefined;
    }
    return { reportDate: formatReportDate(options.date), records };
  }

  const dates = candidateDates(options.now ?? new Date(), options.lookbackDays, options.includeWeekends);
  for (const date of dates) {
    const records = await probe(deps, date);
    if (records.length > 0) {
      deps.logger.info("index_found", { date: formatReportDate(date), records: records.length });
      return { reportDate: formatReportDate(date), records };
    }
  }

  return undefined;
}
