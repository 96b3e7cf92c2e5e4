import { z } from "zod";
import { ArchiveClient } from "../core/archiveClient";
import { FormatError } from "../core/errors";
import { RegistryMapping } from "../types";

export interface RegistryFeedEntry {
  ticker: string;
  cik: string;
}

const feedValueSchema = z.union([z.string(), z.number()]).nullish();

// company_tickers.json: { "0": { "cik_str": 320193, "ticker": "AAPL", "title": "Apple Inc." }, ... }
const registryFeedSchema = z.record(
  z.string(),
  z
    .object({
      cik_str: feedValueSchema,
      ticker: feedValueSchema,
    })
    .passthrough(),
);

export function parseRegistryFeed(body: unknown, url?: string): RegistryFeedEntry[] {
  const parsed = registryFeedSchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unexpected shape";
    throw new FormatError(`Ticker feed does not have the expected shape (${where})`, url);
  }

  return Object.values(parsed.data).map((entry) => ({
    ticker: String(entry.ticker ?? ""),
    cik: String(entry.cik_str ?? ""),
  }));
}

/**
 * Builds both lookup directions. Blank tickers or identifiers are dropped;
 * a later duplicate replaces an earlier one.
 */
export function resolveAll(entries: Iterable<RegistryFeedEntry>): RegistryMapping {
  const tickerToId = new Map<string, string>();
  const idToTicker = new Map<string, string>();

  for (const entry of entries) {
    const ticker = entry.ticker.trim().toUpperCase();
    const cik = entry.cik.trim();
    if (!ticker || !cik) {
      continue;
    }
    tickerToId.set(ticker, cik);
    idToTicker.set(cik, ticker);
  }

  return { tickerToId, idToTicker };
}

export async function fetchRegistry(client: ArchiveClient, url: string): Promise<RegistryMapping> {
  const body = await client.getJson(url);
  return resolveAll(parseRegistryFeed(body, url));
}

export interface WatchlistResolution {
  ids: Set<string>;
  missing: string[];
}

export function resolveWatchlist(mapping: RegistryMapping, tickers: Iterable<string>): WatchlistResolution {
  const ids = new Set<string>();
  const missing: string[] = [];

  for (const ticker of [...tickers].sort()) {
    const cik = mapping.tickerToId.get(ticker);
    if (cik) {
      ids.add(cik);
    } else {
      missing.push(ticker);
    }
  }

  return { ids, missing };
}
