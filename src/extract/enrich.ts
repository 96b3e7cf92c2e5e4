import { fetchFilingContent } from "../archive/documents";
import { ArchiveClient } from "../core/archiveClient";
import { errorMessage } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { MatchedFiling } from "../types";
import { DEFAULT_ITEM_CATALOG, ItemCatalog } from "./catalog";
import { extractItems } from "./itemExtractor";
import { selectPrimaryDocument } from "./primaryDocument";

export interface EnrichDependencies {
  client: ArchiveClient;
  logger: Logger;
  metrics: MetricsRegistry;
  catalog?: ItemCatalog;
  concurrency?: number;
  /** Keep going when one filing cannot be fetched; it is reported without items. */
  continueOnError?: boolean;
}

/** Only 8-K style forms carry numbered items worth fetching the bundle for. */
export function needsItemExtraction(formType: string): boolean {
  return formType.includes("8-K");
}

export async function enrichFiling(filing: MatchedFiling, deps: EnrichDependencies): Promise<MatchedFiling> {
  if (!needsItemExtraction(filing.formType)) {
    return { ...filing, items: [] };
  }

  const stopTimer = deps.metrics.startTimer("document_fetch_ms");
  const content = await fetchFilingContent(deps.client, filing.rawUrl);
  const durationMs = stopTimer();
  deps.metrics.incrementCounter(content ? "documents_fetched" : "documents_empty", 1);

  const items = extractItems(content, deps.catalog ?? DEFAULT_ITEM_CATALOG);
  deps.metrics.incrementCounter("items_extracted", items.length);

  const primaryDocument = selectPrimaryDocument(content, filing.formType);
  deps.logger.debug("filing_enriched", {
    accession: filing.accession,
    ticker: filing.ticker,
    items: items.length,
    primaryDocument,
    durationMs,
  });

  return {
    ...filing,
    items,
    url: primaryDocument ? `${filing.directoryUrl}${primaryDocument}` : filing.indexUrl,
  };
}

/**
 * Results land in input order no matter which worker finishes first. After a
 * failure no further filings are started.
 */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let index = 0;
  let failed = false;

  const slots = new Array(Math.max(1, concurrency)).fill(null).map(async () => {
    while (!failed) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      try {
        results[current] = await worker(items[current], current);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  });

  await Promise.all(slots);
  return results;
}

export async function enrichFilings(filings: readonly MatchedFiling[], deps: EnrichDependencies): Promise<MatchedFiling[]> {
  const total = filings.length;
  deps.logger.info("enrich_start", { filings: total, concurrency: deps.concurrency ?? 1 });

  const enriched = await mapWithConcurrency(filings, deps.concurrency ?? 1, async (filing, index) => {
    deps.logger.info("enrich_filing_start", {
      progress: `${index + 1}/${total}`,
      ticker: filing.ticker,
      company: filing.companyName.slice(0, 40),
      formType: filing.formType,
      accession: filing.accession,
    });

    try {
      return await enrichFiling(filing, deps);
    } catch (error) {
      if (!deps.continueOnError) {
        throw error;
      }
      deps.metrics.incrementCounter("filings_failed", 1);
      deps.logger.error("enrich_filing_failed", {
        accession: filing.accession,
        ticker: filing.ticker,
        url: filing.rawUrl,
        error: errorMessage(error),
      });
      return { ...filing, items: [] };
    }
  });

  deps.logger.info("enrich_complete", { filings: enriched.length });
  return enriched;
}
