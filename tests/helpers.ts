import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { buildRecord } from "../src/archive/dailyIndex";
import { ArchiveClient, FetchLike, HttpResponseLike } from "../src/core/archiveClient";
import { attachTickers } from "../src/match";
import { Logger, MetricsRegistry } from "../src/observability";
import { MatchedFiling, RegistryMapping } from "../src/types";

export const ARCHIVE = "https://archive.test/Archives";
export const TICKERS_URL = "https://archive.test/files/company_tickers.json";

export interface FakeRoute {
  status?: number;
  body?: string;
  error?: Error;
  delayMs?: number;
}

export function textResponse(status: number, body: string): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Unknown URLs answer 404, like index files the archive never published. */
export function createFakeFetch(routes: Record<string, FakeRoute>): { fetchFn: FetchLike; calls: string[] } {
  const calls: string[] = [];
  const fetchFn: FetchLike = async (url) => {
    calls.push(url);
    const route = routes[url];
    if (!route) {
      return textResponse(404, "");
    }
    if (route.delayMs) {
      await sleep(route.delayMs);
    }
    if (route.error) {
      throw route.error;
    }
    return textResponse(route.status ?? 200, route.body ?? "");
  };
  return { fetchFn, calls };
}

export function createClient(fetchFn: FetchLike, timeoutMs = 1_000): ArchiveClient {
  return new ArchiveClient({ userAgent: "test-agent test@example.com", timeoutMs, fetchFn });
}

export function createLogger(): Logger {
  return new Logger({ component: "test", runId: "run_test" });
}

export function createMetrics(): MetricsRegistry {
  return new MetricsRegistry();
}

export const TEST_MAPPING: RegistryMapping = {
  tickerToId: new Map([
    ["AAPL", "320193"],
    ["MSFT", "789019"],
  ]),
  idToTicker: new Map([
    ["320193", "AAPL"],
    ["789019", "MSFT"],
  ]),
};

export function indexLine(cik: string, name: string, form: string, accession: string): string {
  return `${cik}|${name}|${form}|20240502|edgar/data/${cik}/${accession}.txt`;
}

export function matchedFiling(cik: string, name: string, form: string, accession: string): MatchedFiling {
  const record = buildRecord(indexLine(cik, name, form, accession).split("|"), ARCHIVE);
  return attachTickers([record], TEST_MAPPING)[0];
}

export interface BundleDocument {
  type: string;
  filename?: string;
  sequence?: number;
  text?: string;
}

export function buildBundle(documents: BundleDocument[]): string {
  const blocks = documents.map((doc) => {
    const lines = ["<DOCUMENT>", `<TYPE>${doc.type}`];
    if (doc.sequence !== undefined) {
      lines.push(`<SEQUENCE>${doc.sequence}`);
    }
    if (doc.filename !== undefined) {
      lines.push(`<FILENAME>${doc.filename}`);
    }
    lines.push("<TEXT>", doc.text ?? "body", "</TEXT>", "</DOCUMENT>");
    return lines.join("\n");
  });
  return `<SEC-DOCUMENT>\n${blocks.join("\n")}\n</SEC-DOCUMENT>\n`;
}

export function makeTempDir(prefix = "edgar-item-watch-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}
