export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  date?: string;
  accession?: string;
  ticker?: string;
  formType?: string;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "index_fetches"
  | "index_records_parsed"
  | "filings_matched"
  | "documents_fetched"
  | "documents_empty"
  | "items_extracted"
  | "filings_failed";

export type MetricTimerName = "index_fetch_ms" | "document_fetch_ms";
