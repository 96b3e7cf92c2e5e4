/** One row of the archive's daily master index, with the URLs derived from it. */
export interface IndexRecord {
  cik: string;
  companyName: string;
  formType: string;
  dateFiled: string;
  /** Relative path of the raw submission, e.g. `edgar/data/320193/0000320193-24-000050.txt`. */
  filename: string;
  accession: string;
  directoryUrl: string;
  indexUrl: string;
  rawUrl: string;
}

export interface ItemDisclosure {
  item: string;
  description: string;
  context: string;
  isPriority: boolean;
}

export interface MatchedFiling extends IndexRecord {
  ticker: string;
  /** Browser-facing link: the index page until a primary document is found. */
  url: string;
  /** Absent until the filing has been enriched; empty when nothing was extracted. */
  items?: ItemDisclosure[];
}

export interface RegistryMapping {
  tickerToId: ReadonlyMap<string, string>;
  idToTicker: ReadonlyMap<string, string>;
}

export const UNKNOWN_TICKER = "???";
