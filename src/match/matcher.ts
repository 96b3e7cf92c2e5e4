import { IndexRecord, MatchedFiling, RegistryMapping, UNKNOWN_TICKER } from "../types";

/** Exact-membership filter; identifiers and form labels are compared as published. */
export function matchFilings(
  records: readonly IndexRecord[],
  acceptedIds: ReadonlySet<string>,
  acceptedTypes: ReadonlySet<string>,
): IndexRecord[] {
  return records.filter((record) => acceptedTypes.has(record.formType) && acceptedIds.has(record.cik));
}

export function attachTickers(records: readonly IndexRecord[], mapping: RegistryMapping): MatchedFiling[] {
  return records.map((record) => ({
    ...record,
    ticker: mapping.idToTicker.get(record.cik) ?? UNKNOWN_TICKER,
    url: record.indexUrl,
  }));
}
