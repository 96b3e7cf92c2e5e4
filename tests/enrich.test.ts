import { describe, expect, it } from "vitest";
import { FetchLike } from "../src/core/archiveClient";
import { TransportError } from "../src/core/errors";
import { enrichFiling, enrichFilings, needsItemExtraction } from "../src/extract";
import { buildBundle, createClient, createFakeFetch, createLogger, createMetrics, matchedFiling } from "./helpers";

const APPLE_8K = matchedFiling("320193", "Apple Inc.", "8-K", "0000320193-24-000050");
const APPLE_PROXY = matchedFiling("320193", "Apple Inc.", "DEF 14A", "0000320193-24-000051");
const MSFT_8K = matchedFiling("789019", "MICROSOFT CORP", "8-K", "0000950170-24-000111");

const APPLE_BUNDLE = buildBundle([
  { type: "8-K", sequence: 1, filename: "form8k.htm", text: "Item 5.02 Departure of a director\nItem 9.01 Exhibits" },
  { type: "EX-99.1", sequence: 2, filename: "ex99.htm" },
]);

function deps(fetchFn: FetchLike, extra: { concurrency?: number; continueOnError?: boolean } = {}) {
  return {
    client: createClient(fetchFn),
    logger: createLogger(),
    metrics: createMetrics(),
    ...extra,
  };
}

describe("needsItemExtraction", () => {
  it("covers 8-K forms and their amendments", () => {
    expect(["8-K", "8-K/A", "DEF 14A", "10-K"].map(needsItemExtraction)).toEqual([true, true, false, false]);
  });
});

describe("enrichFiling", () => {
  it("leaves other forms alone without fetching", async () => {
    const { fetchFn, calls } = createFakeFetch({});

    const enriched = await enrichFiling(APPLE_PROXY, deps(fetchFn));

    expect(calls).toEqual([]);
    expect(enriched.items).toEqual([]);
    expect(enriched.url).toBe(APPLE_PROXY.indexUrl);
  });

  it("extracts items and links the primary document", async () => {
    const { fetchFn, calls } = createFakeFetch({ [APPLE_8K.rawUrl]: { body: APPLE_BUNDLE } });
    const enrichDeps = deps(fetchFn);

    const enriched = await enrichFiling(APPLE_8K, enrichDeps);

    expect(calls).toEqual([APPLE_8K.rawUrl]);
    expect(enriched.items?.map((item) => [item.item, item.isPriority])).toEqual([
      ["5.02", true],
      ["9.01", false],
    ]);
    expect(enriched.url).toBe(`${APPLE_8K.directoryUrl}form8k.htm`);
    expect(enrichDeps.metrics.getCounters()).toMatchObject({ documents_fetched: 1, items_extracted: 2 });
    expect(APPLE_8K.items).toBeUndefined();
  });

  it("falls back to the index page when the bundle is missing", async () => {
    const { fetchFn } = createFakeFetch({});
    const enrichDeps = deps(fetchFn);

    const enriched = await enrichFiling(APPLE_8K, enrichDeps);

    expect(enriched.items).toEqual([]);
    expect(enriched.url).toBe(APPLE_8K.indexUrl);
    expect(enrichDeps.metrics.getCounters()).toMatchObject({ documents_fetched: 0, documents_empty: 1 });
  });
});

describe("enrichFilings", () => {
  it("keeps input order whatever order the fetches finish in", async () => {
    const { fetchFn } = createFakeFetch({
      [APPLE_8K.rawUrl]: { body: APPLE_BUNDLE, delayMs: 30 },
      [MSFT_8K.rawUrl]: { body: buildBundle([{ type: "8-K", filename: "msft.htm", text: "Item 2.02 Results" }]), delayMs: 5 },
    });

    const enriched = await enrichFilings([APPLE_8K, APPLE_PROXY, MSFT_8K], deps(fetchFn, { concurrency: 3 }));

    expect(enriched.map((filing) => filing.accession)).toEqual([
      "0000320193-24-000050",
      "0000320193-24-000051",
      "0000950170-24-000111",
    ]);
    expect(enriched[2].items?.map((item) => item.item)).toEqual(["2.02"]);
    expect(enriched[2].url).toBe(`${MSFT_8K.directoryUrl}msft.htm`);
  });

  it("stops on a failed fetch by default", async () => {
    const { fetchFn } = createFakeFetch({ [APPLE_8K.rawUrl]: { status: 500 } });

    await expect(enrichFilings([APPLE_8K, MSFT_8K], deps(fetchFn))).rejects.toBeInstanceOf(TransportError);
  });

  it("reports failed filings without items when asked to continue", async () => {
    const { fetchFn } = createFakeFetch({
      [APPLE_8K.rawUrl]: { status: 500 },
      [MSFT_8K.rawUrl]: { body: buildBundle([{ type: "8-K", filename: "msft.htm", text: "Item 2.02 Results" }]) },
    });
    const enrichDeps = deps(fetchFn, { continueOnError: true });

    const enriched = await enrichFilings([APPLE_8K, MSFT_8K], enrichDeps);

    expect(enriched[0].items).toEqual([]);
    expect(enriched[0].url).toBe(APPLE_8K.indexUrl);
    expect(enriched[1].items?.map((item) => item.item)).toEqual(["2.02"]);
    expect(enrichDeps.metrics.getCounters().filings_failed).toBe(1);
  });
});
