import { describe, expect, it } from "vitest";
import {
  acceptedDocumentTypes,
  MISSING_SEQUENCE,
  parseDocumentCandidates,
  selectPrimaryDocument,
} from "../src/extract/primaryDocument";
import { buildBundle } from "./helpers";

describe("selectPrimaryDocument", () => {
  it("prefers the document declared as the filing's own form", () => {
    const bundle = buildBundle([
      { type: "EX-10.1", filename: "ex.htm", sequence: 2 },
      { type: "8-K", filename: "form8k.htm", sequence: 1 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K")).toBe("form8k.htm");
  });

  it("treats the unamended type as a match for an amendment", () => {
    const bundle = buildBundle([
      { type: "EX-99.1", filename: "ex99.htm", sequence: 1 },
      { type: "8-K", filename: "main.htm", sequence: 2 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K/A")).toBe("main.htm");
  });

  it("prefers an HTML rendition over plain text of the same type", () => {
    const bundle = buildBundle([
      { type: "8-K", filename: "main.txt", sequence: 1 },
      { type: "8-K", filename: "main.htm", sequence: 2 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K")).toBe("main.htm");
  });

  it("falls back to any HTML document when no type matches", () => {
    const bundle = buildBundle([
      { type: "EX-99.1", filename: "press.txt", sequence: 1 },
      { type: "GRAPHIC", filename: "logo.jpg", sequence: 2 },
      { type: "EX-99.2", filename: "deck.htm", sequence: 3 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K")).toBe("deck.htm");
  });

  it("ranks documents without a sequence after numbered ones", () => {
    const bundle = buildBundle([
      { type: "EX-1", filename: "a.htm" },
      { type: "EX-2", filename: "b.htm", sequence: 5 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K")).toBe("b.htm");
  });

  it("skips blocks that declare no filename", () => {
    const bundle = buildBundle([
      { type: "8-K", sequence: 1 },
      { type: "EX-99", filename: "x.htm", sequence: 2 },
    ]);

    expect(selectPrimaryDocument(bundle, "8-K")).toBe("x.htm");
  });

  it("returns undefined for empty content or bundles without descriptors", () => {
    expect(selectPrimaryDocument("", "8-K")).toBeUndefined();
    expect(selectPrimaryDocument("<html><body>plain page</body></html>", "8-K")).toBeUndefined();
  });

  it("reads descriptors case-insensitively", () => {
    const bundle = "<document>\n<type>8-k\n<sequence>3\n<filename>lower.HTML\n</document>\n";

    expect(parseDocumentCandidates(bundle)).toEqual([
      { type: "8-K", filename: "lower.HTML", sequence: 3, isHtml: true },
    ]);
    expect(selectPrimaryDocument(bundle, "8-K")).toBe("lower.HTML");
  });
});

describe("parseDocumentCandidates", () => {
  it("defaults a missing sequence to the sentinel", () => {
    const candidates = parseDocumentCandidates(buildBundle([{ type: "EX-99.1", filename: "ex.txt" }]));

    expect(candidates).toEqual([{ type: "EX-99.1", filename: "ex.txt", sequence: MISSING_SEQUENCE, isHtml: false }]);
  });
});

describe("acceptedDocumentTypes", () => {
  it("adds the base form for amendments only", () => {
    expect([...acceptedDocumentTypes("8-K/A")]).toEqual(["8-K/A", "8-K"]);
    expect([...acceptedDocumentTypes("def 14a")]).toEqual(["DEF 14A"]);
  });
});
