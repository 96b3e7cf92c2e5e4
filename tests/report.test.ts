import fs from "node:fs";
import path from "node:path";
import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import { defaultReportPath, escapeHtml, renderReport, writeReport } from "../src/report";
import { MatchedFiling } from "../src/types";
import { makeTempDir, matchedFiling } from "./helpers";

const PRIORITY_ITEMS = ["1.01", "2.05", "5.01", "5.02"];

const APPLE: MatchedFiling = {
  ...matchedFiling("320193", "Apple Inc.", "8-K", "0000320193-24-000050"),
  url: "https://archive.test/Archives/edgar/data/320193/000032019324000050/form8k.htm",
  items: [
    {
      item: "5.02",
      description: "Departure/Appointment of Directors or Officers",
      context: "<script>alert(1)</script>",
      isPriority: true,
    },
    { item: "9.01", description: "Financial Statements and Exhibits", context: "Exhibit 99.1", isPriority: false },
  ],
};

const MICROSOFT: MatchedFiling = {
  ...matchedFiling("789019", "MICROSOFT CORP", "8-K", "0000950170-24-000111"),
  items: [],
};

const OPTIONS = { reportDate: "2024-05-02", title: "Test Report", priorityItems: PRIORITY_ITEMS };

describe("escapeHtml", () => {
  it("escapes markup and quotes", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;",
    );
    expect(escapeHtml(undefined)).toBe("");
    expect(escapeHtml(42)).toBe("42");
  });
});

describe("renderReport", () => {
  it("puts filings with priority items in their own section", () => {
    const $ = cheerio.load(renderReport([MICROSOFT, APPLE], OPTIONS));

    expect($(".priority-section .filing").length).toBe(1);
    expect($(".priority-section .ticker").text()).toBe("AAPL");
    expect($(".priority-section .priority-badge").text()).toBe("1");
    expect($(".other-section .filing").length).toBe(1);
    expect($(".other-section .ticker").text()).toBe("MSFT");
    expect($(".other-section .no-items").text()).toBe("Could not extract item details");
  });

  it("summarizes the run", () => {
    const $ = cheerio.load(renderReport([APPLE, MICROSOFT], OPTIONS));
    const lines = $(".summary p")
      .map((_index, element) => $(element).text())
      .get();

    expect($("title").text()).toBe("Test Report - 2024-05-02");
    expect(lines).toEqual([
      "Date: 2024-05-02",
      "Total Filings: 2",
      "Forms (present): 8-K",
      "Priority 8-K Filings: 1 (8-K Items: 1.01, 2.05, 5.01, 5.02)",
    ]);
  });

  it("renders item text as text", () => {
    const $ = cheerio.load(renderReport([APPLE], OPTIONS));

    expect($("script").length).toBe(0);
    expect($(".item.priority .item-header").text()).toBe("Item 5.02: Departure/Appointment of Directors or Officers");
    expect($(".item.priority .item-context").text()).toBe("<script>alert(1)</script>");
    expect($(".item").length).toBe(2);
  });

  it("links the primary document and the filing index", () => {
    const $ = cheerio.load(renderReport([APPLE], OPTIONS));
    const links = $(".filing-link")
      .map((_index, element) => $(element).attr("href"))
      .get();

    expect(links).toEqual([APPLE.url, APPLE.indexUrl]);
  });

  it("says so when nothing matched", () => {
    const $ = cheerio.load(renderReport([], OPTIONS));

    expect($(".no-filings").text()).toBe("No filings found for your criteria.");
    expect($(".priority-section").length).toBe(0);
    expect($(".summary p").eq(2).text()).toBe("Forms (present): —");
  });

  it("omits asset links when no assets were copied", () => {
    const $ = cheerio.load(renderReport([APPLE], OPTIONS));

    expect($('link[rel="icon"]').length).toBe(0);
    expect($("img.logo").length).toBe(0);
  });
});

describe("writeReport", () => {
  it("names reports after their date", () => {
    expect(defaultReportPath("2024-05-02")).toBe("sec_report_2024-05-02.html");
  });

  it("writes the page and copies assets beside it", async () => {
    const root = makeTempDir();
    const assetsDir = path.join(root, "static", "assets");
    fs.mkdirSync(path.join(assetsDir, "nested"), { recursive: true });
    fs.writeFileSync(path.join(assetsDir, "favicon-32x32.png"), "icon");
    fs.writeFileSync(path.join(assetsDir, "android-chrome-192x192.png"), "logo");

    const written = await writeReport([APPLE], {
      ...OPTIONS,
      outputPath: path.join(root, "out", "report.html"),
      assetsDir,
    });

    expect(written).toBe(path.join(root, "out", "report.html"));
    expect(fs.readdirSync(path.join(root, "out", "assets")).sort()).toEqual([
      "android-chrome-192x192.png",
      "favicon-32x32.png",
    ]);

    const $ = cheerio.load(fs.readFileSync(written, "utf-8"));
    expect($('link[sizes="32x32"]').attr("href")).toBe("assets/favicon-32x32.png");
    expect($("img.logo").attr("src")).toBe("assets/android-chrome-192x192.png");
  });

  it("skips assets that do not exist", async () => {
    const root = makeTempDir();

    const written = await writeReport([], {
      ...OPTIONS,
      outputPath: path.join(root, "report.html"),
      assetsDir: path.join(root, "missing"),
    });

    expect(fs.readdirSync(root)).toEqual(["report.html"]);
    expect(cheerio.load(fs.readFileSync(written, "utf-8"))("img.logo").length).toBe(0);
  });
});
