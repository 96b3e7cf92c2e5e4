import { MatchedFiling } from "../types";
import { escapeHtml as esc } from "./escape";
import { REPORT_STYLES } from "./styles";

export const LOGO_FILE = "android-chrome-192x192.png";
export const FAVICON_FILE = "favicon-32x32.png";

export interface ReportOptions {
  reportDate: string;
  title: string;
  /** Folder next to the report holding the copied assets, if any were copied. */
  assetsRel?: string;
  priorityItems: readonly string[];
}

export function hasPriorityItem(filing: MatchedFiling): boolean {
  return (filing.items ?? []).some((item) => item.isPriority);
}

function renderItems(filing: MatchedFiling): string {
  const items = filing.items ?? [];
  if (items.length === 0) {
    return `                <p class="no-items">Could not extract item details</p>\n`;
  }

  return items
    .map(
      (item) => `
                <div class="item${item.isPriority ? " priority" : ""}">
                    <div class="item-header">Item ${esc(item.item)}: ${esc(item.description)}</div>
                    <div class="item-context">${esc(item.context)}</div>
                </div>
`,
    )
    .join("");
}

export function renderFiling(filing: MatchedFiling, isPriority: boolean): string {
  return `
        <div class="filing${isPriority ? " priority" : ""}">
            <div class="filing-header">
                <div class="company-info">
                    <h3><span class="ticker">${esc(filing.ticker)}</span> ${esc(filing.companyName)}</h3>
                    <div class="cik">CIK: ${esc(filing.cik)} · Filed: ${esc(filing.dateFiled)}</div>
                </div>
                <span class="form-type">${esc(filing.formType)}</span>
            </div>
            <div class="items">
${renderItems(filing)}            </div>
            <a class="filing-link" href="${esc(filing.url)}" target="_blank" rel="noopener">View Full Filing →</a>
            <a class="filing-link" href="${esc(filing.indexUrl)}" target="_blank" rel="noopener">All documents</a>
        </div>
`;
}

function renderAssetLinks(assetsRel: string | undefined): string {
  if (!assetsRel) {
    return "";
  }
  return `
    <link rel="icon" type="image/png" sizes="32x32" href="${esc(`${assetsRel}/${FAVICON_FILE}`)}">
    <link rel="icon" type="image/png" sizes="192x192" href="${esc(`${assetsRel}/${LOGO_FILE}`)}">
    <link rel="apple-touch-icon" sizes="180x180" href="${esc(`${assetsRel}/${LOGO_FILE}`)}">
`;
}

function renderSection(kind: "priority" | "other", heading: string, filings: readonly MatchedFiling[]): string {
  if (filings.length === 0) {
    return "";
  }
  const cards = filings.map((filing) => renderFiling(filing, kind === "priority")).join("");
  return `
    <div class="${kind}-section">
        <h2>${heading} <span class="${kind}-badge">${filings.length}</span></h2>
${cards}    </div>
`;
}

/** Filings with at least one priority item are listed first, in their own section. */
export function renderReport(filings: readonly MatchedFiling[], options: ReportOptions): string {
  const priorityFilings = filings.filter(hasPriorityItem);
  const otherFilings = filings.filter((filing) => !hasPriorityItem(filing));
  const formsPresent = [...new Set(filings.map((filing) => filing.formType))].sort().join(", ");
  const logo = options.assetsRel
    ? `<img class="logo" src="${esc(`${options.assetsRel}/${LOGO_FILE}`)}" alt="logo">`
    : "";

  const body =
    filings.length === 0
      ? `    <div class="no-filings">No filings found for your criteria.</div>\n`
      : renderSection("priority", "Priority 8-K Filings", priorityFilings) +
        renderSection("other", "Other Filings", otherFilings);

  return `<!DOCTYPE html>
<html>
<head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${esc(options.title)} - ${esc(options.reportDate)}</title>
${renderAssetLinks(options.assetsRel)}
    <style>${REPORT_STYLES}    </style>
</head>
<body>
    <div class="header">
        ${logo}
        <h1>${esc(options.title)}</h1>
    </div>
    <div class="summary">
        <p><strong>Date:</strong> ${esc(options.reportDate)}</p>
        <p><strong>Total Filings:</strong> ${filings.length}</p>
        <p><strong>Forms (present):</strong> ${formsPresent ? esc(formsPresent) : "—"}</p>
        <p><strong>Priority 8-K Filings:</strong> ${priorityFilings.length} (8-K Items: ${esc(options.priorityItems.join(", "))})</p>
    </div>
${body}
</body>
</html>
`;
}
