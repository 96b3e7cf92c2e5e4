import { ItemDisclosure } from "../types";
import { DEFAULT_ITEM_CATALOG, describeItem, ItemCatalog } from "./catalog";

export const CONTEXT_WINDOW = 500;
export const CONTEXT_LIMIT = 300;
export const CONTINUATION_MARKER = "...";

// "Item 5.02:", "ITEM 2.02 -", "Item 8.01—" and the rest of that line.
const ITEM_HEADING = /item\s*(\d+\.\d+)[:\s\-—]+([^\n]+)?/gi;

const COMPLETE_TAG = /<[^>]+>/g;
const TRAILING_PARTIAL_TAG = /<[^>]*$/;
const WHITESPACE_RUN = /\s+/g;

/** At most `limit` code points, so astral characters are never split. */
function takeCodePoints(text: string, limit: number): string {
  return Array.from(text).slice(0, limit).join("");
}

/**
 * Plain-text snippet of a fixed-width window. The window may end inside a
 * tag, so an unterminated `<...` tail is dropped after complete tags are.
 */
export function cleanContext(window: string): string {
  const text = window
    .replace(COMPLETE_TAG, " ")
    .replace(TRAILING_PARTIAL_TAG, " ")
    .replace(WHITESPACE_RUN, " ")
    .trim();

  const truncated = takeCodePoints(text, CONTEXT_LIMIT);
  if (truncated.length < text.length) {
    return `${truncated}${CONTINUATION_MARKER}`;
  }
  return text;
}

export function extractItems(content: string, catalog: ItemCatalog = DEFAULT_ITEM_CATALOG): ItemDisclosure[] {
  if (!content) {
    return [];
  }

  const items: ItemDisclosure[] = [];
  const seen = new Set<string>();

  for (const match of content.matchAll(ITEM_HEADING)) {
    const item = match[1];
    if (seen.has(item)) {
      continue;
    }
    seen.add(item);

    const start = (match.index ?? 0) + match[0].length;
    // A code point spans at most two code units.
    const window = takeCodePoints(content.slice(start, start + CONTEXT_WINDOW * 2), CONTEXT_WINDOW);

    items.push({
      item,
      description: describeItem(catalog, item),
      context: cleanContext(window),
      isPriority: catalog.priority.has(item),
    });
  }

  // Numeric, not dotted-decimal: "5.2" and "5.20" compare equal.
  return items.sort((a, b) => Number.parseFloat(a.item) - Number.parseFloat(b.item));
}
