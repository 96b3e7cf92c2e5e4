import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors";

const rowsSchema = z.array(z.array(z.string()));

function readRows(csvPath: string): string[][] {
  let content: string;
  try {
    content = fs.readFileSync(csvPath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Could not read watchlist ${csvPath}: ${errorMessage(error)}`, { cause: error });
  }

  let rows: unknown;
  try {
    rows = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });
  } catch (error) {
    throw new ConfigError(`Could not parse watchlist ${csvPath}: ${errorMessage(error)}`, { cause: error });
  }
  return rowsSchema.parse(rows);
}

/**
 * Tickers from the named column, or from the first column when the header has
 * no such name. Values are upper-cased; blanks are skipped.
 */
export function loadWatchlist(csvPath: string, columnName = "Ticker"): Set<string> {
  const absolutePath = path.resolve(csvPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Ticker CSV not found: ${csvPath}. Create a CSV with a '${columnName}' column (e.g. AAPL, MSFT).`);
  }

  const [header, ...rows] = readRows(absolutePath);
  const tickers = new Set<string>();
  if (!header) {
    return tickers;
  }

  const columnIndex = Math.max(header.indexOf(columnName), 0);
  for (const row of rows) {
    const ticker = (row[columnIndex] ?? "").trim().toUpperCase();
    if (ticker) {
      tickers.add(ticker);
    }
  }
  return tickers;
}
