import fs from "node:fs";
import path from "node:path";
import { MatchedFiling } from "../types";
import { renderReport } from "./renderReport";

export interface WriteReportOptions {
  outputPath: string;
  reportDate: string;
  title: string;
  assetsDir?: string;
  priorityItems: readonly string[];
}

export function defaultReportPath(reportDate: string): string {
  return `sec_report_${reportDate}.html`;
}

/**
 * Copies the regular files of `assetsDir` into a same-named folder beside the
 * report and returns that folder name, or undefined when there is nothing to copy.
 */
export async function copyAssets(assetsDir: string | undefined, outputPath: string): Promise<string | undefined> {
  if (!assetsDir) {
    return undefined;
  }

  const source = path.resolve(assetsDir);
  if (!fs.existsSync(source) || !fs.statSync(source).isDirectory()) {
    return undefined;
  }

  const folderName = path.basename(source);
  const destination = path.join(path.dirname(path.resolve(outputPath)), folderName);
  await fs.promises.mkdir(destination, { recursive: true });

  const entries = await fs.promises.readdir(source, { withFileTypes: true });
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const from = path.join(source, entry.name);
    const to = path.join(destination, entry.name);
    if (from !== to) {
      await fs.promises.copyFile(from, to);
    }
  }

  return folderName;
}

export async function writeReport(filings: readonly MatchedFiling[], options: WriteReportOptions): Promise<string> {
  const outputPath = path.resolve(options.outputPath);
  const assetsRel = await copyAssets(options.assetsDir, outputPath);
  const html = renderReport(filings, {
    reportDate: options.reportDate,
    title: options.title,
    assetsRel,
    priorityItems: options.priorityItems,
  });

  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.writeFile(outputPath, html, "utf-8");
  return outputPath;
}
