import { ArchiveClient } from "../core/archiveClient";
import { IndexRecord } from "../types";

const FIELD_SEPARATOR = "|";
const MIN_FIELDS = 5;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatIndexDate(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function formatReportDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function quarterOf(date: Date): number {
  return Math.floor(date.getMonth() / 3) + 1;
}

export function buildDailyIndexUrl(archiveBaseUrl: string, date: Date): string {
  return `${archiveBaseUrl}/edgar/daily-index/${date.getFullYear()}/QTR${quarterOf(date)}/master.${formatIndexDate(date)}.idx`;
}

export function accessionFromPath(filename: string): string {
  const segments = filename.split("/");
  return segments[segments.length - 1].replace(/\.txt$/, "");
}

export function buildRecord(fields: string[], archiveBaseUrl: string): IndexRecord {
  const [cik, companyName, formType, dateFiled, filename] = fields;
  const accession = accessionFromPath(filename);
  const directoryUrl = `${archiveBaseUrl}/edgar/data/${cik}/${accession.replace(/-/g, "")}/`;

  return {
    cik,
    companyName,
    formType,
    dateFiled,
    filename,
    accession,
    directoryUrl,
    indexUrl: `${directoryUrl}${accession}-index.html`,
    rawUrl: `${archiveBaseUrl}/${filename}`,
  };
}

/**
 * The preamble and the dashed rule have fewer than five `|`-separated fields
 * and are skipped. The column header line is kept; its "CIK" never matches.
 */
export function parseDailyIndex(body: string, archiveBaseUrl: string): IndexRecord[] {
  const records: IndexRecord[] = [];

  for (const line of body.split(/\r?\n/)) {
    if (!line.includes(FIELD_SEPARATOR)) {
      continue;
    }
    const fields = line.split(FIELD_SEPARATOR);
    if (fields.length < MIN_FIELDS) {
      continue;
    }
    records.push(buildRecord(fields.slice(0, MIN_FIELDS), archiveBaseUrl));
  }

  return records;
}

export async function fetchDailyIndex(client: ArchiveClient, archiveBaseUrl: string, date: Date): Promise<IndexRecord[]> {
  const body = await client.getTextOrEmpty(buildDailyIndexUrl(archiveBaseUrl, date));
  return parseDailyIndex(body, archiveBaseUrl);
}
