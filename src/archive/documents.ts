import { ArchiveClient } from "../core/archiveClient";

/** Raw submission text; empty when the archive withholds the bundle. */
export async function fetchFilingContent(client: ArchiveClient, rawUrl: string): Promise<string> {
  return client.getTextOrEmpty(rawUrl);
}
