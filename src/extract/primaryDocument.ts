const DOCUMENT_END = /<\/DOCUMENT>/i;
const TYPE_TAG = /<TYPE>\s*([^\n<]+)/i;
const FILENAME_TAG = /<FILENAME>\s*([^\n<]+)/i;
const SEQUENCE_TAG = /<SEQUENCE>\s*(\d+)/i;
const HTML_EXTENSION = /\.html?$/;

export const MISSING_SEQUENCE = 9999;

export interface DocumentCandidate {
  type: string;
  filename: string;
  sequence: number;
  isHtml: boolean;
}

type Rank = [typeMismatch: number, nonHtml: number, sequence: number];

/** Amended forms ("8-K/A") also accept a document declared as the base form. */
export function acceptedDocumentTypes(formType: string): Set<string> {
  const upper = formType.toUpperCase();
  const accepted = new Set([upper]);
  if (upper.endsWith("/A")) {
    accepted.add(upper.replace("/A", ""));
  }
  return accepted;
}

export function parseDocumentCandidates(submission: string): DocumentCandidate[] {
  const candidates: DocumentCandidate[] = [];

  for (const block of submission.split(DOCUMENT_END)) {
    const type = TYPE_TAG.exec(block);
    const filename = FILENAME_TAG.exec(block);
    if (!type || !filename) {
      continue;
    }

    const sequence = SEQUENCE_TAG.exec(block);
    const name = filename[1].trim();
    candidates.push({
      type: type[1].trim().toUpperCase(),
      filename: name,
      sequence: sequence ? Number.parseInt(sequence[1], 10) : MISSING_SEQUENCE,
      isHtml: HTML_EXTENSION.test(name.toLowerCase()),
    });
  }

  return candidates;
}

function rankCandidate(candidate: DocumentCandidate, accepted: ReadonlySet<string>): Rank {
  return [accepted.has(candidate.type) ? 0 : 1, candidate.isHtml ? 0 : 1, candidate.sequence];
}

function compareRanks(a: Rank, b: Rank): number {
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return 0;
}

/**
 * Picks the document a reader wants from a full submission: the declared form
 * itself in HTML, else any HTML document, else the lowest sequence number.
 */
export function selectPrimaryDocument(submission: string, formType: string): string | undefined {
  if (!submission) {
    return undefined;
  }

  const accepted = acceptedDocumentTypes(formType);
  const ranked = parseDocumentCandidates(submission)
    .map((candidate) => ({ candidate, rank: rankCandidate(candidate, accepted) }))
    .sort((a, b) => compareRanks(a.rank, b.rank));

  return ranked[0]?.candidate.filename;
}
