import type { DocumentMetadata, RawDocument } from "@gapscout/types";

const MAX_CANDIDATE_CHARS = 200;
const YEAR_PATTERN = /(19|20)\d{2}/;
const AUTHOR_LIST_PATTERN = /(,| and )/i;
const YEAR_INFO_KEYS = ["ModDate", "CreationDate", "Producer", "Creator"] as const;

function infoString(info: Record<string, unknown>, key: string): string {
  const value = info[key];
  return typeof value === "string" ? value.trim() : "";
}

function findYear(text: string): string {
  return YEAR_PATTERN.exec(text)?.[0] ?? "";
}

/**
 * Bibliographic fields for a document. Embedded info wins; a missing title or
 * author list is guessed from the first lines of the first page, and the year
 * comes from the first date-like info entry or, failing that, the first page.
 */
export function resolveMetadata(document: RawDocument, firstPageText: string): DocumentMetadata {
  const { info } = document;

  let title = infoString(info, "Title");
  let authors = infoString(info, "Author");

  if (!title || !authors) {
    const lines = firstPageText
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const [firstLine, secondLine] = lines;
    if (!title && firstLine !== undefined) {
      title = firstLine.slice(0, MAX_CANDIDATE_CHARS);
    }
    if (!authors && secondLine !== undefined && AUTHOR_LIST_PATTERN.test(secondLine)) {
      authors = secondLine.slice(0, MAX_CANDIDATE_CHARS);
    }
  }

  let year = "";
  for (const key of YEAR_INFO_KEYS) {
    year = findYear(infoString(info, key));
    if (year) break;
  }
  if (!year) year = findYear(firstPageText);

  return {
    title,
    authors,
    subject: infoString(info, "Subject"),
    keywords: infoString(info, "Keywords"),
    year,
  };
}
