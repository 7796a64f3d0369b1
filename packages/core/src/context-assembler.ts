export const NO_CONTEXT = "No context available.";
export const DEFAULT_MAX_SOURCE_CHARS = 4000;

export interface ContextOptions {
  /** Longer documents are cut to this many characters and marked with " ...". */
  maxSourceChars?: number;
}

/**
 * Label ranked documents `[Source 1]`, `[Source 2]`, ... in the order given
 * and join them with blank lines. Never returns an empty string.
 */
export function assembleContext(documents: readonly string[], options: ContextOptions = {}): string {
  if (documents.length === 0) return NO_CONTEXT;

  const maxChars = options.maxSourceChars ?? DEFAULT_MAX_SOURCE_CHARS;

  return documents
    .map((doc, i) => {
      const snippet = doc.length <= maxChars ? doc : `${doc.slice(0, maxChars)} ...`;
      return `[Source ${String(i + 1)}]\n${snippet}`;
    })
    .join("\n\n");
}
