export interface Page {
  /** 1-based page number. */
  index: number;
  text: string;
}

export interface DocumentMetadata {
  title: string;
  authors: string;
  subject: string;
  keywords: string;
  year: string;
}

/**
 * Embedded document information plus page count, as read from the PDF trailer.
 * Keys follow the PDF info dictionary (`Title`, `Author`, `CreationDate`, ...).
 */
export interface RawDocument {
  pageCount: number;
  info: Record<string, unknown>;
}

export type DocumentSource =
  | { kind: "buffer"; filename: string; data: Uint8Array }
  | { kind: "file"; path: string }
  | { kind: "url"; url: string };
