import type { DocumentMetadata } from "./document.js";
import type { SectionName } from "./section.js";

export type DocIdStrategy = "content" | "random";

export interface IngestionOptions {
  collection?: string;
  chunkSize: number;
  chunkOverlap: number;
  dpi: number;
}

export interface IngestionMeta extends DocumentMetadata {
  sourceFile: string;
  docId: string;
}

export interface IngestionResult {
  ok: boolean;
  pdf: string;
  docId: string;
  pages: number;
  sectionsDetected: SectionName[];
  sectionsIndexed: SectionName[];
  chunks: number;
  embedded: number;
  /** First chunk ids, capped. */
  ids: string[];
  collection: string;
  meta: IngestionMeta;
}
