import type { DocumentMetadata } from "./document.js";
import type { SectionName } from "./section.js";

export interface ChunkingConfig {
  /** Maximum passage length in characters. */
  chunkSize: number;
  /** Characters carried over from the end of one passage into the next. */
  chunkOverlap: number;
  separators?: string[];
}

export interface ChunkProvenance {
  section: SectionName;
  pageStart: number;
  pageEnd: number;
  chunkIndex: number;
}

export interface ChunkingResult {
  chunks: string[];
  provenance: ChunkProvenance[];
}

export interface Chunk extends ChunkProvenance {
  id: string;
  docId: string;
  text: string;
}

/** Flat, index-friendly metadata stored next to every chunk vector. */
export interface ChunkMetadata extends DocumentMetadata, ChunkProvenance {
  docId: string;
  sourceFile: string;
}

export function chunkId(docId: string, chunkIndex: number): string {
  return `${docId}_chunk_${String(chunkIndex)}`;
}
