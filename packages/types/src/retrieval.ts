export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface UpsertBatch {
  ids: string[];
  documents: string[];
  embeddings: number[][];
  metadatas: Record<string, unknown>[];
}

export interface RetrievalHit {
  id: string;
  document: string;
  metadata: Record<string, unknown>;
  /** Similarity-inverse score; lower is closer. */
  distance: number;
}

export type AnswerMode = "qa" | "gaps";

export interface AnswerResult {
  question: string;
  answer: string;
  sources: RetrievalHit[];
}
