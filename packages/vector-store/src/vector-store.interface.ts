import type { RetrievalHit, UpsertBatch } from "@gapscout/types";

export interface IVectorIndex {
  /** Insert or replace the batch's records, keyed by id. */
  upsert(collectionName: string, batch: UpsertBatch): Promise<void>;
  /** Nearest records first (ascending distance), at most `k`. */
  query(collectionName: string, vector: number[], k: number): Promise<RetrievalHit[]>;
  /** Remove every record whose `docId` metadata matches; a no-op for an unknown collection. */
  deleteByDocId(collectionName: string, docId: string): Promise<void>;
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
