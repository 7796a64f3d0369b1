import type { RetrievalHit, UpsertBatch } from "@gapscout/types";
import { ValidationError } from "@gapscout/errors";
import type { IVectorIndex } from "./vector-store.interface.js";
import { assertUpsertBatch } from "./upsert-batch.js";

interface StoredRecord {
  document: string;
  embedding: number[];
  metadata: Record<string, unknown>;
}

function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Process-local index with exact cosine search. Collections are created on
 * first write; querying an unknown collection returns no hits.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  private readonly collections = new Map<string, Map<string, StoredRecord>>();

  async upsert(collectionName: string, batch: UpsertBatch): Promise<void> {
    assertUpsertBatch(batch);
    const collection = this.collection(collectionName);

    batch.ids.forEach((id, i) => {
      collection.set(id, {
        document: batch.documents[i] ?? "",
        embedding: batch.embeddings[i] ?? [],
        metadata: { ...batch.metadatas[i] },
      });
    });
  }

  async query(collectionName: string, vector: number[], k: number): Promise<RetrievalHit[]> {
    const collection = this.collections.get(collectionName);
    if (!collection) return [];

    const hits: RetrievalHit[] = [];
    for (const [id, record] of collection) {
      if (record.embedding.length !== vector.length) {
        throw new ValidationError("Query vector dimension does not match the collection", {
          expected: String(record.embedding.length),
          received: String(vector.length),
        });
      }
      hits.push({
        id,
        document: record.document,
        metadata: { ...record.metadata },
        distance: cosineDistance(vector, record.embedding),
      });
    }

    return hits.sort((a, b) => a.distance - b.distance).slice(0, Math.max(0, k));
  }

  async deleteByDocId(collectionName: string, docId: string): Promise<void> {
    const collection = this.collections.get(collectionName);
    if (!collection) return;

    for (const [id, record] of collection) {
      if (record.metadata["docId"] === docId) collection.delete(id);
    }
  }

  async ensureCollection(collectionName: string, _dimensions: number): Promise<void> {
    this.collection(collectionName);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of records in a collection; 0 for an unknown one. */
  size(collectionName: string): number {
    return this.collections.get(collectionName)?.size ?? 0;
  }

  private collection(name: string): Map<string, StoredRecord> {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new Map();
      this.collections.set(name, collection);
    }
    return collection;
  }
}
