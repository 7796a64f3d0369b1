import { QdrantClient } from "@qdrant/js-client-rest";
import { v5 as uuidv5 } from "uuid";
import type { RetrievalHit, UpsertBatch } from "@gapscout/types";
import type { IVectorIndex } from "./vector-store.interface.js";
import { assertUpsertBatch } from "./upsert-batch.js";

const BATCH_SIZE = 100;

/** Namespace for deriving Qdrant point UUIDs from chunk ids. */
const POINT_ID_NAMESPACE = "3b2f6c1e-8d4a-4f0b-9c7e-5a1d2e3f4b6c";

interface QdrantPoint {
  id: string;
  vector: number[];
  payload: Record<string, unknown>;
}

interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}

/** The calls this adapter makes on a Qdrant client. */
export interface QdrantIndexClient {
  upsert(collectionName: string, args: { wait?: boolean; points: QdrantPoint[] }): Promise<unknown>;
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; with_payload?: boolean },
  ): Promise<QdrantScoredPoint[]>;
  delete(
    collectionName: string,
    args: { wait?: boolean; filter: { must: Array<{ key: string; match: { value: string } }> } },
  ): Promise<unknown>;
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: "Cosine" } },
  ): Promise<unknown>;
  createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: "keyword" | "integer" },
  ): Promise<unknown>;
}

/** The REST client rejects with an error carrying the HTTP status. */
function hasStatus(err: unknown, status: number): boolean {
  return typeof err === "object" && err !== null && "status" in err && err.status === status;
}

/** Qdrant only accepts UUIDs or unsigned integers as point ids. */
export function pointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

export class QdrantVectorIndex implements IVectorIndex {
  private client: QdrantIndexClient;

  constructor(url: string, apiKey?: string, client?: QdrantIndexClient) {
    this.client = client ?? new QdrantClient({ url, apiKey });
  }

  async upsert(collectionName: string, batch: UpsertBatch): Promise<void> {
    assertUpsertBatch(batch);

    const points: QdrantPoint[] = batch.ids.map((id, i) => ({
      id: pointId(id),
      vector: batch.embeddings[i] ?? [],
      payload: {
        ...batch.metadatas[i],
        chunkId: id,
        document: batch.documents[i] ?? "",
      },
    }));

    for (let i = 0; i < points.length; i += BATCH_SIZE) {
      await this.client.upsert(collectionName, {
        wait: true,
        points: points.slice(i, i + BATCH_SIZE),
      });
    }
  }

  async query(collectionName: string, vector: number[], k: number): Promise<RetrievalHit[]> {
    let results: QdrantScoredPoint[];
    try {
      results = await this.client.search(collectionName, {
        vector,
        limit: k,
        with_payload: true,
      });
    } catch (err: unknown) {
      // Nothing has been ingested into this collection yet.
      if (hasStatus(err, 404)) return [];
      throw err;
    }

    return results
      .map((r) => {
        const payload: Record<string, unknown> = r.payload ?? {};
        const { chunkId, document, ...metadata } = payload;
        return {
          id: typeof chunkId === "string" ? chunkId : String(r.id),
          document: typeof document === "string" ? document : "",
          metadata,
          distance: 1 - r.score,
        };
      })
      .sort((a, b) => a.distance - b.distance);
  }

  async deleteByDocId(collectionName: string, docId: string): Promise<void> {
    const { exists } = await this.client.collectionExists(collectionName);
    if (!exists) return;

    await this.client.delete(collectionName, {
      wait: true,
      filter: { must: [{ key: "docId", match: { value: docId } }] },
    });
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    const { exists } = await this.client.collectionExists(collectionName);
    if (exists) return;

    try {
      await this.client.createCollection(collectionName, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
      });
    } catch (err: unknown) {
      // A concurrent ingest created it first.
      const { exists: createdElsewhere } = await this.client.collectionExists(collectionName);
      if (!createdElsewhere) throw err;
      return;
    }

    await this.client.createPayloadIndex(collectionName, {
      field_name: "docId",
      field_schema: "keyword",
    });
    await this.client.createPayloadIndex(collectionName, {
      field_name: "section",
      field_schema: "keyword",
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
