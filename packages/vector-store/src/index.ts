import type { VectorStoreSettings } from "@gapscout/types";
import type { IVectorIndex } from "./vector-store.interface.js";
import { QdrantVectorIndex } from "./qdrant-adapter.js";
import { InMemoryVectorIndex } from "./in-memory-index.js";

export type { IVectorIndex } from "./vector-store.interface.js";
export { QdrantVectorIndex, pointId } from "./qdrant-adapter.js";
export type { QdrantIndexClient } from "./qdrant-adapter.js";
export { InMemoryVectorIndex } from "./in-memory-index.js";
export { assertUpsertBatch } from "./upsert-batch.js";

export function createVectorIndex(settings: VectorStoreSettings): IVectorIndex {
  switch (settings.type) {
    case "qdrant":
      if (!settings.qdrantUrl) {
        throw new Error("qdrantUrl is required for the Qdrant vector index");
      }
      return new QdrantVectorIndex(settings.qdrantUrl, settings.qdrantApiKey);
    case "memory":
      return new InMemoryVectorIndex();
    default:
      throw new Error(`Unknown vector store type: ${String(settings.type)}`);
  }
}
