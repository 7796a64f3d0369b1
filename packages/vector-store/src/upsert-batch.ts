import type { UpsertBatch } from "@gapscout/types";
import { ValidationError } from "@gapscout/errors";

/** Parallel arrays must line up and ids must be unique within the batch. */
export function assertUpsertBatch(batch: UpsertBatch): void {
  const { ids, documents, embeddings, metadatas } = batch;
  const lengths = {
    ids: ids.length,
    documents: documents.length,
    embeddings: embeddings.length,
    metadatas: metadatas.length,
  };

  if (Object.values(lengths).some((length) => length !== ids.length)) {
    throw new ValidationError(
      "Upsert batch arrays must have equal lengths",
      Object.fromEntries(Object.entries(lengths).map(([key, length]) => [key, String(length)])),
    );
  }

  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new ValidationError("Upsert batch contains duplicate ids", { id });
    }
    seen.add(id);
  }
}
