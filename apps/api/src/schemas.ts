import { z } from "zod";
import { DEFAULT_TOP_K, MAX_TOP_K } from "@gapscout/core";

export const questionSchema = z.object({
  question: z.string().min(1, "question must not be empty"),
  top_k: z.number().int().min(1).max(MAX_TOP_K).default(DEFAULT_TOP_K),
});

const chunkingFields = {
  chunk_size: z.number().int().positive().optional(),
  chunk_overlap: z.number().int().nonnegative().optional(),
  dpi: z.number().int().positive().optional(),
};

export const ingestUrlSchema = z.object({
  url: z.string().min(1, "url must not be empty"),
  collection_name: z.string().min(1).optional(),
  ...chunkingFields,
});

/** Query string of `POST /ingest/pdf`; numbers arrive as strings. */
export const ingestPdfQuerySchema = z.object({
  filename: z.string().min(1).default("upload.pdf"),
  collection: z.string().min(1).optional(),
  chunk_size: z.coerce.number().int().positive().optional(),
  chunk_overlap: z.coerce.number().int().nonnegative().optional(),
  dpi: z.coerce.number().int().positive().optional(),
});

export type QuestionBody = z.infer<typeof questionSchema>;
export type IngestUrlBody = z.infer<typeof ingestUrlSchema>;
export type IngestPdfQuery = z.infer<typeof ingestPdfQuerySchema>;
