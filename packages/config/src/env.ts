import { z } from "zod";
import type { AppConfig } from "@gapscout/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for every environment variable the service reads.
 * Validates, transforms and fills defaults so that the result maps onto a
 * strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    PORT: positiveInt("8000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- CORS ----------
    CORS_ORIGINS: z
      .string()
      .min(1, "CORS_ORIGINS is required")
      .refine((val) => val !== "*", {
        message: 'CORS_ORIGINS must not be "*", list the allowed origins',
      })
      .transform((val) => val.split(",").map((origin) => origin.trim())),

    // ---------- Vector index ----------
    VECTOR_STORE: z.enum(["qdrant", "memory"]).default("qdrant"),
    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: z.string().optional(),
    COLLECTION_NAME: z.string().min(1).default("edu_books"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["cohere", "bge-m3"]).default("cohere"),
    EMBEDDING_DIMENSIONS: positiveInt("1024"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- Generation ----------
    GROQ_API_KEY: z.string().min(1, "GROQ_API_KEY is required"),
    GROQ_MODEL: z.string().default("qwen/qwen3-32b"),

    // ---------- OCR ----------
    OCR_LANG: z.string().min(1).default("eng"),
    OCR_LANG_PATH: z.string().optional(),
    OCR_MIN_TEXT_CHARS: positiveInt("30"),

    // ---------- Ingestion ----------
    CHUNK_SIZE: positiveInt("500"),
    CHUNK_OVERLAP: nonNegativeInt("50"),
    RENDER_DPI: positiveInt("300"),
    DOWNLOAD_TIMEOUT_MS: positiveInt("30000"),
    DOC_ID_STRATEGY: z.enum(["content", "random"]).default("content"),
    MAX_UPLOAD_MB: positiveInt("50"),

    // ---------- Retrieval ----------
    CONTEXT_MAX_SOURCE_CHARS: positiveInt("4000"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.EMBEDDING_PROVIDER === "bge-m3" && !env.BGE_M3_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["BGE_M3_URL"],
        message: "BGE_M3_URL is required when EMBEDDING_PROVIDER is bge-m3",
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    cors: {
      origins: parsed.CORS_ORIGINS,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY || undefined,
      collectionName: parsed.COLLECTION_NAME,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      bgeM3Url: parsed.BGE_M3_URL,
    },

    generation: {
      groqApiKey: parsed.GROQ_API_KEY,
      model: parsed.GROQ_MODEL,
    },

    ocr: {
      lang: parsed.OCR_LANG,
      langPath: parsed.OCR_LANG_PATH || undefined,
      minTextChars: parsed.OCR_MIN_TEXT_CHARS,
    },

    ingestion: {
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
      dpi: parsed.RENDER_DPI,
      downloadTimeoutMs: parsed.DOWNLOAD_TIMEOUT_MS,
      docIdStrategy: parsed.DOC_ID_STRATEGY,
      maxUploadMb: parsed.MAX_UPLOAD_MB,
    },

    retrieval: {
      maxSourceChars: parsed.CONTEXT_MAX_SOURCE_CHARS,
    },
  };
}
