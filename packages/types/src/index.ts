export type { ApiResponse, ApiError } from "./api.js";
export type {
  AppConfig,
  CorsConfig,
  VectorStoreSettings,
  EmbeddingSettings,
  GenerationSettings,
  OcrConfig,
  IngestionDefaults,
  RetrievalConfig,
} from "./config.js";
export type { Page, DocumentMetadata, RawDocument, DocumentSource } from "./document.js";
export type { SectionName, Section, HeadingPattern } from "./section.js";
export type {
  ChunkingConfig,
  ChunkProvenance,
  ChunkingResult,
  Chunk,
  ChunkMetadata,
} from "./chunk.js";
export { chunkId } from "./chunk.js";
export type {
  EmbeddingResult,
  UpsertBatch,
  RetrievalHit,
  AnswerMode,
  AnswerResult,
} from "./retrieval.js";
export type {
  DocIdStrategy,
  IngestionOptions,
  IngestionMeta,
  IngestionResult,
} from "./ingestion.js";
