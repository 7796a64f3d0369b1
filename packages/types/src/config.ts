import type { DocIdStrategy } from "./ingestion.js";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  cors: CorsConfig;
  vectorStore: VectorStoreSettings;
  embeddings: EmbeddingSettings;
  generation: GenerationSettings;
  ocr: OcrConfig;
  ingestion: IngestionDefaults;
  retrieval: RetrievalConfig;
}

export interface CorsConfig {
  origins: string[];
}

export interface VectorStoreSettings {
  type: "qdrant" | "memory";
  qdrantUrl: string;
  qdrantApiKey?: string;
  collectionName: string;
}

export interface EmbeddingSettings {
  provider: "cohere" | "bge-m3";
  dimensions: number;
  cohereApiKey: string;
  cohereModel: string;
  bgeM3Url?: string;
}

export interface GenerationSettings {
  groqApiKey: string;
  model: string;
}

export interface OcrConfig {
  lang: string;
  langPath?: string;
  minTextChars: number;
}

export interface IngestionDefaults {
  chunkSize: number;
  chunkOverlap: number;
  dpi: number;
  downloadTimeoutMs: number;
  docIdStrategy: DocIdStrategy;
  maxUploadMb: number;
}

export interface RetrievalConfig {
  maxSourceChars: number;
}
