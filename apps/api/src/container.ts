import type { AppConfig } from "@gapscout/types";
import type { Logger } from "@gapscout/logger";
import { PdfjsLoader, TesseractOcrEngine } from "@gapscout/parser";
import { createEmbeddingProvider } from "@gapscout/embeddings";
import { createVectorIndex } from "@gapscout/vector-store";
import { createTextGenerator } from "@gapscout/generation";
import type { AppOptions, AppServices } from "./app.js";

export function createServices(config: AppConfig, logger: Logger): AppServices {
  return {
    logger,
    pdfLoader: new PdfjsLoader(),
    ocr: new TesseractOcrEngine({ langPath: config.ocr.langPath }),
    embeddingProvider: createEmbeddingProvider(config.embeddings),
    vectorIndex: createVectorIndex(config.vectorStore),
    generator: createTextGenerator(config.generation),
  };
}

export function appOptionsFrom(config: AppConfig): AppOptions {
  return {
    cors: config.cors,
    ocr: config.ocr,
    ingestion: config.ingestion,
    retrieval: config.retrieval,
    collectionName: config.vectorStore.collectionName,
  };
}
