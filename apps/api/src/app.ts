import express, { type Express, type Request } from "express";
import cors from "cors";
import helmet from "helmet";
import type { AnswerMode, AppConfig, IngestionOptions } from "@gapscout/types";
import { ValidationError } from "@gapscout/errors";
import type { Logger } from "@gapscout/logger";
import type { IOcrEngine, IPdfLoader } from "@gapscout/parser";
import type { IEmbeddingProvider } from "@gapscout/embeddings";
import type { IVectorIndex } from "@gapscout/vector-store";
import type { ITextGenerator } from "@gapscout/generation";
import {
  answer,
  ingest,
  type AnswerDependencies,
  type IngestionDependencies,
} from "@gapscout/core";
import { asyncHandler, errorHandler, notFound, requestContext, sendData } from "./middleware.js";
import { ingestPdfQuerySchema, ingestUrlSchema, questionSchema } from "./schemas.js";

export interface AppServices {
  logger: Logger;
  pdfLoader: IPdfLoader;
  ocr: IOcrEngine;
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  generator: ITextGenerator;
  fetch?: typeof fetch;
}

export type AppOptions = Pick<AppConfig, "cors" | "ocr" | "ingestion" | "retrieval"> & {
  collectionName: string;
};

interface ChunkingOverrides {
  chunk_size?: number;
  chunk_overlap?: number;
  dpi?: number;
}

export function createApp(services: AppServices, options: AppOptions): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(requestContext(services.logger));
  app.use(helmet());
  app.use(cors({ origin: options.cors.origins }));
  app.use(express.json({ limit: "1mb" }));

  const loggerFor = (req: Request): Logger => req.log ?? services.logger;

  const answerDeps = (req: Request): AnswerDependencies => ({
    embeddingProvider: services.embeddingProvider,
    vectorIndex: services.vectorIndex,
    generator: services.generator,
    collectionName: options.collectionName,
    maxSourceChars: options.retrieval.maxSourceChars,
    logger: loggerFor(req),
  });

  const ingestionDeps = (req: Request): IngestionDependencies => ({
    pdfLoader: services.pdfLoader,
    ocr: services.ocr,
    embeddingProvider: services.embeddingProvider,
    vectorIndex: services.vectorIndex,
    fetch: services.fetch,
    logger: loggerFor(req),
    settings: {
      collectionName: options.collectionName,
      ocr: options.ocr,
      docIdStrategy: options.ingestion.docIdStrategy,
      downloadTimeoutMs: options.ingestion.downloadTimeoutMs,
    },
  });

  const ingestionOptions = (overrides: ChunkingOverrides, collection?: string): IngestionOptions => ({
    collection,
    chunkSize: overrides.chunk_size ?? options.ingestion.chunkSize,
    chunkOverlap: overrides.chunk_overlap ?? options.ingestion.chunkOverlap,
    dpi: overrides.dpi ?? options.ingestion.dpi,
  });

  const answerRoute = (mode: AnswerMode) =>
    asyncHandler(async (req, res) => {
      const body = questionSchema.parse(req.body);
      const result = await answer(body.question, mode, body.top_k, answerDeps(req));
      sendData(res, result);
    });

  app.get("/health", (_req, res) => {
    sendData(res, { ok: true });
  });

  app.get(
    "/health/ready",
    asyncHandler(async (_req, res) => {
      const [vectorIndex, embeddings] = await Promise.all([
        services.vectorIndex.healthCheck(),
        services.embeddingProvider.healthCheck(),
      ]);
      const ok = vectorIndex && embeddings;
      sendData(res, { ok, vectorIndex, embeddings }, ok ? 200 : 503);
    }),
  );

  app.post("/ask", answerRoute("qa"));
  app.post("/gaps", answerRoute("gaps"));

  app.post(
    "/ingest/pdf",
    express.raw({ type: "application/pdf", limit: `${String(options.ingestion.maxUploadMb)}mb` }),
    asyncHandler(async (req, res) => {
      const query = ingestPdfQuerySchema.parse(req.query);
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new ValidationError("Request body must be a PDF sent as application/pdf", {
          body: "missing",
        });
      }

      const result = await ingest(
        { kind: "buffer", filename: query.filename, data: body },
        ingestionOptions(query, query.collection),
        ingestionDeps(req),
      );
      sendData(res, result);
    }),
  );

  app.post(
    "/ingest/url",
    asyncHandler(async (req, res) => {
      const body = ingestUrlSchema.parse(req.body);
      const result = await ingest(
        { kind: "url", url: body.url },
        ingestionOptions(body, body.collection_name),
        ingestionDeps(req),
      );
      sendData(res, result);
    }),
  );

  app.use(notFound);
  app.use(errorHandler(services.logger));

  return app;
}
