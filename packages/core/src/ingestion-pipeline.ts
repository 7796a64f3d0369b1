import type {
  Chunk,
  ChunkMetadata,
  DocIdStrategy,
  DocumentSource,
  IngestionMeta,
  IngestionOptions,
  IngestionResult,
  OcrConfig,
} from "@gapscout/types";
import { chunkId } from "@gapscout/types";
import { ExternalServiceError } from "@gapscout/errors";
import { createChildLogger, type Logger } from "@gapscout/logger";
import { extractPages, resolveMetadata, type IOcrEngine, type IPdfLoader } from "@gapscout/parser";
import { filterSections, segmentSections } from "@gapscout/sections";
import { chunkSections, RecursiveTextSplitter } from "@gapscout/chunker";
import type { IEmbeddingProvider } from "@gapscout/embeddings";
import type { IVectorIndex } from "@gapscout/vector-store";
import { loadSource } from "./document-source.js";
import { createDocId } from "./doc-id.js";

const MAX_REPORTED_IDS = 50;

export interface IngestionSettings {
  /** Collection used when the request does not name one. */
  collectionName: string;
  ocr: OcrConfig;
  docIdStrategy: DocIdStrategy;
  downloadTimeoutMs: number;
}

export interface IngestionDependencies {
  pdfLoader: IPdfLoader;
  ocr: IOcrEngine;
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  logger: Logger;
  settings: IngestionSettings;
  fetch?: typeof fetch;
}

/**
 * Ingestion pipeline: Load -> Extract pages -> Resolve metadata -> Segment ->
 * Filter -> Chunk -> Embed -> Upsert.
 *
 * A document with nothing indexable is a successful zero-chunk ingest; the
 * embedding and index calls are skipped. Embedding and index failures
 * propagate and nothing already written is rolled back.
 */
export async function ingest(
  source: DocumentSource,
  options: IngestionOptions,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const { settings } = deps;
  // Fails fast on bad chunk settings, before any download or parsing.
  const splitter = new RecursiveTextSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });
  const collection = options.collection || settings.collectionName;

  const { filename, data } = await loadSource(source, {
    downloadTimeoutMs: settings.downloadTimeoutMs,
    fetch: deps.fetch,
  });
  const docId = createDocId(filename, data, settings.docIdStrategy);
  const logger = createChildLogger(deps.logger, { docId, collection });
  logger.info({ source: source.kind, bytes: data.byteLength }, "Ingesting PDF");

  const { pages, document } = await extractPages(
    data,
    { dpi: options.dpi, ocrLang: settings.ocr.lang, minTextChars: settings.ocr.minTextChars },
    { loader: deps.pdfLoader, ocr: deps.ocr, logger },
  );
  const metadata = resolveMetadata(document, pages[0]?.text ?? "");

  const sections = segmentSections(pages);
  const indexed = filterSections(sections);
  logger.info(
    { detected: sections.map((s) => s.name), indexed: indexed.map((s) => s.name) },
    "Sections kept",
  );

  const split = chunkSections(
    indexed,
    { chunkSize: options.chunkSize, chunkOverlap: options.chunkOverlap },
    splitter,
  );
  const chunks = split.provenance.map(
    (p, i): Chunk => ({ ...p, id: chunkId(docId, p.chunkIndex), docId, text: split.chunks[i] ?? "" }),
  );
  const ids = chunks.map((c) => c.id);
  const meta: IngestionMeta = { sourceFile: filename, docId, ...metadata };

  let embedded = 0;
  if (chunks.length === 0) {
    logger.warn("No chunks to embed");
  } else {
    const documents = chunks.map((c) => c.text);
    const embedding = await deps.embeddingProvider.batchEmbed(documents);
    if (embedding.embeddings.length !== chunks.length) {
      throw new ExternalServiceError(
        `Embedding provider returned ${String(embedding.embeddings.length)} vectors for ${String(chunks.length)} chunks`,
        deps.embeddingProvider.name,
      );
    }
    logger.info(
      { count: embedding.embeddings.length, dims: embedding.embeddings[0]?.length ?? 0 },
      "Embedding complete",
    );

    const metadatas = chunks.map(
      ({ section, pageStart, pageEnd, chunkIndex }): ChunkMetadata => ({
        ...meta,
        section,
        pageStart,
        pageEnd,
        chunkIndex,
      }),
    );

    await deps.vectorIndex.ensureCollection(collection, deps.embeddingProvider.dimensions);
    // A re-ingest under the same docId may produce fewer chunks than the last one.
    await deps.vectorIndex.deleteByDocId(collection, docId);
    await deps.vectorIndex.upsert(collection, {
      ids,
      documents,
      embeddings: embedding.embeddings,
      metadatas: metadatas.map((m) => ({ ...m })),
    });
    embedded = chunks.length;
  }

  logger.info({ pages: pages.length, chunks: chunks.length }, "Ingest result");

  return {
    ok: true,
    pdf: filename,
    docId,
    pages: pages.length,
    sectionsDetected: sections.map((s) => s.name),
    sectionsIndexed: indexed.map((s) => s.name),
    chunks: chunks.length,
    embedded,
    ids: ids.slice(0, MAX_REPORTED_IDS),
    collection,
    meta,
  };
}
