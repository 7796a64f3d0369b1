export { ingest } from "./ingestion-pipeline.js";
export type { IngestionDependencies, IngestionSettings } from "./ingestion-pipeline.js";

export { retrieve, answer, DEFAULT_TOP_K, MAX_TOP_K } from "./retrieval-pipeline.js";
export type { RetrievalDependencies, AnswerDependencies } from "./retrieval-pipeline.js";

export { assembleContext, NO_CONTEXT, DEFAULT_MAX_SOURCE_CHARS } from "./context-assembler.js";
export type { ContextOptions } from "./context-assembler.js";
export { buildPrompt } from "./prompts.js";
export type { Prompt } from "./prompts.js";
export { loadSource, filenameFromUrl } from "./document-source.js";
export type { LoadedDocument, SourceLoaderOptions } from "./document-source.js";
export { createDocId } from "./doc-id.js";
