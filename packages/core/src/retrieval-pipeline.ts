import type { AnswerMode, AnswerResult, RetrievalHit } from "@gapscout/types";
import { ExternalServiceError, ValidationError } from "@gapscout/errors";
import { previewText, type Logger } from "@gapscout/logger";
import type { IEmbeddingProvider } from "@gapscout/embeddings";
import type { IVectorIndex } from "@gapscout/vector-store";
import type { ITextGenerator } from "@gapscout/generation";
import { assembleContext } from "./context-assembler.js";
import { buildPrompt } from "./prompts.js";

export const DEFAULT_TOP_K = 3;
export const MAX_TOP_K = 10;

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  collectionName: string;
  logger: Logger;
}

export interface AnswerDependencies extends RetrievalDependencies {
  generator: ITextGenerator;
  maxSourceChars: number;
}

function assertQuery(question: string, topK: number): void {
  if (question.trim().length === 0) {
    throw new ValidationError("Question must not be empty", { question: "empty" });
  }
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new ValidationError(`topK must be an integer between 1 and ${String(MAX_TOP_K)}`, {
      topK: String(topK),
    });
  }
}

/**
 * Retrieval pipeline: Question -> Embed -> Vector query.
 * Hits come back in index rank order (ascending distance).
 */
export async function retrieve(
  question: string,
  topK: number,
  deps: RetrievalDependencies,
): Promise<RetrievalHit[]> {
  assertQuery(question, topK);
  deps.logger.info({ questionLength: question.length, topK }, "Retrieve");

  const embeddingResult = await deps.embeddingProvider.embed(question);
  const queryVector = embeddingResult.embeddings[0];
  if (!queryVector) {
    throw new ExternalServiceError(
      "Failed to generate embedding for query",
      deps.embeddingProvider.name,
    );
  }

  const hits = await deps.vectorIndex.query(deps.collectionName, queryVector, topK);

  deps.logger.info(
    {
      count: hits.length,
      preview: hits.slice(0, 5).map((h) => ({
        id: h.id,
        distance: h.distance,
        section: h.metadata["section"],
      })),
    },
    "Retrieve hits",
  );

  return hits;
}

/**
 * Retrieve, assemble a labeled context and ask the generator. `qa` answers the
 * question directly; `gaps` explains the material and lists research gaps.
 */
export async function answer(
  question: string,
  mode: AnswerMode,
  topK: number,
  deps: AnswerDependencies,
): Promise<AnswerResult> {
  const sources = await retrieve(question, topK, deps);
  const context = assembleContext(
    sources.map((hit) => hit.document),
    { maxSourceChars: deps.maxSourceChars },
  );

  deps.logger.info(
    { mode, question: previewText(question), contextChars: context.length },
    "Prompt to LLM",
  );

  const prompt = buildPrompt(mode, question, context);
  const text = await deps.generator.generate(prompt.system, prompt.user);

  deps.logger.info({ answerLength: text.length, sources: sources.length }, "Answer complete");

  return { question, answer: text, sources };
}
