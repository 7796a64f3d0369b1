import { CohereClient, type Cohere } from "cohere-ai";
import type { EmbeddingResult } from "@gapscout/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

/** The slice of the Cohere client this provider calls. */
export interface CohereEmbedClient {
  v2: {
    embed(request: Cohere.V2EmbedRequest): Promise<Cohere.EmbedByTypeResponse>;
  };
}

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  client?: CohereEmbedClient;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereEmbedClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedAll(texts: string[], inputType: Cohere.EmbedInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2.embed({
        texts: batch,
        model: this.model,
        inputType,
        embeddingTypes: ["float"],
        outputDimension: this.dimensions,
      });

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}
