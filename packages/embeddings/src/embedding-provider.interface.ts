import type { EmbeddingResult } from "@gapscout/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embed a single search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed passages for storage, one vector per input in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
