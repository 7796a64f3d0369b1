import type { EmbeddingSettings } from "@gapscout/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";

export function createEmbeddingProvider(settings: EmbeddingSettings): IEmbeddingProvider {
  switch (settings.provider) {
    case "cohere":
      if (!settings.cohereApiKey) {
        throw new Error("COHERE_API_KEY is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({
        apiKey: settings.cohereApiKey,
        model: settings.cohereModel,
        dimensions: settings.dimensions,
      });
    case "bge-m3":
      if (!settings.bgeM3Url) {
        throw new Error("BGE_M3_URL is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider({
        baseUrl: settings.bgeM3Url,
        dimensions: settings.dimensions,
      });
    default:
      throw new Error(`Unknown embedding provider: ${String(settings.provider)}`);
  }
}
