export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig, CohereEmbedClient } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { createEmbeddingProvider } from "./factory.js";
