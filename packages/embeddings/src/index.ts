export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OllamaEmbeddingProvider } from "./ollama-provider.js";
export type { OllamaEmbeddingProviderConfig } from "./ollama-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { HashingEmbeddingProvider, tokenize } from "./hashing-provider.js";
export type { HashingProviderConfig } from "./hashing-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
