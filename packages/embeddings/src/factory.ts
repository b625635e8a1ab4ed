import type { EmbeddingProviderType } from "@docguard/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { OllamaEmbeddingProvider } from "./ollama-provider.js";
import type { OllamaEmbeddingProviderConfig } from "./ollama-provider.js";
import { HashingEmbeddingProvider } from "./hashing-provider.js";
import type { HashingProviderConfig } from "./hashing-provider.js";
import { ConfigurationError } from "@docguard/errors";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  ollama?: OllamaEmbeddingProviderConfig;
  cohere?: CohereProviderConfig;
  hashing?: HashingProviderConfig;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "ollama":
      if (!config.ollama) {
        throw new ConfigurationError("Ollama config is required when provider is 'ollama'");
      }
      return new OllamaEmbeddingProvider(config.ollama);
    case "cohere":
      if (!config.cohere) {
        throw new ConfigurationError("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    case "hashing":
      return new HashingEmbeddingProvider(config.hashing);
    default:
      throw new ConfigurationError(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
