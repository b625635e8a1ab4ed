import type { AppConfig, GuardrailRules } from "@docguard/types";
import { createChunker } from "@docguard/chunker";
import { createEmbeddingProvider } from "@docguard/embeddings";
import { createVectorIndex, QdrantVectorIndex } from "@docguard/vector-index";
import { createGuardrailEngine } from "@docguard/guardrails";
import { InferenceClient, OllamaBackend, OLLAMA_DEFAULT_BASE } from "@docguard/inference";
import type { Logger } from "@docguard/logger";
import { createChildLogger } from "@docguard/logger";
import { InMemoryDocumentStore } from "./document-store.js";
import type { IDocumentStore } from "./document-store.js";
import { RagOrchestrator } from "./orchestrator.js";

export interface BootstrapOptions {
  logger: Logger;
  rules: GuardrailRules;
  documentStore?: IDocumentStore;
}

/**
 * Wires every component from the validated configuration. Throws
 * `ConfigurationError` for settings that cannot work, before any request is served.
 */
export async function createOrchestrator(config: AppConfig, options: BootstrapOptions): Promise<RagOrchestrator> {
  const { logger } = options;
  const { embedding, vectorIndex: indexConfig, inference } = config;

  const embeddingProvider = createEmbeddingProvider({
    provider: embedding.provider,
    ollama: {
      baseUrl: config.ollama.hosts[0] ?? OLLAMA_DEFAULT_BASE,
      model: embedding.ollamaModel,
      dimensions: embedding.dimensions,
    },
    cohere: embedding.cohereApiKey
      ? { apiKey: embedding.cohereApiKey, model: embedding.cohereModel, dimensions: embedding.dimensions }
      : undefined,
    hashing: { dimensions: embedding.dimensions },
  });

  const vectorIndex = createVectorIndex({
    type: indexConfig.type,
    dimensions: embedding.dimensions,
    qdrantUrl: indexConfig.qdrantUrl,
    qdrantApiKey: indexConfig.qdrantApiKey,
    collection: indexConfig.collection,
  });
  if (vectorIndex instanceof QdrantVectorIndex) {
    await vectorIndex.ensureCollection();
  }

  const inferenceClient = new InferenceClient({
    backends: config.ollama.hosts.map((host) => new OllamaBackend(host)),
    model: config.ollama.model,
    defaults: {
      temperature: inference.temperature,
      maxTokens: inference.maxTokens,
      timeoutMs: inference.timeoutMs,
    },
    maxRetries: inference.maxRetries,
    circuitBreaker: {
      errorThresholdPercentage: 50,
      resetTimeout: 30_000,
      volumeThreshold: 5,
    },
    logger: createChildLogger(logger, { component: "inference" }),
  });

  logger.info(
    {
      embedding: embedding.provider,
      dimensions: embedding.dimensions,
      vectorIndex: indexConfig.type,
      inferenceHosts: config.ollama.hosts.length,
    },
    "Orchestrator configured",
  );

  return new RagOrchestrator(
    {
      chunker: createChunker(config.chunking.strategy),
      embeddingProvider,
      vectorIndex,
      documentStore: options.documentStore ?? new InMemoryDocumentStore(),
      guardrails: createGuardrailEngine(options.rules, { logger: createChildLogger(logger, { component: "guardrails" }) }),
      inference: inferenceClient,
      logger,
    },
    {
      chunking: config.chunking,
      retrieval: config.retrieval,
      embeddingRetry: { maxRetries: embedding.maxRetries },
    },
  );
}
