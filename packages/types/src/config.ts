import type { ChunkingConfig } from "./chunk.js";
import type { NoContextPolicy } from "./query.js";

export type EmbeddingProviderType = "ollama" | "cohere" | "hashing";

export type VectorIndexType = "memory" | "qdrant";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  ollama: OllamaConfig;
  embedding: EmbeddingConfig;
  vectorIndex: VectorIndexConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
  inference: InferenceConfig;
  guardrails: GuardrailConfig;
  redis: RedisConfig;
}

export interface OllamaConfig {
  /** Primary first, then the local fallback host. */
  hosts: string[];
  model: string;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  dimensions: number;
  ollamaModel: string;
  cohereApiKey: string;
  cohereModel: string;
  /** Retries while the embedder reports itself unavailable. */
  maxRetries: number;
}

export interface VectorIndexConfig {
  type: VectorIndexType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection: string;
}

export interface RetrievalConfig {
  topK: number;
  minScore?: number;
  contextBudgetTokens: number;
  noContextPolicy: NoContextPolicy;
  organizationalValues: string;
}

export interface InferenceConfig {
  timeoutMs: number;
  maxRetries: number;
  temperature: number;
  maxTokens: number;
}

export interface GuardrailConfig {
  rulesPath: string;
}

export interface RedisConfig {
  url: string;
}
