import { z } from "zod";
import type { AppConfig } from "@docguard/types";
import { ConfigurationError } from "@docguard/errors";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for every supported environment variable.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Ollama ----------
    OLLAMA_HOST: z.string().url("OLLAMA_HOST must be a URL"),
    OLLAMA_HOST_LOCAL: z.string().url("OLLAMA_HOST_LOCAL must be a URL").optional(),
    OLLAMA_MODEL: z.string().min(1, "OLLAMA_MODEL is required"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["ollama", "cohere", "hashing"]).default("ollama"),
    OLLAMA_EMBED_MODEL: z.string().default("all-minilm"),
    EMBEDDING_DIMENSIONS: positiveInt("384"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-english-light-v3.0"),
    EMBEDDING_MAX_RETRIES: nonNegativeInt("2"),

    // ---------- Vector index ----------
    VECTOR_INDEX: z.enum(["memory", "qdrant"]).default("memory"),
    QDRANT_URL: z.string().url("QDRANT_URL must be a URL").optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("docguard-chunks"),

    // ---------- Chunking ----------
    CHUNK_STRATEGY: z.enum(["fixed", "recursive"]).default("recursive"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: nonNegativeInt("200"),

    // ---------- Retrieval ----------
    RETRIEVAL_TOP_K: positiveInt("3"),
    RETRIEVAL_MIN_SCORE: z
      .string()
      .transform(Number)
      .pipe(z.number().min(-1).max(1))
      .optional(),
    CONTEXT_BUDGET_TOKENS: positiveInt("3000"),
    NO_CONTEXT_POLICY: z.enum(["answer", "decline"]).default("answer"),
    ORGANIZATIONAL_VALUES: z.string().default("respect, integrity, and service"),

    // ---------- Inference ----------
    INFERENCE_TIMEOUT_MS: positiveInt("300000"),
    INFERENCE_MAX_RETRIES: nonNegativeInt("2"),
    INFERENCE_TEMPERATURE: z
      .string()
      .default("0.1")
      .transform(Number)
      .pipe(z.number().min(0).max(2)),
    INFERENCE_MAX_TOKENS: positiveInt("1024"),

    // ---------- Guardrails ----------
    GUARDRAIL_RULES_PATH: z.string().default("config/guardrail-rules.json"),

    // ---------- Redis ----------
    REDIS_URL: z.string().default("redis://localhost:6379"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.VECTOR_INDEX === "qdrant" && !env.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required when VECTOR_INDEX is 'qdrant'",
      });
    }
    if (env.EMBEDDING_PROVIDER === "cohere" && !env.COHERE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COHERE_API_KEY"],
        message: "COHERE_API_KEY is required when EMBEDDING_PROVIDER is 'cohere'",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) and return a
 * strongly-typed {@link AppConfig}.
 *
 * Throws a ConfigurationError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fields[issue.path.join(".")] = issue.message;
    }
    const summary = Object.entries(fields)
      .map(([key, message]) => `${key}: ${message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${summary}`, {
      details: { fields },
      cause: result.error,
    });
  }

  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    ollama: {
      hosts: parsed.OLLAMA_HOST_LOCAL
        ? [parsed.OLLAMA_HOST, parsed.OLLAMA_HOST_LOCAL]
        : [parsed.OLLAMA_HOST],
      model: parsed.OLLAMA_MODEL,
    },

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
      ollamaModel: parsed.OLLAMA_EMBED_MODEL,
      cohereApiKey: parsed.COHERE_API_KEY ?? "",
      cohereModel: parsed.COHERE_EMBED_MODEL,
      maxRetries: parsed.EMBEDDING_MAX_RETRIES,
    },

    vectorIndex: {
      type: parsed.VECTOR_INDEX,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      maxSize: parsed.CHUNK_SIZE,
      overlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
      minScore: parsed.RETRIEVAL_MIN_SCORE,
      contextBudgetTokens: parsed.CONTEXT_BUDGET_TOKENS,
      noContextPolicy: parsed.NO_CONTEXT_POLICY,
      organizationalValues: parsed.ORGANIZATIONAL_VALUES,
    },

    inference: {
      timeoutMs: parsed.INFERENCE_TIMEOUT_MS,
      maxRetries: parsed.INFERENCE_MAX_RETRIES,
      temperature: parsed.INFERENCE_TEMPERATURE,
      maxTokens: parsed.INFERENCE_MAX_TOKENS,
    },

    guardrails: {
      rulesPath: parsed.GUARDRAIL_RULES_PATH,
    },

    redis: {
      url: parsed.REDIS_URL,
    },
  };
}
