import { z } from "zod";
import type { EmbeddingResult } from "@docguard/types";
import { AppError, BackendUnavailableError } from "@docguard/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertEmbeddings, assertNonBlank } from "./validation.js";

const DEFAULT_MODEL = "all-minilm";
const DEFAULT_DIMENSIONS = 384;
const DEFAULT_TIMEOUT_MS = 30_000;

export interface OllamaEmbeddingProviderConfig {
  baseUrl: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
}

const embedResponseSchema = z.object({
  model: z.string().optional(),
  embeddings: z.array(z.array(z.number())),
  prompt_eval_count: z.number().optional(),
});

/**
 * Embedding provider backed by an Ollama server (`POST /api/embed`).
 * The default model, all-minilm, produces 384-dimensional vectors.
 */
export class OllamaEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "ollama";
  readonly dimensions: number;
  private baseUrl: string;
  private model: string;
  private timeoutMs: number;

  constructor(config: OllamaEmbeddingProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    assertNonBlank(texts);

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/api/embed`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, input: texts }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw new BackendUnavailableError(`Ollama embedding backend unreachable at ${this.baseUrl}`, "ollama", {
        cause: error,
      });
    }

    if (response.status >= 500) {
      throw new BackendUnavailableError(
        `Ollama embedding failed: ${String(response.status)} ${response.statusText}`,
        "ollama",
      );
    }
    if (!response.ok) {
      throw new AppError({
        message: `Ollama rejected the embedding request: ${String(response.status)} ${response.statusText}`,
        statusCode: 422,
        code: "EMBEDDING_REJECTED",
      });
    }

    const body = await response.json().catch((error: unknown) => {
      throw new BackendUnavailableError(`Ollama embedding response from ${this.baseUrl} was interrupted`, "ollama", {
        cause: error,
      });
    });
    const data = embedResponseSchema.parse(body);
    assertEmbeddings(data.embeddings, texts.length, this.dimensions, this.name);

    return {
      embeddings: data.embeddings,
      model: data.model ?? this.model,
      tokensUsed: data.prompt_eval_count ?? 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`, {
        signal: AbortSignal.timeout(5_000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
