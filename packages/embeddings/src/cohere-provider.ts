import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@docguard/types";
import { AppError, BackendUnavailableError } from "@docguard/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertEmbeddings, assertNonBlank } from "./validation.js";

const DEFAULT_MODEL = "embed-english-light-v3.0";
const DEFAULT_DIMENSIONS = 384;
const BATCH_SIZE = 96; // Cohere limit

type CohereInputType = "search_document" | "search_query";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/**
 * `embed` is used for queries and `batchEmbed` for document chunks, matching
 * Cohere's asymmetric `search_query` / `search_document` input types.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  private async embedAll(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    assertNonBlank(texts);
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      try {
        const response = await this.client.v2.embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
        });

        if (response.embeddings.float) {
          allEmbeddings.push(...response.embeddings.float);
        }

        // Use actual tokensUsed from Cohere response for billing accuracy
        if (response.meta?.billedUnits?.inputTokens) {
          totalTokens += response.meta.billedUnits.inputTokens;
        }
      } catch (error: unknown) {
        throw this.mapError(error);
      }
    }

    assertEmbeddings(allEmbeddings, texts.length, this.dimensions, this.name);

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private mapError(error: unknown): Error {
    if (error instanceof CohereTimeoutError) {
      return new BackendUnavailableError("Cohere embedding request timed out", "cohere", {
        cause: error,
      });
    }
    if (error instanceof CohereError && error.statusCode !== undefined && error.statusCode < 500) {
      return new AppError({
        message: `Cohere rejected the embedding request (${String(error.statusCode)})`,
        statusCode: 422,
        code: "EMBEDDING_REJECTED",
        cause: error,
      });
    }
    return new BackendUnavailableError("Cohere embedding backend unavailable", "cohere", {
      cause: error,
    });
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }
}
