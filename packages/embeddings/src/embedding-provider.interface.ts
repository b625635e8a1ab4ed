import type { EmbeddingResult } from "@docguard/types";

/**
 * Maps text to fixed-length vectors. Implementations never retry; the caller
 * owns retry policy so a failed batch can be re-embedded as a whole.
 *
 * Errors: `EmptyInputError` for blank text, `BackendUnavailableError` when the
 * backend cannot be reached, `DimensionMismatchError` when it returns vectors
 * of the wrong length.
 */
export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  /** Embeds a single query text; `embeddings` has exactly one vector. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Order-preserving: `embeddings[i]` belongs to `texts[i]`. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
