import type { RetrievalOptions, RetrievalResult } from "@docguard/types";
import type { IEmbeddingProvider } from "@docguard/embeddings";
import type { IVectorIndex } from "@docguard/vector-index";
import type { Logger } from "@docguard/logger";
import { embedWithRetry } from "./embedding-retry.js";
import type { EmbeddingRetryPolicy } from "./embedding-retry.js";

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  embeddingRetry?: EmbeddingRetryPolicy;
  logger?: Logger;
}

/**
 * Retrieval pipeline: Query -> Embed -> Vector Search -> Threshold
 *
 * Results are ordered by descending score and at most `topK` long. An empty
 * index yields an empty result without calling the embedder.
 */
export async function retrieve(
  query: string,
  options: RetrievalOptions,
  deps: RetrievalDependencies,
): Promise<RetrievalResult> {
  if (options.topK <= 0 || (await deps.vectorIndex.count()) === 0) {
    return [];
  }

  const embeddingResult = await embedWithRetry(() => deps.embeddingProvider.embed(query), deps.embeddingRetry, deps.logger);
  const queryVector = embeddingResult.embeddings[0];

  if (!queryVector) {
    throw new Error("Failed to generate embedding for query");
  }

  const hits = await deps.vectorIndex.search(queryVector, options.topK);

  const { minScore } = options;
  return minScore === undefined ? hits : hits.filter((hit) => hit.score >= minScore);
}
