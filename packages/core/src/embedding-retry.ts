import { withRetry } from "@docguard/errors";
import type { Logger } from "@docguard/logger";

export interface EmbeddingRetryPolicy {
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export const DEFAULT_EMBEDDING_RETRY: EmbeddingRetryPolicy = { maxRetries: 2, baseDelayMs: 500, maxDelayMs: 5_000 };

/** Retries an embedder call while the provider reports itself unavailable. */
export function embedWithRetry<T>(
  call: () => Promise<T>,
  policy: EmbeddingRetryPolicy = DEFAULT_EMBEDDING_RETRY,
  logger?: Logger,
): Promise<T> {
  return withRetry(call, {
    maxRetries: policy.maxRetries,
    baseDelayMs: policy.baseDelayMs ?? DEFAULT_EMBEDDING_RETRY.baseDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_EMBEDDING_RETRY.maxDelayMs,
    retryableErrors: ["BACKEND_UNAVAILABLE"],
    onRetry: (attempt, delayMs, error) => {
      logger?.warn(
        { attempt, delayMs, err: error instanceof Error ? error.message : String(error) },
        "Embedding request failed, retrying",
      );
    },
  });
}
