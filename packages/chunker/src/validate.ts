import type { ChunkingConfig } from "@docguard/types";
import { ConfigurationError } from "@docguard/errors";

/**
 * Startup check for chunk sizing. Both values are character counts.
 */
export function validateChunkingConfig(config: Pick<ChunkingConfig, "maxSize" | "overlap">): void {
  const { maxSize, overlap } = config;

  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ConfigurationError(`Chunk maxSize must be a positive integer, got ${String(maxSize)}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new ConfigurationError(
      `Chunk overlap must be a non-negative integer, got ${String(overlap)}`,
    );
  }
  if (overlap >= maxSize) {
    throw new ConfigurationError(
      `Chunk overlap (${String(overlap)}) must be smaller than maxSize (${String(maxSize)})`,
      { details: { maxSize, overlap } },
    );
  }
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
