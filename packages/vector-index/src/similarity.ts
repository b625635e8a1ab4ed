import type { ScoredChunk } from "@docguard/types";
import { ConfigurationError } from "@docguard/errors";

/**
 * Cosine similarity of two equal-length vectors. A zero vector has no
 * direction, so its similarity to anything is 0.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }

  if (normA === 0 || normB === 0) return 0;

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Descending score; ties by lower sequence index, then document id, then chunk id. */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.index !== b.index) return a.index - b.index;
  if (a.documentId !== b.documentId) return a.documentId < b.documentId ? -1 : 1;
  if (a.chunkId === b.chunkId) return 0;
  return a.chunkId < b.chunkId ? -1 : 1;
}

export function assertValidDimensions(dimensions: number): void {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ConfigurationError(`Vector dimension must be a positive integer, got ${String(dimensions)}`);
  }
}
