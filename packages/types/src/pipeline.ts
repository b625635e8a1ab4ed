import type { DocumentMetadata } from "./document.js";

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type SimilarityMetric = "cosine";

export interface IndexEntry {
  chunkId: string;
  documentId: string;
  index: number;
  content: string;
  vector: number[];
  metadata: DocumentMetadata & {
    startChar?: number;
    endChar?: number;
    gapBefore?: string;
    gapAfter?: string;
  };
}

export interface RejectedEntry {
  chunkId: string;
  code: string;
  message: string;
}

export interface UpsertResult {
  upserted: number;
  rejected: RejectedEntry[];
}

/** An index entry as read back, without its vector. */
export type StoredChunk = Omit<IndexEntry, "vector">;
