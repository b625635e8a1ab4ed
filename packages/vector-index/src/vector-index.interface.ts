import type { IndexEntry, ScoredChunk, SimilarityMetric, StoredChunk, UpsertResult } from "@docguard/types";

export interface IVectorIndex {
  readonly dimensions: number;
  readonly metric: SimilarityMetric;

  /**
   * Idempotent: an entry whose chunk id already exists replaces it. Entries of
   * the wrong dimension are reported in `rejected`; the rest are still written.
   */
  upsert(entries: IndexEntry[]): Promise<UpsertResult>;
  /** At most `topK` hits, best first. Throws `DimensionMismatchError` for a bad query vector. */
  search(vector: number[], topK: number): Promise<ScoredChunk[]>;
  /** Removes every entry of the document and returns how many were removed. */
  deleteDocument(documentId: string): Promise<number>;
  delete(chunkIds: string[]): Promise<void>;
  listChunkIds(documentId: string): Promise<string[]>;
  /** The document's entries in sequence order, without vectors. */
  getChunks(documentId: string): Promise<StoredChunk[]>;
  count(): Promise<number>;
  healthCheck(): Promise<boolean>;
}
