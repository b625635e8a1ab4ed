import type { IndexEntry, ScoredChunk, StoredChunk, UpsertResult, RejectedEntry } from "@docguard/types";
import { DimensionMismatchError } from "@docguard/errors";
import type { IVectorIndex } from "./vector-index.interface.js";
import { assertValidDimensions, compareScored, cosineSimilarity } from "./similarity.js";

/**
 * Exact (brute-force) cosine index held in process memory.
 *
 * Every mutation completes synchronously, without an await in between, so a
 * concurrent search sees a document either fully present or fully absent.
 */
export class InMemoryVectorIndex implements IVectorIndex {
  readonly metric = "cosine" as const;
  readonly dimensions: number;
  private entries = new Map<string, IndexEntry>();

  constructor(dimensions: number) {
    assertValidDimensions(dimensions);
    this.dimensions = dimensions;
  }

  async upsert(entries: IndexEntry[]): Promise<UpsertResult> {
    const rejected: RejectedEntry[] = [];
    let upserted = 0;

    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        const error = new DimensionMismatchError(this.dimensions, entry.vector.length);
        rejected.push({ chunkId: entry.chunkId, code: error.code, message: error.message });
        continue;
      }
      this.entries.set(entry.chunkId, {
        ...entry,
        vector: [...entry.vector],
        metadata: { ...entry.metadata },
      });
      upserted++;
    }

    return { upserted, rejected };
  }

  async search(vector: number[], topK: number): Promise<ScoredChunk[]> {
    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length);
    }
    if (topK <= 0) return [];

    const scored: ScoredChunk[] = [];
    for (const entry of this.entries.values()) {
      scored.push({
        chunkId: entry.chunkId,
        documentId: entry.documentId,
        index: entry.index,
        content: entry.content,
        score: cosineSimilarity(vector, entry.vector),
        metadata: { ...entry.metadata },
      });
    }

    return scored.sort(compareScored).slice(0, topK);
  }

  async deleteDocument(documentId: string): Promise<number> {
    let removed = 0;
    for (const [chunkId, entry] of this.entries) {
      if (entry.documentId === documentId) {
        this.entries.delete(chunkId);
        removed++;
      }
    }
    return removed;
  }

  async delete(chunkIds: string[]): Promise<void> {
    for (const chunkId of chunkIds) {
      this.entries.delete(chunkId);
    }
  }

  async listChunkIds(documentId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const entry of this.entries.values()) {
      if (entry.documentId === documentId) ids.push(entry.chunkId);
    }
    return ids;
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    const chunks: StoredChunk[] = [];
    for (const { vector: _vector, ...chunk } of this.entries.values()) {
      if (chunk.documentId === documentId) chunks.push({ ...chunk, metadata: { ...chunk.metadata } });
    }
    return chunks.sort((a, b) => a.index - b.index);
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
