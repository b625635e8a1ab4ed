import { describe, it, expect } from "vitest";
import type { IndexEntry } from "@docguard/types";
import { ConfigurationError, DimensionMismatchError } from "@docguard/errors";
import { createVectorIndex, InMemoryVectorIndex, cosineSimilarity } from "./index.js";

function entry(documentId: string, index: number, vector: number[], content = `chunk ${String(index)}`): IndexEntry {
  return {
    chunkId: `${documentId}#${String(index)}`,
    documentId,
    index,
    content,
    vector,
    metadata: {},
  };
}

describe("Vector Index", () => {
  describe("createVectorIndex factory", () => {
    it("creates InMemoryVectorIndex for type 'memory'", () => {
      const index = createVectorIndex({ type: "memory", dimensions: 3 });
      expect(index).toBeInstanceOf(InMemoryVectorIndex);
      expect(index.dimensions).toBe(3);
      expect(index.metric).toBe("cosine");
    });

    it("creates a Qdrant index for type 'qdrant'", () => {
      const index = createVectorIndex({
        type: "qdrant",
        dimensions: 3,
        qdrantUrl: "http://localhost:6333",
      });
      expect(index.search).toBeTypeOf("function");
      expect(index.dimensions).toBe(3);
    });

    it("throws for missing qdrantUrl", () => {
      expect(() => createVectorIndex({ type: "qdrant", dimensions: 3 })).toThrow("qdrantUrl is required");
    });

    it("throws for unknown type", () => {
      expect(() => createVectorIndex({ type: "unknown" as "memory", dimensions: 3 })).toThrow(
        "Unknown vector index type",
      );
    });

    it("rejects a non-positive dimension", () => {
      expect(() => createVectorIndex({ type: "memory", dimensions: 0 })).toThrow(ConfigurationError);
      expect(() => new InMemoryVectorIndex(-4)).toThrow(ConfigurationError);
    });
  });

  describe("cosineSimilarity", () => {
    it("is 1 for parallel and 0 for orthogonal vectors", () => {
      expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it("is 0 when either vector is zero", () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });
  });

  describe("InMemoryVectorIndex", () => {
    it("returns the nearest entries best first, at most topK", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0]), entry("a", 1, [0, 1]), entry("b", 0, [1, 1])]);

      const hits = await index.search([1, 0.1], 2);

      expect(hits.map((h) => h.chunkId)).toEqual(["a#0", "b#0"]);
      expect(hits[0]?.score).toBeGreaterThan(hits[1]?.score ?? 1);
    });

    it("breaks ties by sequence index, then document id", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([
        entry("b", 1, [1, 0]),
        entry("b", 0, [1, 0]),
        entry("a", 1, [1, 0]),
        entry("a", 0, [2, 0]),
      ]);

      const hits = await index.search([1, 0], 10);

      expect(hits.map((h) => h.chunkId)).toEqual(["a#0", "b#0", "a#1", "b#1"]);
    });

    it("returns an empty result for an empty index", async () => {
      const index = new InMemoryVectorIndex(2);
      await expect(index.search([1, 0], 5)).resolves.toEqual([]);
    });

    it("replaces an entry when its chunk id is upserted again", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0], "old")]);
      await index.upsert([entry("a", 0, [1, 0], "new")]);

      expect(await index.count()).toBe(1);
      const [hit] = await index.search([1, 0], 1);
      expect(hit?.content).toBe("new");
    });

    it("rejects wrong-dimension entries but writes the rest of the batch", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0])]);

      const result = await index.upsert([entry("b", 0, [1, 0, 0]), entry("b", 1, [0, 1])]);

      expect(result.upserted).toBe(1);
      expect(result.rejected).toEqual([
        {
          chunkId: "b#0",
          code: "DIMENSION_MISMATCH",
          message: "Vector dimension mismatch: expected 2, got 3",
        },
      ]);
      expect(await index.count()).toBe(2);
      expect(await index.listChunkIds("b")).toEqual(["b#1"]);
    });

    it("throws DimensionMismatchError for a query vector of the wrong length", async () => {
      const index = new InMemoryVectorIndex(2);
      await expect(index.search([1, 0, 0], 3)).rejects.toBeInstanceOf(DimensionMismatchError);
    });

    it("does not alias caller-owned vectors", async () => {
      const index = new InMemoryVectorIndex(2);
      const e = entry("a", 0, [1, 0]);
      await index.upsert([e]);
      e.vector[0] = 0;
      e.vector[1] = 1;

      const [hit] = await index.search([1, 0], 1);
      expect(hit?.score).toBeCloseTo(1, 10);
    });

    it("deletes every entry of a document and nothing else", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0]), entry("a", 1, [0, 1]), entry("b", 0, [1, 1])]);

      const removed = await index.deleteDocument("a");

      expect(removed).toBe(2);
      expect(await index.listChunkIds("a")).toEqual([]);
      const hits = await index.search([1, 0], 10);
      expect(hits.map((h) => h.documentId)).toEqual(["b"]);
    });

    it("shows a search issued just before a delete the whole document or none of it", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0]), entry("a", 1, [0.9, 0.1]), entry("a", 2, [0.8, 0.2])]);

      const pending = index.search([1, 0], 10);
      const deletion = index.deleteDocument("a");
      const [hits] = await Promise.all([pending, deletion]);

      expect([0, 3]).toContain(hits.filter((h) => h.documentId === "a").length);
      await expect(index.search([1, 0], 10)).resolves.toEqual([]);
    });

    it("reads a document's chunks back in sequence order without vectors", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 1, [0, 1], "second"), entry("a", 0, [1, 0], "first"), entry("b", 0, [1, 1])]);

      const chunks = await index.getChunks("a");

      expect(chunks).toEqual([
        { chunkId: "a#0", documentId: "a", index: 0, content: "first", metadata: {} },
        { chunkId: "a#1", documentId: "a", index: 1, content: "second", metadata: {} },
      ]);
    });

    it("deletes individual chunk ids", async () => {
      const index = new InMemoryVectorIndex(2);
      await index.upsert([entry("a", 0, [1, 0]), entry("a", 1, [0, 1])]);

      await index.delete(["a#1", "missing#0"]);

      expect(await index.listChunkIds("a")).toEqual(["a#0"]);
    });
  });
});
