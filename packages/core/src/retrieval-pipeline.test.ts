import { describe, it, expect, vi } from "vitest";
import type { EmbeddingResult, IndexEntry } from "@docguard/types";
import type { IEmbeddingProvider } from "@docguard/embeddings";
import { InMemoryVectorIndex } from "@docguard/vector-index";
import { BackendUnavailableError } from "@docguard/errors";
import { createSilentLogger } from "@docguard/logger";
import { retrieve } from "./retrieval-pipeline.js";

/** Embeds every text as the same vector. */
class StaticEmbedder implements IEmbeddingProvider {
  readonly name = "static";
  readonly dimensions = 2;

  constructor(private readonly vector: number[] = [1, 0]) {}

  async embed(): Promise<EmbeddingResult> {
    return { embeddings: [this.vector], model: "static", tokensUsed: 1, dimensions: 2 };
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return { embeddings: texts.map(() => this.vector), model: "static", tokensUsed: texts.length, dimensions: 2 };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

function entry(documentId: string, index: number, vector: number[]): IndexEntry {
  return {
    chunkId: `${documentId}#${String(index)}`,
    documentId,
    index,
    content: `${documentId} passage ${String(index)}`,
    vector,
    metadata: {},
  };
}

async function seededIndex(): Promise<InMemoryVectorIndex> {
  const index = new InMemoryVectorIndex(2);
  await index.upsert([
    entry("b", 1, [1, 0]),
    entry("b", 0, [1, 0]),
    entry("c", 0, [0, 1]),
    entry("a", 1, [1, 0]),
    entry("a", 0, [1, 0]),
  ]);
  return index;
}

const FAST_RETRY = { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 2 };

describe("retrieve", () => {
  it("returns the same order for repeated queries against an unchanged index", async () => {
    const deps = { embeddingProvider: new StaticEmbedder(), vectorIndex: await seededIndex() };

    const first = await retrieve("remote work", { topK: 5 }, deps);
    const second = await retrieve("remote work", { topK: 5 }, deps);

    expect(second).toEqual(first);
    expect(first.map((hit) => hit.chunkId)).toEqual(["a#0", "b#0", "a#1", "b#1", "c#0"]);
  });

  it("keeps at most topK hits", async () => {
    const deps = { embeddingProvider: new StaticEmbedder(), vectorIndex: await seededIndex() };

    const hits = await retrieve("remote work", { topK: 2 }, deps);

    expect(hits.map((hit) => hit.chunkId)).toEqual(["a#0", "b#0"]);
  });

  it("drops hits below the minimum score", async () => {
    const deps = { embeddingProvider: new StaticEmbedder(), vectorIndex: await seededIndex() };

    const hits = await retrieve("remote work", { topK: 5, minScore: 0.5 }, deps);

    expect(hits.map((hit) => hit.documentId)).toEqual(["a", "b", "a", "b"]);
  });

  it("skips the embedder for an empty index or a topK of zero", async () => {
    const embeddingProvider = new StaticEmbedder();
    const embed = vi.spyOn(embeddingProvider, "embed");

    expect(await retrieve("anything", { topK: 3 }, { embeddingProvider, vectorIndex: new InMemoryVectorIndex(2) })).toEqual(
      [],
    );
    expect(await retrieve("anything", { topK: 0 }, { embeddingProvider, vectorIndex: await seededIndex() })).toEqual([]);
    expect(embed).not.toHaveBeenCalled();
  });

  it("retries the query embedding while the embedder is unavailable", async () => {
    const embeddingProvider = new StaticEmbedder();
    const embed = vi
      .spyOn(embeddingProvider, "embed")
      .mockRejectedValueOnce(new BackendUnavailableError("embedder restarting", "static"));

    const hits = await retrieve(
      "remote work",
      { topK: 1 },
      { embeddingProvider, vectorIndex: await seededIndex(), embeddingRetry: FAST_RETRY, logger: createSilentLogger() },
    );

    expect(hits.map((hit) => hit.chunkId)).toEqual(["a#0"]);
    expect(embed).toHaveBeenCalledTimes(2);
  });

  it("gives up once the retries are spent", async () => {
    const embeddingProvider = new StaticEmbedder();
    vi.spyOn(embeddingProvider, "embed").mockRejectedValue(new BackendUnavailableError("embedder down", "static"));

    await expect(
      retrieve("remote work", { topK: 1 }, { embeddingProvider, vectorIndex: await seededIndex(), embeddingRetry: FAST_RETRY }),
    ).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});
