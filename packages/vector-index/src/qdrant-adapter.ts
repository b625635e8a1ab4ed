import { createHash } from "node:crypto";
import { QdrantClient } from "@qdrant/js-client-rest";
import { z } from "zod";
import type { IndexEntry, RejectedEntry, ScoredChunk, StoredChunk, UpsertResult } from "@docguard/types";
import { ConfigurationError, DimensionMismatchError } from "@docguard/errors";
import type { IVectorIndex } from "./vector-index.interface.js";
import { assertValidDimensions, compareScored } from "./similarity.js";

const BATCH_SIZE = 100;
const SCROLL_PAGE_SIZE = 256;

const payloadSchema = z.object({
  chunkId: z.string(),
  documentId: z.string(),
  index: z.number().int(),
  content: z.string(),
  metadata: z
    .object({
      filename: z.string().optional(),
      contentType: z.string().optional(),
      uploadedAt: z.string().optional(),
      startChar: z.number().optional(),
      endChar: z.number().optional(),
      gapBefore: z.string().optional(),
      gapAfter: z.string().optional(),
    })
    .passthrough()
    .default({}),
});

export interface QdrantVectorIndexConfig {
  url: string;
  apiKey?: string;
  collection: string;
  dimensions: number;
}

/** Qdrant point ids must be UUIDs or integers; derive a stable UUID from the chunk id. */
export function toPointId(chunkId: string): string {
  const hex = createHash("sha256").update(chunkId).digest("hex");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");
}

function documentFilter(documentId: string) {
  return { must: [{ key: "documentId", match: { value: documentId } }] };
}

export class QdrantVectorIndex implements IVectorIndex {
  readonly metric = "cosine" as const;
  readonly dimensions: number;
  private client: QdrantClient;
  private collection: string;

  constructor(config: QdrantVectorIndexConfig) {
    assertValidDimensions(config.dimensions);
    this.dimensions = config.dimensions;
    this.collection = config.collection;
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey, checkCompatibility: false });
  }

  /**
   * Creates the collection on first use. An existing collection whose vector
   * size differs from the configured dimension is a fatal misconfiguration.
   */
  async ensureCollection(): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);

    if (exists) {
      const info = await this.client.getCollection(this.collection);
      const vectors = info.config.params.vectors;
      const size = vectors && "size" in vectors && typeof vectors.size === "number" ? vectors.size : undefined;
      if (size !== this.dimensions) {
        throw new ConfigurationError(
          `Collection "${this.collection}" stores ${String(size)}-dimensional vectors, configured ${String(this.dimensions)}`,
        );
      }
      return;
    }

    await this.client.createCollection(this.collection, {
      vectors: {
        size: this.dimensions,
        distance: "Cosine",
      },
    });

    // Payload index for delete-by-document
    await this.client.createPayloadIndex(this.collection, {
      field_name: "documentId",
      field_schema: "keyword",
    });
  }

  async upsert(entries: IndexEntry[]): Promise<UpsertResult> {
    const rejected: RejectedEntry[] = [];
    const valid: IndexEntry[] = [];

    for (const entry of entries) {
      if (entry.vector.length !== this.dimensions) {
        const error = new DimensionMismatchError(this.dimensions, entry.vector.length);
        rejected.push({ chunkId: entry.chunkId, code: error.code, message: error.message });
      } else {
        valid.push(entry);
      }
    }

    for (let i = 0; i < valid.length; i += BATCH_SIZE) {
      const batch = valid.slice(i, i + BATCH_SIZE);

      await this.client.upsert(this.collection, {
        wait: true,
        points: batch.map((e) => ({
          id: toPointId(e.chunkId),
          vector: e.vector,
          payload: {
            chunkId: e.chunkId,
            documentId: e.documentId,
            index: e.index,
            content: e.content,
            metadata: e.metadata,
          },
        })),
      });
    }

    return { upserted: valid.length, rejected };
  }

  async search(vector: number[], topK: number): Promise<ScoredChunk[]> {
    if (vector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, vector.length);
    }
    if (topK <= 0) return [];

    const results = await this.client.search(this.collection, {
      vector,
      limit: topK,
      with_payload: true,
    });

    return results
      .map((r) => {
        const payload = payloadSchema.parse(r.payload ?? {});
        return {
          chunkId: payload.chunkId,
          documentId: payload.documentId,
          index: payload.index,
          content: payload.content,
          score: r.score,
          metadata: payload.metadata,
        };
      })
      .sort(compareScored);
  }

  async deleteDocument(documentId: string): Promise<number> {
    const filter = documentFilter(documentId);
    const { count } = await this.client.count(this.collection, { filter, exact: true });

    await this.client.delete(this.collection, { wait: true, filter });

    return count;
  }

  async delete(chunkIds: string[]): Promise<void> {
    if (chunkIds.length === 0) return;
    await this.client.delete(this.collection, {
      wait: true,
      points: chunkIds.map(toPointId),
    });
  }

  async listChunkIds(documentId: string): Promise<string[]> {
    const ids: string[] = [];
    await this.scrollDocument(documentId, ["chunkId"], (payload) => {
      const chunkId = payload["chunkId"];
      if (typeof chunkId === "string") ids.push(chunkId);
    });
    return ids;
  }

  async getChunks(documentId: string): Promise<StoredChunk[]> {
    const chunks: StoredChunk[] = [];
    await this.scrollDocument(documentId, true, (payload) => {
      chunks.push(payloadSchema.parse(payload));
    });
    return chunks.sort((a, b) => a.index - b.index);
  }

  async count(): Promise<number> {
    const { count } = await this.client.count(this.collection, { exact: true });
    return count;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async scrollDocument(
    documentId: string,
    withPayload: string[] | true,
    visit: (payload: Record<string, unknown>) => void,
  ): Promise<void> {
    let offset: string | number | undefined;

    do {
      const page = await this.client.scroll(this.collection, {
        filter: documentFilter(documentId),
        limit: SCROLL_PAGE_SIZE,
        with_payload: withPayload,
        with_vector: false,
        offset,
      });

      for (const point of page.points) {
        if (point.payload) visit(point.payload);
      }

      const next = page.next_page_offset;
      offset = typeof next === "string" || typeof next === "number" ? next : undefined;
    } while (offset !== undefined);
  }
}
