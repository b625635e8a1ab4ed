import type { ChunkingConfig, DocumentInput, IndexEntry, RejectedEntry } from "@docguard/types";
import type { IChunker } from "@docguard/chunker";
import { bindChunks, dropBlankChunks } from "@docguard/chunker";
import type { IEmbeddingProvider } from "@docguard/embeddings";
import type { IVectorIndex } from "@docguard/vector-index";
import type { Logger } from "@docguard/logger";
import { EmptyInputError } from "@docguard/errors";
import type { IDocumentStore } from "./document-store.js";
import { contentHash } from "./document-store.js";
import { embedWithRetry } from "./embedding-retry.js";
import type { EmbeddingRetryPolicy } from "./embedding-retry.js";

export interface IngestionDependencies {
  chunker: IChunker;
  chunking: ChunkingConfig;
  embeddingProvider: IEmbeddingProvider;
  vectorIndex: IVectorIndex;
  documentStore: IDocumentStore;
  logger: Logger;
  embeddingRetry?: EmbeddingRetryPolicy;
}

export interface IngestionResult {
  documentId: string;
  chunkCount: number;
  rejected: RejectedEntry[];
  /** Entries from an earlier version of the document that no longer exist. */
  staleRemoved: number;
  tokensUsed: number;
  embeddingDimensions: number;
}

/**
 * Ingestion pipeline: Chunk -> Embed -> Upsert -> Prune -> Store text
 *
 * Chunk ids are derived from the document id and sequence index, so
 * re-ingesting the same text replaces entries in place. Entries left over
 * from a longer previous version are pruned after the upsert.
 */
export async function ingest(input: DocumentInput, deps: IngestionDependencies): Promise<IngestionResult> {
  const { documentId, text } = input;
  const metadata = input.metadata ?? {};

  if (text.trim().length === 0) {
    throw new EmptyInputError(`Document ${documentId} has no text to ingest`);
  }

  // Phase 1: Chunk
  const chunks = dropBlankChunks(
    bindChunks(documentId, deps.chunker.chunk(text, deps.chunking), deps.chunking.overlap),
    text,
  );

  // Phase 2: Embed
  const embeddingResult = await embedWithRetry(
    () => deps.embeddingProvider.batchEmbed(chunks.map((c) => c.content)),
    deps.embeddingRetry,
    deps.logger,
  );

  // Phase 3: Upsert
  const entries: IndexEntry[] = chunks.map((chunk, i) => ({
    chunkId: chunk.id,
    documentId,
    index: chunk.index,
    content: chunk.content,
    vector: embeddingResult.embeddings[i] ?? [],
    metadata: {
      ...metadata,
      startChar: chunk.metadata.startChar,
      endChar: chunk.metadata.endChar,
      ...(chunk.metadata.gapBefore ? { gapBefore: chunk.metadata.gapBefore } : {}),
      ...(chunk.metadata.gapAfter ? { gapAfter: chunk.metadata.gapAfter } : {}),
    },
  }));

  const previousIds = await deps.vectorIndex.listChunkIds(documentId);
  const { upserted, rejected } = await deps.vectorIndex.upsert(entries);

  for (const entry of rejected) {
    deps.logger.warn({ documentId, chunkId: entry.chunkId, code: entry.code }, entry.message);
  }

  // Phase 4: Prune entries the new version no longer has (or failed to rewrite)
  const rejectedIds = new Set(rejected.map((r) => r.chunkId));
  const written = new Set(entries.map((e) => e.chunkId).filter((id) => !rejectedIds.has(id)));
  const stale = previousIds.filter((id) => !written.has(id));
  await deps.vectorIndex.delete(stale);

  // Phase 5: Keep the full text for analysis and duplicate detection
  await deps.documentStore.put({
    id: documentId,
    text,
    metadata,
    contentHash: contentHash(text),
    ingestedAt: new Date(),
  });

  deps.logger.info(
    { documentId, chunkCount: upserted, rejected: rejected.length, staleRemoved: stale.length },
    "Document ingested",
  );

  return {
    documentId,
    chunkCount: upserted,
    rejected,
    staleRemoved: stale.length,
    tokensUsed: embeddingResult.tokensUsed,
    embeddingDimensions: embeddingResult.dimensions,
  };
}
