import type { Chunk, ChunkResult } from "@docguard/types";

/** Deterministic, so re-ingesting a document replaces its entries instead of duplicating them. */
export function chunkId(documentId: string, index: number): string {
  return `${documentId}#${String(index)}`;
}

export function bindChunks(documentId: string, results: ChunkResult[], overlap: number): Chunk[] {
  return results.map((result) => ({
    id: chunkId(documentId, result.index),
    documentId,
    index: result.index,
    content: result.content,
    tokenCount: result.tokenCount,
    metadata: {
      startChar: result.metadata.startChar,
      endChar: result.metadata.endChar,
      overlap: result.index === 0 ? 0 : overlap,
    },
  }));
}

/**
 * Drops whitespace-only chunks. The source text they alone covered is
 * recorded on the neighbouring kept chunks so reconstruction stays exact.
 */
export function dropBlankChunks(chunks: Chunk[], source: string): Chunk[] {
  const kept: Chunk[] = [];
  let covered = 0;

  for (const chunk of chunks) {
    if (chunk.content.trim().length === 0) continue;
    const { startChar, endChar } = chunk.metadata;
    const gapBefore = startChar > covered ? source.slice(covered, startChar) : "";
    kept.push(gapBefore ? { ...chunk, metadata: { ...chunk.metadata, gapBefore } } : chunk);
    covered = Math.max(covered, endChar);
  }

  const last = kept[kept.length - 1];
  if (last && covered < source.length) {
    kept[kept.length - 1] = { ...last, metadata: { ...last.metadata, gapAfter: source.slice(covered) } };
  }
  return kept;
}

/**
 * Inverse of chunking: stitch chunks back together in sequence order,
 * dropping the characters each chunk shares with its predecessor.
 */
export function reconstructText(chunks: Array<Pick<Chunk, "index" | "content" | "metadata">>): string {
  const ordered = [...chunks].sort((a, b) => a.index - b.index);
  let text = "";
  let covered = 0;

  for (const chunk of ordered) {
    const gap = chunk.metadata.gapBefore ?? "";
    text += gap;
    covered += gap.length;
    const skip = Math.max(0, covered - chunk.metadata.startChar);
    text += chunk.content.slice(skip) + (chunk.metadata.gapAfter ?? "");
    covered = Math.max(covered, chunk.metadata.endChar);
  }

  return text;
}
