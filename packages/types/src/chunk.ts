export type ChunkStrategy = "fixed" | "recursive";

export interface Chunk {
  id: string;
  documentId: string;
  index: number;
  content: string;
  tokenCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  startChar: number;
  endChar: number;
  overlap: number;
  /** Whitespace from dropped blank chunks between the previous kept chunk and this one. */
  gapBefore?: string;
  /** Whitespace from dropped blank chunks after the last kept chunk. */
  gapAfter?: string;
}

/** Sizes are in characters. */
export interface ChunkingConfig {
  strategy: ChunkStrategy;
  maxSize: number;
  overlap: number;
}

/** A chunker's output before it is bound to a document. */
export interface ChunkResult {
  content: string;
  index: number;
  tokenCount: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}
