export interface ScoredChunk {
  chunkId: string;
  documentId: string;
  index: number;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

/** Ordered by descending score, at most topK long. */
export type RetrievalResult = ScoredChunk[];

export interface RetrievalOptions {
  topK: number;
  minScore?: number;
}

export type NoContextPolicy = "answer" | "decline";

export interface QueryOptions {
  topK?: number;
  signal?: AbortSignal;
  stream?: boolean;
}
