import type { ChunkResult, ChunkStrategy, ChunkingConfig } from "@docguard/types";

export interface IChunker {
  readonly strategy: ChunkStrategy;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
