import type { ChunkResult, ChunkingConfig } from "@docguard/types";
import type { IChunker } from "./chunker.interface.js";
import { estimateTokens, validateChunkingConfig } from "./validate.js";
import { snapEnd, snapStart } from "./surrogates.js";

/**
 * Fixed character windows. Each window after the first starts `overlap`
 * characters before the previous one ended. Windows never split a
 * surrogate pair.
 */
export class FixedChunker implements IChunker {
  readonly strategy = "fixed";

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const { maxSize, overlap } = config;
    const results: ChunkResult[] = [];

    let startChar = 0;
    let index = 0;

    while (startChar < content.length) {
      const endChar = snapEnd(content, Math.min(startChar + maxSize, content.length), startChar + overlap + 1);
      const text = content.slice(startChar, endChar);

      results.push({
        content: text,
        index,
        tokenCount: estimateTokens(text),
        metadata: { startChar, endChar },
      });
      index++;

      if (endChar === content.length) break;
      startChar = snapStart(content, endChar - overlap);
    }

    return results;
  }
}
