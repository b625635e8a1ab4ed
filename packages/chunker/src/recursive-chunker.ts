import type { ChunkResult, ChunkingConfig } from "@docguard/types";
import type { IChunker } from "./chunker.interface.js";
import { estimateTokens, validateChunkingConfig } from "./validate.js";
import { snapEnd, snapStart } from "./surrogates.js";

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", " "];

/**
 * Separator-aware windows.
 * Tries larger separators first: a window's end moves back to just after the last
 * paragraph break, line break, sentence end or space it contains, falling back to
 * a hard cut at maxSize. Windows never get trimmed, so the chunks still tile the
 * source with `overlap` shared characters (one fewer where that would start a
 * window inside a surrogate pair).
 */
export class RecursiveChunker implements IChunker {
  readonly strategy = "recursive";
  private separators: string[];

  constructor(separators?: string[]) {
    this.separators = (separators ?? DEFAULT_SEPARATORS).filter((s) => s.length > 0);
  }

  chunk(content: string, config: ChunkingConfig): ChunkResult[] {
    validateChunkingConfig(config);
    const { maxSize, overlap } = config;
    const results: ChunkResult[] = [];

    let startChar = 0;
    let index = 0;

    while (startChar < content.length) {
      const hardEnd = Math.min(startChar + maxSize, content.length);
      const endChar =
        hardEnd === content.length ? hardEnd : this.findBoundary(content, startChar, hardEnd, overlap);
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

  /**
   * The boundary must land past `start + overlap` so the next window still advances.
   */
  private findBoundary(content: string, start: number, hardEnd: number, overlap: number): number {
    const window = content.slice(start, hardEnd);
    const minEnd = start + overlap + 1;

    for (const separator of this.separators) {
      const position = window.lastIndexOf(separator);
      if (position < 0) continue;

      const candidate = start + position + separator.length;
      if (candidate >= minEnd) {
        return candidate;
      }
    }

    return snapEnd(content, hardEnd, minEnd);
  }
}
