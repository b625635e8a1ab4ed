import { createHash } from "node:crypto";
import type { EmbeddingResult } from "@docguard/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertNonBlank } from "./validation.js";

const DEFAULT_DIMENSIONS = 384;

const STOP_WORDS: ReadonlySet<string> = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "do", "does", "for", "from", "how",
  "in", "is", "it", "of", "on", "or", "that", "the", "this", "to", "was", "what",
  "when", "where", "which", "who", "why", "with",
]);

export interface HashingProviderConfig {
  dimensions?: number;
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).filter((t) => !STOP_WORDS.has(t));
}

/**
 * Local feature-hashing bag-of-words embedder. Needs no backend, so it is always
 * reachable; useful offline and in tests. Vectors are L2-normalised term counts.
 */
export class HashingEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "hashing";
  readonly dimensions: number;

  constructor(config: HashingProviderConfig = {}) {
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    assertNonBlank(texts);

    let tokensUsed = 0;
    const embeddings = texts.map((text) => {
      const tokens = tokenize(text);
      tokensUsed += tokens.length;
      return this.vectorize(tokens);
    });

    return {
      embeddings,
      model: `hashing-${String(this.dimensions)}`,
      tokensUsed,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private vectorize(tokens: string[]): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokens) {
      const bucket = createHash("sha256").update(token).digest().readUInt32BE(0) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
