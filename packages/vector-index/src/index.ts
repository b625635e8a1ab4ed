import type { VectorIndexType } from "@docguard/types";
import type { IVectorIndex } from "./vector-index.interface.js";
import { InMemoryVectorIndex } from "./in-memory-index.js";
import { QdrantVectorIndex } from "./qdrant-adapter.js";
import { ConfigurationError } from "@docguard/errors";

export type { IVectorIndex } from "./vector-index.interface.js";
export { InMemoryVectorIndex } from "./in-memory-index.js";
export { QdrantVectorIndex, toPointId } from "./qdrant-adapter.js";
export type { QdrantVectorIndexConfig } from "./qdrant-adapter.js";
export { cosineSimilarity, compareScored } from "./similarity.js";

export interface VectorIndexConfig {
  type: VectorIndexType;
  dimensions: number;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection?: string;
}

export function createVectorIndex(config: VectorIndexConfig): IVectorIndex {
  switch (config.type) {
    case "memory":
      return new InMemoryVectorIndex(config.dimensions);
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new ConfigurationError("qdrantUrl is required for Qdrant vector index");
      }
      return new QdrantVectorIndex({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collection: config.collection ?? "docguard-chunks",
        dimensions: config.dimensions,
      });
    default:
      throw new ConfigurationError(`Unknown vector index type: ${String(config.type)}`);
  }
}
