import type { VectorStoreType } from "@studydesk/types";
import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { LocalVectorStore } from "./local-store.js";

export type {
  IVectorStore,
  PayloadFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export { LocalVectorStore } from "./local-store.js";
export { cosineSimilarity } from "./similarity.js";

export interface VectorStoreFactoryConfig {
  type: VectorStoreType;
  rootDir?: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export function createVectorStore(config: VectorStoreFactoryConfig): IVectorStore {
  switch (config.type) {
    case "local":
      if (!config.rootDir) {
        throw new Error("rootDir is required for the local vector store");
      }
      return new LocalVectorStore(config.rootDir);
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      return new QdrantVectorStore(config.qdrantUrl, config.qdrantApiKey);
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
