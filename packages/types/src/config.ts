import type { ChunkStrategy } from "./chunk.js";

export type VectorStoreType = "local" | "qdrant";

export type EmbeddingProviderType = "openai" | "cohere";

export type GeneratorProviderType = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  storage: StorageConfig;
  vectorStore: VectorStoreConfig;
  embeddings: EmbeddingsConfig;
  generator: GeneratorConfig;
  openai: OpenAIConfig;
  cohere: CohereConfig;
  chunking: ChunkingSettings;
  retrieval: RetrievalConfig;
}

export interface StorageConfig {
  uploadDir: string;
  metadataFile: string;
  maxUploadBytes: number;
  baseDocsDir: string;
}

export interface VectorStoreConfig {
  type: VectorStoreType;
  rootDir: string;
  baseCollection: string;
  userCollection: string;
  qdrantUrl?: string;
  qdrantApiKey?: string;
}

export interface EmbeddingsConfig {
  provider: EmbeddingProviderType;
}

export interface GeneratorConfig {
  provider: GeneratorProviderType;
}

export interface OpenAIConfig {
  apiKey: string;
  embedModel: string;
  chatModel: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
  chatModel: string;
}

export interface ChunkingSettings {
  strategy: ChunkStrategy;
  chunkSize: number;
  chunkOverlap: number;
}

export interface RetrievalConfig {
  topK: number;
}
