export type {
  SourceType,
  ChunkStrategy,
  BaseChunkMetadata,
  UserChunkMetadata,
  ChunkMetadata,
  Chunk,
  BaseProvenance,
  UserProvenance,
  ChunkProvenance,
  ChunkingConfig,
} from "./chunk.js";

export type { DocumentRecord, UploadFile, DocumentMetadataMap } from "./document.js";
export { PDF_MIME_TYPE } from "./document.js";

export type {
  PageText,
  ParseResult,
  ChunkResult,
  LoadResult,
  EmbeddingResult,
  PayloadValue,
  VectorPayload,
  VectorRecord,
} from "./pipeline.js";

export type { ScoredChunk, AnswerResult } from "./query.js";

export type {
  BatchFileStatus,
  BatchFileState,
  BatchUploadState,
  BatchFailure,
  BatchSummary,
} from "./batch.js";

export type { Outcome } from "./outcome.js";

export type {
  AppConfig,
  VectorStoreType,
  EmbeddingProviderType,
  GeneratorProviderType,
  StorageConfig,
  VectorStoreConfig,
  EmbeddingsConfig,
  GeneratorConfig,
  OpenAIConfig,
  CohereConfig,
  ChunkingSettings,
  RetrievalConfig,
} from "./config.js";
