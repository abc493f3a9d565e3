export type SourceType = "base" | "user";

export type ChunkStrategy = "recursive" | "fixed";

interface ChunkLocation {
  /** Path of the PDF the chunk was read from. */
  source: string;
  /** 1-based page number inside `source`. */
  pageNumber: number;
  startChar: number;
  endChar: number;
}

export interface BaseChunkMetadata extends ChunkLocation {
  sourceType: "base";
}

export interface UserChunkMetadata extends ChunkLocation {
  sourceType: "user";
  originalFilename: string;
  uploadTime: string;
  fileSize: number;
}

export type ChunkMetadata = BaseChunkMetadata | UserChunkMetadata;

export interface Chunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface BaseProvenance {
  sourceType: "base";
}

export interface UserProvenance {
  sourceType: "user";
  originalFilename: string;
  uploadTime: string;
  fileSize: number;
}

export type ChunkProvenance = BaseProvenance | UserProvenance;

export interface ChunkingConfig {
  strategy: ChunkStrategy;
  /** Window size in characters. */
  chunkSize: number;
  /** Characters shared by consecutive windows; must be smaller than chunkSize. */
  chunkOverlap: number;
  separators?: string[];
}
