import type { Chunk } from "./chunk.js";

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface ParseResult {
  pages: PageText[];
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface ChunkResult {
  content: string;
  index: number;
  metadata: {
    startChar: number;
    endChar: number;
  };
}

export interface LoadResult {
  chunks: Chunk[];
  /** Number of pages that yielded text. */
  documentCount: number;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type PayloadValue = string | number | boolean;

export type VectorPayload = Record<string, PayloadValue>;

export interface VectorRecord {
  id: string;
  vector: number[];
  content: string;
  payload: VectorPayload;
}
