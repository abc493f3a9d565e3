import type { ChunkMetadata } from "./chunk.js";

export interface ScoredChunk {
  chunkId: string;
  content: string;
  score: number;
  metadata: ChunkMetadata;
}

export interface AnswerResult {
  question: string;
  answer: string;
  context: string;
  chunks: ScoredChunk[];
}
