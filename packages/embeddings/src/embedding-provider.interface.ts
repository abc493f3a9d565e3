import type { EmbeddingResult } from "@studydesk/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;
  /** Most texts the provider accepts in one request. */
  readonly maxBatchSize?: number;

  /** Embed a search query. */
  embed(text: string): Promise<EmbeddingResult>;
  /** Embed document chunks, in input order. */
  batchEmbed(texts: string[]): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
