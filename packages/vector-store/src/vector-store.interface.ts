import type { PayloadValue, VectorPayload, VectorRecord } from "@studydesk/types";

export interface VectorSearchParams {
  vector: number[];
  topK: number;
  scoreThreshold?: number;
}

/** Equality match on every listed payload key. */
export type PayloadFilter = Record<string, PayloadValue>;

export interface VectorSearchResult {
  id: string;
  score: number;
  content: string;
  payload: VectorPayload;
}

export interface IVectorStore {
  collectionExists(collectionName: string): Promise<boolean>;
  /**
   * Create (or replace) a collection holding exactly `records`, persisted as
   * a single write. A failure leaves no collection behind.
   */
  createCollection(collectionName: string, dimensions: number, records: VectorRecord[]): Promise<void>;
  /** Open a collection, creating an empty one when absent. */
  ensureCollection(collectionName: string, dimensions: number): Promise<void>;
  count(collectionName: string): Promise<number>;
  /** Insert all records or none. */
  upsert(collectionName: string, records: VectorRecord[]): Promise<void>;
  search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]>;
  /** Returns the number of removed records. */
  deleteByFilter(collectionName: string, filter: PayloadFilter): Promise<number>;
  dropCollection(collectionName: string): Promise<void>;
  healthCheck(): Promise<boolean>;
}
