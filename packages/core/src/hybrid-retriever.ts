import type { ScoredChunk } from "@studydesk/types";
import type { IEmbeddingProvider } from "@studydesk/embeddings";
import type { IVectorStore } from "@studydesk/vector-store";
import type { Logger } from "@studydesk/logger";
import { fromPayload } from "./chunk-payload.js";
import { formatWithProvenance } from "./context-assembler.js";

export interface HybridRetrieverOptions {
  vectorStore: IVectorStore;
  embeddings: IEmbeddingProvider;
  logger: Logger;
  baseCollection: string;
  userCollection: string;
}

/**
 * Query both collections with the same embedding and merge the results:
 * base hits first, then user hits, truncated to k. No re-ranking across
 * collections. A failing collection contributes nothing.
 */
export class HybridRetriever {
  private options: HybridRetrieverOptions;
  private logger: Logger;

  constructor(options: HybridRetrieverOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  async retrieve(query: string, k: number): Promise<ScoredChunk[]> {
    if (k <= 0) return [];

    let vector: number[] | undefined;
    try {
      const result = await this.options.embeddings.embed(query);
      vector = result.embeddings[0];
    } catch (err) {
      this.logger.warn({ err }, "Query embedding failed, returning no results");
      return [];
    }
    if (!vector) {
      this.logger.warn("Query embedding was empty, returning no results");
      return [];
    }

    const [base, user] = await Promise.all([
      this.searchCollection(this.options.baseCollection, vector, k),
      this.searchUser(vector, k),
    ]);

    return [...base, ...user].slice(0, k);
  }

  formatWithProvenance(chunks: readonly ScoredChunk[]): string {
    return formatWithProvenance(chunks);
  }

  private async searchUser(vector: number[], k: number): Promise<ScoredChunk[]> {
    const collection = this.options.userCollection;
    try {
      if (!(await this.options.vectorStore.collectionExists(collection))) return [];
      if ((await this.options.vectorStore.count(collection)) === 0) return [];
    } catch (err) {
      this.logger.warn({ err, collection }, "User collection unavailable");
      return [];
    }
    return this.searchCollection(collection, vector, k);
  }

  private async searchCollection(collection: string, vector: number[], k: number): Promise<ScoredChunk[]> {
    try {
      const results = await this.options.vectorStore.search(collection, { vector, topK: k });
      const chunks: ScoredChunk[] = [];

      for (const result of results) {
        const metadata = fromPayload(result.payload);
        if (!metadata) {
          this.logger.warn({ collection, chunkId: result.id }, "Skipping chunk with malformed metadata");
          continue;
        }
        chunks.push({ chunkId: result.id, content: result.content, score: result.score, metadata });
      }
      return chunks;
    } catch (err) {
      this.logger.warn({ err, collection }, "Collection search failed, treating as empty");
      return [];
    }
  }
}
