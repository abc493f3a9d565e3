import { QdrantClient } from "@qdrant/js-client-rest";
import type { PayloadValue, VectorPayload, VectorRecord } from "@studydesk/types";
import { errorMessage, StorageError } from "@studydesk/errors";
import type {
  IVectorStore,
  PayloadFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

const BATCH_SIZE = 100;
const CONTENT_KEY = "content";

interface MatchCondition {
  key: string;
  match: { value: PayloadValue };
}

function toFilter(filter: PayloadFilter): { must: MatchCondition[] } {
  return {
    must: Object.entries(filter).map(([key, value]) => ({ key, match: { value } })),
  };
}

function toPayload(raw: Record<string, unknown> | null | undefined): VectorPayload {
  const payload: VectorPayload = {};
  for (const [key, value] of Object.entries(raw ?? {})) {
    if (key === CONTENT_KEY) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      payload[key] = value;
    }
  }
  return payload;
}

export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;

  constructor(url: string, apiKey?: string) {
    this.client = new QdrantClient({ url, apiKey });
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    const result = await this.client.collectionExists(collectionName);
    return result.exists;
  }

  async createCollection(
    collectionName: string,
    dimensions: number,
    records: VectorRecord[],
  ): Promise<void> {
    if (await this.collectionExists(collectionName)) {
      await this.client.deleteCollection(collectionName);
    }
    await this.create(collectionName, dimensions);

    try {
      await this.writePoints(collectionName, records);
    } catch (err) {
      // No partial base collection may survive a failed build.
      await this.client.deleteCollection(collectionName);
      throw err;
    }
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    if (!(await this.collectionExists(collectionName))) {
      await this.create(collectionName, dimensions);
    }
  }

  async count(collectionName: string): Promise<number> {
    const result = await this.client.count(collectionName, { exact: true });
    return result.count;
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    try {
      await this.writePoints(collectionName, records);
    } catch (err) {
      // Compensate: remove whatever part of this write already landed.
      const ids = records.map((r) => r.id);
      if (ids.length > 0) {
        await this.client.delete(collectionName, { wait: true, points: ids });
      }
      throw new StorageError(`Qdrant upsert failed: ${errorMessage(err)}`, {
        operation: "vectorStore.upsert",
        cause: err,
      });
    }
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const results = await this.client.search(collectionName, {
      vector: params.vector,
      limit: params.topK,
      score_threshold: params.scoreThreshold,
      with_payload: true,
    });

    return results.map((r) => {
      const content = r.payload?.[CONTENT_KEY];
      return {
        id: typeof r.id === "string" ? r.id : String(r.id),
        score: r.score,
        content: typeof content === "string" ? content : "",
        payload: toPayload(r.payload),
      };
    });
  }

  async deleteByFilter(collectionName: string, filter: PayloadFilter): Promise<number> {
    const qdrantFilter = toFilter(filter);
    const { count } = await this.client.count(collectionName, { filter: qdrantFilter, exact: true });

    if (count > 0) {
      await this.client.delete(collectionName, { wait: true, filter: qdrantFilter });
    }

    return count;
  }

  async dropCollection(collectionName: string): Promise<void> {
    if (await this.collectionExists(collectionName)) {
      await this.client.deleteCollection(collectionName);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private async create(collectionName: string, dimensions: number): Promise<void> {
    await this.client.createCollection(collectionName, {
      vectors: {
        size: dimensions,
        distance: "Cosine",
      },
    });

    // Removal by uploaded filename filters on this field.
    await this.client.createPayloadIndex(collectionName, {
      field_name: "originalFilename",
      field_schema: "keyword",
    });
  }

  private async writePoints(collectionName: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(collectionName, {
        wait: true,
        points: batch.map((r) => ({
          id: r.id,
          vector: r.vector,
          payload: { ...r.payload, [CONTENT_KEY]: r.content },
        })),
      });
    }
  }
}
