import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { VectorRecord } from "@studydesk/types";
import { NotFoundError, StorageError, ValidationError, errorMessage } from "@studydesk/errors";
import type {
  IVectorStore,
  PayloadFilter,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { cosineSimilarity } from "./similarity.js";

const COLLECTION_FILE = "collection.json";
const COLLECTION_NAME = /^[A-Za-z0-9_-]+$/;

const collectionFileSchema = z.object({
  name: z.string(),
  dimensions: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
  records: z.array(
    z.object({
      id: z.string(),
      vector: z.array(z.number()),
      content: z.string(),
      payload: z.record(z.union([z.string(), z.number(), z.boolean()])),
    }),
  ),
});

type CollectionFile = z.infer<typeof collectionFileSchema>;

/**
 * On-disk vector store: one JSON file per collection at
 * `<rootDir>/<name>/collection.json`. Every mutation rewrites the file
 * through a temp file + rename, so readers see either the old or the new
 * collection. Brute-force cosine search; single writer assumed.
 */
export class LocalVectorStore implements IVectorStore {
  private rootDir: string;
  private cache = new Map<string, CollectionFile>();

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    if (this.cache.has(collectionName)) return true;

    try {
      await access(this.collectionPath(collectionName));
      return true;
    } catch {
      return false;
    }
  }

  async createCollection(
    collectionName: string,
    dimensions: number,
    records: VectorRecord[],
  ): Promise<void> {
    assertDimensions(records, dimensions);
    const now = new Date().toISOString();

    await this.persist({
      name: collectionName,
      dimensions,
      createdAt: now,
      updatedAt: now,
      records: records.map(copyRecord),
    });
  }

  async ensureCollection(collectionName: string, dimensions: number): Promise<void> {
    if (await this.collectionExists(collectionName)) {
      const collection = await this.load(collectionName);
      if (collection.dimensions !== dimensions) {
        throw new ValidationError(
          `Collection "${collectionName}" stores ${String(collection.dimensions)}-dimensional vectors, got ${String(dimensions)}`,
          { dimensions: "mismatch" },
          { operation: "vectorStore.ensureCollection" },
        );
      }
      return;
    }

    await this.createCollection(collectionName, dimensions, []);
  }

  async count(collectionName: string): Promise<number> {
    const collection = await this.load(collectionName);
    return collection.records.length;
  }

  async upsert(collectionName: string, records: VectorRecord[]): Promise<void> {
    const collection = await this.load(collectionName);
    assertDimensions(records, collection.dimensions);

    const incoming = new Map(records.map((r) => [r.id, copyRecord(r)]));
    const kept = collection.records.filter((r) => !incoming.has(r.id));

    await this.persist({
      ...collection,
      updatedAt: new Date().toISOString(),
      records: [...kept, ...incoming.values()],
    });
  }

  async search(collectionName: string, params: VectorSearchParams): Promise<VectorSearchResult[]> {
    const collection = await this.load(collectionName);
    if (params.vector.length !== collection.dimensions) {
      throw new ValidationError(
        `Query vector has ${String(params.vector.length)} dimensions, collection "${collectionName}" has ${String(collection.dimensions)}`,
        { vector: "dimension mismatch" },
        { operation: "vectorStore.search" },
      );
    }

    const threshold = params.scoreThreshold ?? Number.NEGATIVE_INFINITY;

    return collection.records
      .map((r) => ({
        id: r.id,
        score: cosineSimilarity(params.vector, r.vector),
        content: r.content,
        payload: { ...r.payload },
      }))
      .filter((r) => r.score >= threshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, params.topK);
  }

  async deleteByFilter(collectionName: string, filter: PayloadFilter): Promise<number> {
    const collection = await this.load(collectionName);
    const entries = Object.entries(filter);

    const kept = collection.records.filter(
      (r) => !entries.every(([key, value]) => r.payload[key] === value),
    );
    const removed = collection.records.length - kept.length;

    if (removed > 0) {
      await this.persist({ ...collection, updatedAt: new Date().toISOString(), records: kept });
    }

    return removed;
  }

  async dropCollection(collectionName: string): Promise<void> {
    const dir = path.dirname(this.collectionPath(collectionName));
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      throw new StorageError(`Failed to drop collection "${collectionName}": ${errorMessage(err)}`, {
        operation: "vectorStore.drop",
        cause: err,
      });
    } finally {
      this.cache.delete(collectionName);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.rootDir, { recursive: true });
      return true;
    } catch {
      return false;
    }
  }

  private collectionPath(collectionName: string): string {
    if (!COLLECTION_NAME.test(collectionName)) {
      throw new ValidationError(
        `Invalid collection name "${collectionName}"`,
        { collectionName: "only letters, digits, '_' and '-' are allowed" },
        { operation: "vectorStore.path" },
      );
    }
    return path.join(this.rootDir, collectionName, COLLECTION_FILE);
  }

  private async load(collectionName: string): Promise<CollectionFile> {
    const cached = this.cache.get(collectionName);
    if (cached) return cached;

    const filePath = this.collectionPath(collectionName);
    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      throw new NotFoundError(`Collection "${collectionName}" does not exist`, {
        operation: "vectorStore.load",
        cause: err,
      });
    }

    try {
      const collection = collectionFileSchema.parse(JSON.parse(raw));
      this.cache.set(collectionName, collection);
      return collection;
    } catch (err) {
      throw new StorageError(`Collection "${collectionName}" is corrupt: ${errorMessage(err)}`, {
        operation: "vectorStore.load",
        cause: err,
      });
    }
  }

  private async persist(collection: CollectionFile): Promise<void> {
    const filePath = this.collectionPath(collection.name);
    const tmpPath = `${filePath}.tmp-${String(process.pid)}-${String(Date.now())}`;

    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(tmpPath, JSON.stringify(collection));
      await rename(tmpPath, filePath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw new StorageError(`Failed to write collection "${collection.name}": ${errorMessage(err)}`, {
        operation: "vectorStore.persist",
        cause: err,
      });
    }

    this.cache.set(collection.name, collection);
  }
}

function copyRecord(record: VectorRecord): VectorRecord {
  return {
    id: record.id,
    vector: [...record.vector],
    content: record.content,
    payload: { ...record.payload },
  };
}

function assertDimensions(records: VectorRecord[], dimensions: number): void {
  const bad = records.find((r) => r.vector.length !== dimensions);
  if (bad) {
    throw new ValidationError(
      `Record ${bad.id} has ${String(bad.vector.length)} dimensions, expected ${String(dimensions)}`,
      { vector: "dimension mismatch" },
      { operation: "vectorStore.write" },
    );
  }
}
