import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import type { Chunk, ChunkStrategy, Outcome, VectorRecord } from "@studydesk/types";
import {
  AppError,
  IndexingError,
  StorageError,
  fail,
  succeed,
  toAppError,
} from "@studydesk/errors";
import type { IEmbeddingProvider } from "@studydesk/embeddings";
import type { IParser } from "@studydesk/parser";
import type { IVectorStore } from "@studydesk/vector-store";
import type { Logger } from "@studydesk/logger";
import { loadAndSplit } from "./document-loader.js";
import { toPayload } from "./chunk-payload.js";
import { isMissingFile } from "./fs-errors.js";

export const DEFAULT_BASE_COLLECTION = "base";
export const DEFAULT_USER_COLLECTION = "user";

export type CollectionState =
  | { status: "uninitialized" }
  | { status: "loaded"; count: number }
  | { status: "built"; count: number };

export interface DualIndexOptions {
  vectorStore: IVectorStore;
  embeddings: IEmbeddingProvider;
  parser: IParser;
  logger: Logger;
  baseDocsDir: string;
  baseCollection?: string;
  userCollection?: string;
  chunkSize: number;
  chunkOverlap: number;
  strategy?: ChunkStrategy;
}

export interface UserDocumentInput {
  path: string;
  originalFilename: string;
  uploadTime: string;
  fileSize: number;
}

/**
 * Two independently lifecycled collections: `base` is built once from the
 * course directory and reused from disk afterwards; `user` takes inserts
 * and filename-scoped deletes.
 */
export class DualVectorIndex {
  readonly baseCollection: string;
  readonly userCollection: string;

  private options: DualIndexOptions;
  private logger: Logger;
  private basePromise: Promise<number> | undefined;
  private userPromise: Promise<void> | undefined;
  private base: CollectionState = { status: "uninitialized" };
  private user: CollectionState = { status: "uninitialized" };

  constructor(options: DualIndexOptions) {
    this.options = options;
    this.logger = options.logger;
    this.baseCollection = options.baseCollection ?? DEFAULT_BASE_COLLECTION;
    this.userCollection = options.userCollection ?? DEFAULT_USER_COLLECTION;
  }

  get baseState(): CollectionState {
    return this.base;
  }

  get userState(): CollectionState {
    return this.user;
  }

  /**
   * Load the persisted base collection, or build it from the PDFs under
   * `baseDocsDir` in a single write. Resolves to the stored chunk count.
   * Memoised until {@link invalidateBase}; a rejected build is not.
   */
  initializeBase(): Promise<number> {
    if (!this.basePromise) {
      this.basePromise = this.loadOrBuildBase().catch((err: unknown) => {
        this.basePromise = undefined;
        throw err;
      });
    }
    return this.basePromise;
  }

  /** Drop the persisted base collection so the next initialisation rebuilds it. */
  async invalidateBase(): Promise<void> {
    this.basePromise = undefined;
    this.base = { status: "uninitialized" };
    await this.options.vectorStore.dropCollection(this.baseCollection);
    this.logger.info({ collection: this.baseCollection }, "Base collection invalidated");
  }

  initializeUser(): Promise<void> {
    if (!this.userPromise) {
      this.userPromise = this.openUser().catch((err: unknown) => {
        this.userPromise = undefined;
        throw err;
      });
    }
    return this.userPromise;
  }

  /** Index one uploaded document. All chunks are inserted or none. */
  async addUserDocument(input: UserDocumentInput): Promise<Outcome<number, AppError>> {
    try {
      const { chunks } = await loadAndSplit(
        [input.path],
        {
          chunkSize: this.options.chunkSize,
          chunkOverlap: this.options.chunkOverlap,
          strategy: this.options.strategy,
          provenance: {
            sourceType: "user",
            originalFilename: input.originalFilename,
            uploadTime: input.uploadTime,
            fileSize: input.fileSize,
          },
        },
        { parser: this.options.parser, logger: this.logger },
      );

      if (chunks.length === 0) {
        return fail(
          new IndexingError(`No text could be extracted from "${input.originalFilename}"`, {
            operation: "index.addUserDocument",
          }),
        );
      }

      await this.initializeUser();
      const records = await this.embedChunks(chunks);
      await this.options.vectorStore.upsert(this.userCollection, records);
      await this.refreshUserCount();

      this.logger.info(
        { originalFilename: input.originalFilename, chunks: records.length },
        "User document indexed",
      );
      return succeed(records.length);
    } catch (err) {
      return fail(
        toAppError(
          err,
          (message, cause) =>
            new IndexingError(`Indexing "${input.originalFilename}" failed: ${message}`, {
              operation: "index.addUserDocument",
              cause,
            }),
        ),
      );
    }
  }

  /** Delete every user chunk carrying this filename. No match is not an error. */
  async removeUserDocument(originalFilename: string): Promise<Outcome<number, AppError>> {
    try {
      await this.initializeUser();
      const removed = await this.options.vectorStore.deleteByFilter(this.userCollection, {
        originalFilename,
      });
      await this.refreshUserCount();

      this.logger.info({ originalFilename, removed }, "User chunks removed");
      return succeed(removed);
    } catch (err) {
      return fail(
        toAppError(
          err,
          (message, cause) =>
            new StorageError(`Removing chunks of "${originalFilename}" failed: ${message}`, {
              operation: "index.removeUserDocument",
              cause,
            }),
        ),
      );
    }
  }

  private async loadOrBuildBase(): Promise<number> {
    const { vectorStore, baseDocsDir } = this.options;

    if (await vectorStore.collectionExists(this.baseCollection)) {
      const count = await this.safeCount(this.baseCollection);
      this.base = { status: "loaded", count };
      this.logger.info({ collection: this.baseCollection, count }, "Base collection loaded");
      return count;
    }

    const pdfs = await findPdfs(baseDocsDir);
    if (pdfs === undefined) {
      this.logger.error({ baseDocsDir }, "Base document directory does not exist");
      return 0;
    }
    if (pdfs.length === 0) {
      this.logger.warn({ baseDocsDir }, "No PDF files found for the base collection");
      return 0;
    }

    const { chunks, documentCount } = await loadAndSplit(
      pdfs,
      {
        chunkSize: this.options.chunkSize,
        chunkOverlap: this.options.chunkOverlap,
        strategy: this.options.strategy,
        provenance: { sourceType: "base" },
      },
      { parser: this.options.parser, logger: this.logger },
    );

    if (chunks.length === 0) {
      this.logger.error({ baseDocsDir, files: pdfs.length }, "No base documents could be loaded");
      return 0;
    }

    const records = await this.embedChunks(chunks);
    const dimensions = records[0]?.vector.length ?? this.options.embeddings.dimensions;
    await vectorStore.createCollection(this.baseCollection, dimensions, records);

    this.base = { status: "built", count: records.length };
    this.logger.info(
      { collection: this.baseCollection, files: pdfs.length, pages: documentCount, chunks: records.length },
      "Base collection built",
    );
    return records.length;
  }

  private async openUser(): Promise<void> {
    await this.options.vectorStore.ensureCollection(
      this.userCollection,
      this.options.embeddings.dimensions,
    );
    const count = await this.safeCount(this.userCollection);
    this.user = { status: "loaded", count };
  }

  private async refreshUserCount(): Promise<void> {
    this.user = { status: "loaded", count: await this.safeCount(this.userCollection) };
  }

  private async safeCount(collection: string): Promise<number> {
    try {
      return await this.options.vectorStore.count(collection);
    } catch (err) {
      this.logger.warn({ err, collection }, "Chunk count unavailable");
      return 0;
    }
  }

  private async embedChunks(chunks: Chunk[]): Promise<VectorRecord[]> {
    const result = await this.options.embeddings.batchEmbed(chunks.map((c) => c.content));
    if (result.embeddings.length !== chunks.length) {
      throw new IndexingError(
        `Expected ${String(chunks.length)} embeddings, got ${String(result.embeddings.length)}`,
        { operation: "index.embed" },
      );
    }

    const records: VectorRecord[] = [];
    chunks.forEach((chunk, i) => {
      const vector = result.embeddings[i];
      if (vector) {
        records.push({
          id: randomUUID(),
          vector,
          content: chunk.content,
          payload: toPayload(chunk.metadata),
        });
      }
    });
    return records;
  }
}

/** PDFs under `dir`, recursively and sorted; undefined when `dir` is missing. */
async function findPdfs(dir: string): Promise<string[] | undefined> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }

  const pdfs: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      pdfs.push(...((await findPdfs(entryPath)) ?? []));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(".pdf")) {
      pdfs.push(entryPath);
    }
  }
  return pdfs.sort();
}
