import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import { IndexingError } from "@studydesk/errors";
import { createSilentLogger } from "@studydesk/logger";
import { LocalVectorStore } from "@studydesk/vector-store";
import { DualVectorIndex } from "./dual-index.js";
import { fromPayload } from "./chunk-payload.js";
import { FakeEmbeddings, FakePdfParser, makeTempDir, topicVector, writePdf } from "./test-helpers.js";

describe("DualVectorIndex", () => {
  let root: string;
  let baseDocsDir: string;
  let vectorDir: string;
  let embeddings: FakeEmbeddings;

  function createIndex(store = new LocalVectorStore(vectorDir)): DualVectorIndex {
    return new DualVectorIndex({
      vectorStore: store,
      embeddings,
      parser: new FakePdfParser(),
      logger: createSilentLogger(),
      baseDocsDir,
      chunkSize: 300,
      chunkOverlap: 50,
    });
  }

  beforeEach(async () => {
    root = await makeTempDir();
    baseDocsDir = path.join(root, "course");
    vectorDir = path.join(root, "vectors");
    embeddings = new FakeEmbeddings();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe("initializeBase", () => {
    beforeEach(async () => {
      await writePdf(baseDocsDir, "thermo.pdf", "entropy entropy entropy", "entropy gradient");
      await writePdf(path.join(baseDocsDir, "week2"), "bio.pdf", "protein folding protein");
    });

    it("builds the base collection from nested PDFs once", async () => {
      const index = createIndex();
      expect(index.baseState).toEqual({ status: "uninitialized" });

      const first = await index.initializeBase();
      const second = await index.initializeBase();

      expect(first).toBe(3);
      expect(second).toBe(3);
      expect(embeddings.calls).toBe(1);
      expect(index.baseState).toEqual({ status: "built", count: 3 });
    });

    it("reuses the persisted collection on the next run", async () => {
      await createIndex().initializeBase();
      embeddings = new FakeEmbeddings();

      const index = createIndex();
      const count = await index.initializeBase();

      expect(count).toBe(3);
      expect(embeddings.calls).toBe(0);
      expect(index.baseState).toEqual({ status: "loaded", count: 3 });
    });

    it("rebuilds after invalidation", async () => {
      const index = createIndex();
      await index.initializeBase();

      await index.invalidateBase();
      expect(index.baseState).toEqual({ status: "uninitialized" });

      expect(await index.initializeBase()).toBe(3);
      expect(embeddings.calls).toBe(2);
      expect(index.baseState).toEqual({ status: "built", count: 3 });
    });

    it("persists nothing when embedding fails, and retries on the next call", async () => {
      const store = new LocalVectorStore(vectorDir);
      const index = createIndex(store);
      embeddings.failing = true;

      await expect(index.initializeBase()).rejects.toThrow("embedding service down");
      expect(await store.collectionExists("base")).toBe(false);

      embeddings.failing = false;
      expect(await index.initializeBase()).toBe(3);
    });
  });

  describe("initializeBase without usable documents", () => {
    it("returns 0 when the directory is missing", async () => {
      const store = new LocalVectorStore(vectorDir);

      expect(await createIndex(store).initializeBase()).toBe(0);
      expect(await store.collectionExists("base")).toBe(false);
    });

    it("returns 0 when the directory has no PDFs", async () => {
      await mkdir(baseDocsDir, { recursive: true });

      expect(await createIndex().initializeBase()).toBe(0);
    });

    it("returns 0 when no PDF yields text", async () => {
      await writePdf(baseDocsDir, "blank.pdf", "   ");

      expect(await createIndex().initializeBase()).toBe(0);
      expect(embeddings.calls).toBe(0);
    });
  });

  describe("user documents", () => {
    const input = (filePath: string) => ({
      path: filePath,
      originalFilename: "notes.pdf",
      uploadTime: "2024-01-02T03:04:05.000Z",
      fileSize: 42,
    });

    it("indexes every chunk with the identifying fields", async () => {
      const store = new LocalVectorStore(vectorDir);
      const index = createIndex(store);
      const file = await writePdf(root, "stored.pdf", "entropy notes", "gradient notes");

      const result = await index.addUserDocument(input(file));

      expect(result).toEqual({ success: true, data: 2 });
      expect(index.userState).toEqual({ status: "loaded", count: 2 });

      const hits = await store.search("user", { vector: topicVector("gradient"), topK: 1 });
      expect(hits[0]?.content).toBe("gradient notes");
      expect(fromPayload(hits[0]?.payload ?? {})).toEqual({
        sourceType: "user",
        source: file,
        pageNumber: 2,
        startChar: 0,
        endChar: 14,
        originalFilename: "notes.pdf",
        uploadTime: "2024-01-02T03:04:05.000Z",
        fileSize: 42,
      });
    });

    it("fails with IndexingError when no text can be extracted", async () => {
      const index = createIndex();
      const file = await writePdf(root, "blank.pdf", " ");

      const result = await index.addUserDocument(input(file));

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(IndexingError);
      expect(result.error.message).toBe('No text could be extracted from "notes.pdf"');
    });

    it("inserts nothing when embedding fails", async () => {
      const store = new LocalVectorStore(vectorDir);
      const index = createIndex(store);
      const file = await writePdf(root, "stored.pdf", "entropy notes");
      embeddings.failing = true;

      const result = await index.addUserDocument(input(file));

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(IndexingError);
      expect(result.error.message).toBe('Indexing "notes.pdf" failed: embedding service down');
      expect(await store.count("user")).toBe(0);
    });

    it("removes all chunks of a filename and can add them again", async () => {
      const store = new LocalVectorStore(vectorDir);
      const index = createIndex(store);
      const file = await writePdf(root, "stored.pdf", "entropy notes", "gradient notes");

      await index.addUserDocument(input(file));
      const removed = await index.removeUserDocument("notes.pdf");

      expect(removed).toEqual({ success: true, data: 2 });
      expect(await store.count("user")).toBe(0);

      const readded = await index.addUserDocument(input(file));
      expect(readded).toEqual({ success: true, data: 2 });
      expect(await store.count("user")).toBe(2);
    });

    it("treats removing an unknown filename as success", async () => {
      const index = createIndex();

      expect(await index.removeUserDocument("never-uploaded.pdf")).toEqual({ success: true, data: 0 });
    });
  });
});
