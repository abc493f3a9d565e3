import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { DocumentMetadataMap, DocumentRecord, Outcome, UploadFile } from "@studydesk/types";
import { hashContent, uniqueStorageName } from "@studydesk/crypto";
import {
  AppError,
  DuplicateError,
  MetadataError,
  NotFoundError,
  StorageError,
  errorMessage,
  fail,
  succeed,
} from "@studydesk/errors";
import type { Logger } from "@studydesk/logger";
import { DEFAULT_MAX_UPLOAD_BYTES, validateUpload } from "./upload-validator.js";
import { isMissingFile } from "./fs-errors.js";

const DEFAULT_METADATA_FILE = "document_metadata.json";

const documentRecordSchema = z.object({
  fileId: z.string().min(1),
  originalFilename: z.string(),
  storagePath: z.string().min(1),
  byteSize: z.number().int().nonnegative(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  uploadedAt: z.string(),
  indexed: z.boolean(),
});

const metadataFileSchema = z.record(documentRecordSchema);

export interface DocumentStoreOptions {
  uploadDir: string;
  metadataFile?: string;
  maxUploadBytes?: number;
  logger: Logger;
  /** Clock for storage names and upload timestamps. */
  now?: () => Date;
}

/**
 * Uploaded PDFs on disk plus a flat JSON metadata file keyed by fileId.
 * Content hashes are unique across records. The metadata file is
 * rewritten in full on every mutation; a single writer is assumed.
 */
export class DocumentStore {
  private uploadDir: string;
  private metadataPath: string;
  private maxUploadBytes: number;
  private logger: Logger;
  private now: () => Date;

  constructor(options: DocumentStoreOptions) {
    this.uploadDir = options.uploadDir;
    this.metadataPath = path.join(options.uploadDir, options.metadataFile ?? DEFAULT_METADATA_FILE);
    this.maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  validate(file: UploadFile): Outcome<void, AppError> {
    return validateUpload(file, this.maxUploadBytes);
  }

  /** First record holding the same bytes, if any. */
  async checkDuplicate(content: Uint8Array): Promise<DocumentRecord | undefined> {
    const metadata = await this.readMetadata();
    if (!metadata.success) {
      this.logger.warn({ err: metadata.error }, "Duplicate check skipped, metadata unreadable");
      return undefined;
    }
    return findByHash(metadata.data, hashContent(content));
  }

  async upload(file: UploadFile): Promise<Outcome<DocumentRecord, AppError>> {
    const validation = this.validate(file);
    if (!validation.success) return fail(validation.error);

    const metadata = await this.readMetadata();
    if (!metadata.success) return fail(metadata.error);

    const contentHash = hashContent(file.content);
    const duplicate = findByHash(metadata.data, contentHash);
    if (duplicate) {
      return fail(
        new DuplicateError(
          `"${file.name}" is already stored as "${duplicate.originalFilename}" (uploaded ${duplicate.uploadedAt})`,
          duplicate.fileId,
          {
            operation: "documents.upload",
            details: {
              originalFilename: duplicate.originalFilename,
              uploadedAt: duplicate.uploadedAt,
            },
          },
        ),
      );
    }

    const now = this.now();
    const fileId = uniqueStorageName(file.name, now);
    const storagePath = path.join(this.uploadDir, fileId);

    try {
      await mkdir(this.uploadDir, { recursive: true });
      await writeFile(storagePath, file.content);
    } catch (err) {
      await this.removeQuietly(storagePath);
      return fail(
        new StorageError(`Failed to save "${file.name}": ${errorMessage(err)}`, {
          operation: "documents.upload",
          cause: err,
        }),
      );
    }

    const record: DocumentRecord = {
      fileId,
      originalFilename: file.name,
      storagePath,
      byteSize: file.content.byteLength,
      contentHash,
      uploadedAt: now.toISOString(),
      indexed: false,
    };

    const saved = await this.writeMetadata({ ...metadata.data, [fileId]: record });
    if (!saved.success) {
      await this.removeQuietly(storagePath);
      return fail(saved.error);
    }

    this.logger.info({ fileId, originalFilename: file.name, byteSize: record.byteSize }, "Document stored");
    return succeed(record);
  }

  /** Removes the backing file first, then the metadata entry. */
  async delete(fileId: string): Promise<Outcome<DocumentRecord, AppError>> {
    const metadata = await this.readMetadata();
    if (!metadata.success) return fail(metadata.error);

    const record = metadata.data[fileId];
    if (!record) {
      return fail(new NotFoundError(`Document "${fileId}" does not exist`, { operation: "documents.delete" }));
    }

    try {
      await rm(record.storagePath);
    } catch (err) {
      return fail(
        new StorageError(`Failed to delete "${record.originalFilename}": ${errorMessage(err)}`, {
          operation: "documents.delete",
          details: { fileId },
          cause: err,
        }),
      );
    }

    const remaining = { ...metadata.data };
    delete remaining[fileId];

    const saved = await this.writeMetadata(remaining);
    if (!saved.success) return fail(saved.error);

    this.logger.info({ fileId, originalFilename: record.originalFilename }, "Document deleted");
    return succeed(record);
  }

  /** Newest first. Unreadable metadata yields an empty list. */
  async list(): Promise<DocumentRecord[]> {
    const metadata = await this.readMetadata();
    if (!metadata.success) {
      this.logger.warn({ err: metadata.error }, "Listing documents failed");
      return [];
    }

    return Object.values(metadata.data).sort((a, b) =>
      a.uploadedAt < b.uploadedAt ? 1 : a.uploadedAt > b.uploadedAt ? -1 : 0,
    );
  }

  async get(fileId: string): Promise<DocumentRecord | undefined> {
    const metadata = await this.readMetadata();
    if (!metadata.success) {
      this.logger.warn({ err: metadata.error, fileId }, "Document lookup failed");
      return undefined;
    }
    return metadata.data[fileId];
  }

  /** Idempotent. Unknown ids succeed without a write. */
  async markIndexed(fileId: string): Promise<Outcome<void, AppError>> {
    const metadata = await this.readMetadata();
    if (!metadata.success) return fail(metadata.error);

    const record = metadata.data[fileId];
    if (!record || record.indexed) return succeed(undefined);

    return this.writeMetadata({ ...metadata.data, [fileId]: { ...record, indexed: true } });
  }

  /** Total bytes under the upload directory. */
  async storageUsage(): Promise<number | undefined> {
    try {
      return await directorySize(this.uploadDir);
    } catch (err) {
      if (isMissingFile(err)) return 0;
      this.logger.warn({ err, uploadDir: this.uploadDir }, "Storage usage unavailable");
      return undefined;
    }
  }

  private async readMetadata(): Promise<Outcome<DocumentMetadataMap, AppError>> {
    let raw: string;
    try {
      raw = await readFile(this.metadataPath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return succeed({});
      return fail(
        new MetadataError(`Failed to read document metadata: ${errorMessage(err)}`, {
          operation: "documents.readMetadata",
          cause: err,
        }),
      );
    }

    try {
      return succeed(metadataFileSchema.parse(JSON.parse(raw)));
    } catch (err) {
      return fail(
        new MetadataError(`Document metadata is corrupt: ${errorMessage(err)}`, {
          operation: "documents.readMetadata",
          cause: err,
        }),
      );
    }
  }

  private async writeMetadata(metadata: DocumentMetadataMap): Promise<Outcome<void, AppError>> {
    const tmpPath = `${this.metadataPath}.tmp-${String(process.pid)}`;
    try {
      await mkdir(this.uploadDir, { recursive: true });
      await writeFile(tmpPath, `${JSON.stringify(metadata, null, 2)}\n`, "utf-8");
      await rename(tmpPath, this.metadataPath);
      return succeed(undefined);
    } catch (err) {
      await this.removeQuietly(tmpPath);
      return fail(
        new MetadataError(`Failed to write document metadata: ${errorMessage(err)}`, {
          operation: "documents.writeMetadata",
          cause: err,
        }),
      );
    }
  }

  private async removeQuietly(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (err) {
      this.logger.warn({ err, filePath }, "Cleanup of partial write failed");
    }
  }
}

function findByHash(metadata: DocumentMetadataMap, contentHash: string): DocumentRecord | undefined {
  return Object.values(metadata).find((record) => record.contentHash === contentHash);
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(entryPath);
    } else if (entry.isFile()) {
      total += (await stat(entryPath)).size;
    }
  }
  return total;
}
