import type {
  BatchFileState,
  BatchSummary,
  BatchUploadState,
  UploadFile,
} from "@studydesk/types";
import { fingerprintFileSet, hashContent } from "@studydesk/crypto";
import { errorMessage } from "@studydesk/errors";
import type { Logger } from "@studydesk/logger";
import type { DocumentStore } from "./document-store.js";
import type { DualVectorIndex } from "./dual-index.js";

export interface BatchUploadDependencies {
  store: DocumentStore;
  index: DualVectorIndex;
  logger: Logger;
}

/**
 * Drives a selected set of uploads through save -> index -> mark indexed,
 * one file at a time. The batch is identified by the set's fingerprint
 * (names and content hashes): reselecting the same files keeps per-file
 * progress.
 */
export class BatchUploadCoordinator {
  private deps: BatchUploadDependencies;
  private state: BatchUploadState | undefined;

  constructor(deps: BatchUploadDependencies) {
    this.deps = deps;
  }

  get current(): BatchUploadState | undefined {
    return this.state;
  }

  select(files: readonly UploadFile[]): BatchUploadState {
    const batchId = fingerprintFileSet(
      files.map((f) => ({ name: f.name, contentHash: hashContent(f.content) })),
    );

    if (this.state?.batchId === batchId) {
      return this.state;
    }

    this.state = {
      batchId,
      files: files.map((file): BatchFileState => ({ file, status: "pending" })),
    };
    this.deps.logger.info({ batchId, files: files.length }, "New upload batch selected");
    return this.state;
  }

  async process(): Promise<BatchSummary> {
    const state = this.state;
    if (!state) return this.summary();

    for (const entry of state.files) {
      if (entry.status !== "pending") continue;

      entry.status = "processing";
      try {
        await this.processFile(entry);
      } catch (err) {
        this.markFailed(entry, errorMessage(err));
      }
    }

    const summary = this.summary();
    this.deps.logger.info(
      { batchId: summary.batchId, success: summary.success, failed: summary.failed },
      "Upload batch processed",
    );
    return summary;
  }

  /** Requeue failed files in the current batch. Returns how many were reset. */
  resetFailed(): number {
    let reset = 0;
    for (const entry of this.state?.files ?? []) {
      if (entry.status === "failed") {
        entry.status = "pending";
        delete entry.error;
        delete entry.record;
        delete entry.chunksAdded;
        reset++;
      }
    }
    return reset;
  }

  summary(): BatchSummary {
    const files = this.state?.files ?? [];
    const count = (status: BatchFileState["status"]) => files.filter((f) => f.status === status).length;

    return {
      batchId: this.state?.batchId ?? "",
      total: files.length,
      pending: count("pending"),
      processing: count("processing"),
      success: count("success"),
      failed: count("failed"),
      failures: files
        .filter((f) => f.status === "failed")
        .map((f) => ({ name: f.file.name, error: f.error ?? "Unknown error" })),
    };
  }

  private async processFile(entry: BatchFileState): Promise<void> {
    const { store, index, logger } = this.deps;
    const name = entry.file.name;

    const uploaded = await store.upload(entry.file);
    if (!uploaded.success) {
      this.markFailed(entry, uploaded.error.message);
      return;
    }
    const record = uploaded.data;
    entry.record = record;

    const indexed = await index.addUserDocument({
      path: record.storagePath,
      originalFilename: record.originalFilename,
      uploadTime: record.uploadedAt,
      fileSize: record.byteSize,
    });
    if (!indexed.success) {
      let reason = indexed.error.message;
      const cleanup = await store.delete(record.fileId);
      if (!cleanup.success) {
        logger.warn({ err: cleanup.error, fileId: record.fileId }, "Cleanup after failed indexing failed");
        reason = `${reason} (cleanup failed: ${cleanup.error.message})`;
      }
      this.markFailed(entry, reason);
      return;
    }
    entry.chunksAdded = indexed.data;

    const marked = await store.markIndexed(record.fileId);
    if (!marked.success) {
      this.markFailed(
        entry,
        `"${name}" was indexed (${String(indexed.data)} chunks) but its record is still marked unindexed: ${marked.error.message}`,
      );
      return;
    }

    entry.status = "success";
    logger.info({ fileId: record.fileId, chunks: indexed.data }, "Upload indexed");
  }

  private markFailed(entry: BatchFileState, reason: string): void {
    entry.status = "failed";
    entry.error = reason;
    this.deps.logger.warn({ file: entry.file.name, reason }, "Upload failed");
  }
}
