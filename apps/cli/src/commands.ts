import { readFile } from "node:fs/promises";
import path from "node:path";
import { PDF_MIME_TYPE, type BatchSummary, type UploadFile } from "@studydesk/types";
import { NotFoundError, StorageError, errorMessage } from "@studydesk/errors";
import { answerQuestion } from "@studydesk/core";
import type { Command } from "./args.js";
import { USAGE } from "./args.js";
import type { Container } from "./container.js";

export type Output = (line: string) => void;

async function readUpload(filePath: string): Promise<UploadFile> {
  let content: Uint8Array;
  try {
    content = await readFile(filePath);
  } catch (err) {
    throw new StorageError(`Cannot read file: ${errorMessage(err)}`, {
      operation: "cli.upload",
      cause: err,
    });
  }
  const name = path.basename(filePath);
  const type = path.extname(name).toLowerCase() === ".pdf" ? PDF_MIME_TYPE : "application/octet-stream";
  return { name, type, size: content.byteLength, content };
}

interface UnreadableUpload {
  path: string;
  error: string;
}

function printSummary(
  summary: BatchSummary | undefined,
  unreadable: readonly UnreadableUpload[],
  out: Output,
): void {
  const total = (summary?.total ?? 0) + unreadable.length;
  out(`${String(summary?.success ?? 0)} of ${String(total)} uploaded and indexed`);
  for (const skipped of unreadable) {
    out(`  failed: ${skipped.path}: ${skipped.error}`);
  }
  for (const failure of summary?.failures ?? []) {
    out(`  failed: ${failure.name}: ${failure.error}`);
  }
}

/** Runs one command. Resolves to the process exit code. */
export async function runCommand(command: Command, container: Container, out: Output): Promise<number> {
  const { store, index, retriever, coordinator, generator, logger, config } = container;

  switch (command.name) {
    case "help":
      out(USAGE);
      return 0;

    case "init": {
      const base = await index.initializeBase();
      await index.initializeUser();
      const user = index.userState.status === "uninitialized" ? 0 : index.userState.count;
      out(`Course collection: ${String(base)} chunks (${index.baseState.status})`);
      out(`User collection: ${String(user)} chunks`);
      return 0;
    }

    case "rebuild-base": {
      await index.invalidateBase();
      const count = await index.initializeBase();
      out(`Course collection rebuilt: ${String(count)} chunks`);
      return 0;
    }

    case "upload": {
      const reads = await Promise.allSettled(command.files.map(readUpload));
      const files: UploadFile[] = [];
      const unreadable: UnreadableUpload[] = [];
      reads.forEach((read, i) => {
        if (read.status === "fulfilled") {
          files.push(read.value);
        } else {
          unreadable.push({ path: command.files[i] ?? "", error: errorMessage(read.reason) });
        }
      });
      if (unreadable.length > 0) {
        logger.warn({ paths: unreadable.map((u) => u.path) }, "Skipping unreadable uploads");
      }

      let summary: BatchSummary | undefined;
      if (files.length > 0) {
        coordinator.select(files);
        summary = await coordinator.process();
        if (command.retry && coordinator.resetFailed() > 0) {
          logger.info({ failed: summary.failed }, "Retrying failed uploads");
          summary = await coordinator.process();
        }
      }
      printSummary(summary, unreadable, out);
      return (summary?.failed ?? 0) === 0 && unreadable.length === 0 ? 0 : 1;
    }

    case "list": {
      const records = await store.list();
      if (records.length === 0) {
        out("No documents uploaded");
        return 0;
      }
      for (const record of records) {
        const state = record.indexed ? "indexed" : "not indexed";
        out(
          `${record.fileId}  ${record.originalFilename}  ${String(record.byteSize)} bytes  ${record.uploadedAt}  ${state}`,
        );
      }
      return 0;
    }

    case "delete": {
      const record = await store.get(command.fileId);
      if (!record) {
        throw new NotFoundError(`Document "${command.fileId}" does not exist`, { operation: "cli.delete" });
      }
      const deleted = await store.delete(command.fileId);
      if (!deleted.success) throw deleted.error;

      const removed = await index.removeUserDocument(record.originalFilename);
      if (!removed.success) throw removed.error;

      out(`Deleted ${record.originalFilename} (${String(removed.data)} chunks removed)`);
      return 0;
    }

    case "ask": {
      await index.initializeBase();
      await index.initializeUser();
      const result = await answerQuestion(command.question, command.k ?? config.retrieval.topK, {
        retriever,
        generator,
        logger,
      });
      out(result.answer);
      if (result.context !== "") {
        out("");
        out("Sources:");
        out(result.context);
      }
      return 0;
    }

    case "usage": {
      const bytes = await store.storageUsage();
      const records = await store.list();
      out(`Documents: ${String(records.length)}`);
      out(`Storage used: ${bytes === undefined ? "unavailable" : `${String(bytes)} bytes`}`);
      return 0;
    }
  }
}
