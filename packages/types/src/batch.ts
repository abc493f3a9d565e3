import type { DocumentRecord, UploadFile } from "./document.js";

export type BatchFileStatus = "pending" | "processing" | "success" | "failed";

export interface BatchFileState {
  file: UploadFile;
  status: BatchFileStatus;
  error?: string;
  record?: DocumentRecord;
  chunksAdded?: number;
}

export interface BatchUploadState {
  batchId: string;
  files: BatchFileState[];
}

export interface BatchFailure {
  name: string;
  error: string;
}

export interface BatchSummary {
  batchId: string;
  total: number;
  pending: number;
  processing: number;
  success: number;
  failed: number;
  failures: BatchFailure[];
}
