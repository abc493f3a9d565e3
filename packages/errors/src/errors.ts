import { AppError } from "./app-error.js";

export interface ErrorContext {
  operation?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", context?: ErrorContext) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...context });
  }
}

/**
 * Input the caller has to fix. `fields` holds every failed check, keyed by
 * the checked attribute; `message` is the first failure.
 */
export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, context?: ErrorContext) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...context });
    this.fields = fields;
  }
}

/** Content already stored under another record. Informational, never retried. */
export class DuplicateError extends AppError {
  public readonly existingFileId: string;

  constructor(message: string, existingFileId: string, context?: ErrorContext) {
    super({ message, statusCode: 409, code: "DUPLICATE", ...context });
    this.existingFileId = existingFileId;
  }
}

/** Disk write or delete failure for document bytes. */
export class StorageError extends AppError {
  constructor(message = "Storage error", context?: ErrorContext) {
    super({ message, statusCode: 500, code: "STORAGE_ERROR", ...context });
  }
}

/** Parsing or embedding failed for one document. */
export class IndexingError extends AppError {
  constructor(message = "Indexing error", context?: ErrorContext) {
    super({ message, statusCode: 422, code: "INDEXING_ERROR", ...context });
  }
}

/**
 * The metadata file could not be read or rewritten. Index and disk may be
 * ahead of the recorded metadata when this surfaces.
 */
export class MetadataError extends AppError {
  constructor(message = "Metadata error", context?: ErrorContext) {
    super({ message, statusCode: 500, code: "METADATA_ERROR", ...context });
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, context?: ErrorContext) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...context });
    this.service = service;
  }
}
