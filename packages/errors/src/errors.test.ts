import { describe, it, expect } from "vitest";
import { AppError, errorMessage } from "./app-error.js";
import {
  NotFoundError,
  ValidationError,
  DuplicateError,
  StorageError,
  IndexingError,
  MetadataError,
  ExternalServiceError,
} from "./errors.js";
import { succeed, fail, toAppError } from "./outcome.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root cause");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      operation: "upload",
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.operation).toBe("upload");
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });

  it("errorMessage reads Error messages and stringifies the rest", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("Error Subclasses", () => {
  it("NotFoundError has status 404 and NOT_FOUND code", () => {
    const err = new NotFoundError();
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe("NOT_FOUND");
    expect(err.message).toBe("Resource not found");
    expect(err.name).toBe("NotFoundError");
    expect(err).toBeInstanceOf(AppError);
  });

  it("NotFoundError accepts custom message and context", () => {
    const err = new NotFoundError("Document not found", { operation: "delete" });
    expect(err.message).toBe("Document not found");
    expect(err.operation).toBe("delete");
  });

  it("ValidationError has status 400, VALIDATION_ERROR code, and fields", () => {
    const fields = { type: "Not a PDF", size: "Too large" };
    const err = new ValidationError("Not a PDF", fields);
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.fields).toEqual(fields);
    expect(err.name).toBe("ValidationError");
  });

  it("DuplicateError has status 409 and points at the existing record", () => {
    const err = new DuplicateError("Already uploaded", "20240101_000000_abcd1234_ff00aa_notes.pdf");
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe("DUPLICATE");
    expect(err.existingFileId).toBe("20240101_000000_abcd1234_ff00aa_notes.pdf");
    expect(err.name).toBe("DuplicateError");
  });

  it("StorageError, IndexingError and MetadataError carry distinct codes", () => {
    expect(new StorageError().code).toBe("STORAGE_ERROR");
    expect(new StorageError().statusCode).toBe(500);
    expect(new IndexingError().code).toBe("INDEXING_ERROR");
    expect(new IndexingError().statusCode).toBe(422);
    expect(new MetadataError().code).toBe("METADATA_ERROR");
    expect(new MetadataError().statusCode).toBe(500);
  });

  it("ExternalServiceError has status 502, EXTERNAL_SERVICE_ERROR code, and service", () => {
    const err = new ExternalServiceError("Cohere is down", "cohere");
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
    expect(err.service).toBe("cohere");
    expect(err.name).toBe("ExternalServiceError");
  });
});

describe("Outcome helpers", () => {
  it("succeed wraps data", () => {
    expect(succeed(3)).toEqual({ success: true, data: 3 });
  });

  it("fail wraps an AppError", () => {
    const error = new StorageError("disk full");
    const outcome = fail(error);
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBe(error);
    }
  });

  it("toAppError passes AppErrors through untouched", () => {
    const original = new MetadataError("bad json");
    expect(toAppError(original, (message) => new StorageError(message))).toBe(original);
  });

  it("toAppError wraps foreign errors with the given constructor", () => {
    const cause = new Error("EACCES");
    const wrapped = toAppError(cause, (message, c) => new StorageError(message, { cause: c }));
    expect(wrapped).toBeInstanceOf(StorageError);
    expect(wrapped.message).toBe("EACCES");
    expect(wrapped.cause).toBe(cause);
  });
});
