export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ValidationError,
  DuplicateError,
  StorageError,
  IndexingError,
  MetadataError,
  ExternalServiceError,
} from "./errors.js";
export type { ErrorContext } from "./errors.js";

export { succeed, fail, toAppError } from "./outcome.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
