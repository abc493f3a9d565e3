import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Retries after the first attempt. Default: 3 */
  maxRetries?: number;
  /** Default: 1000 */
  baseDelayMs?: number;
  /** Default: 10000 */
  maxDelayMs?: number;
  /** Only these codes are retried (AppError `code` or a Node/SDK error `code`). */
  retryableErrors?: string[];
  /** Called before each backoff sleep. Defaults to a console warning. */
  onRetry?: (attempt: number, maxRetries: number, delayMs: number, error: unknown) => void;
}

const DEFAULTS = { maxRetries: 3, baseDelayMs: 1_000, maxDelayMs: 10_000 };

// Timeouts and rate limits are worth another attempt; other 4xx are not.
const RETRYABLE_CLIENT_STATUSES = new Set([408, 429]);

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null || !(key in error)) return undefined;
  return Reflect.get(error, key);
}

function readCode(error: unknown): string | undefined {
  if (AppError.isAppError(error)) return error.code;
  const code = readProperty(error, "code");
  return typeof code === "string" ? code : undefined;
}

/** HTTP status of an AppError or of an SDK error (`status` for openai, `statusCode` for cohere-ai). */
function readStatus(error: unknown): number | undefined {
  if (AppError.isAppError(error)) return error.statusCode;
  for (const key of ["status", "statusCode"]) {
    const value = readProperty(error, key);
    if (typeof value === "number") return value;
  }
  return undefined;
}

function isRetryable(error: unknown, retryableErrors: string[] | undefined): boolean {
  const status = readStatus(error);
  if (status !== undefined && status >= 400 && status < 500 && !RETRYABLE_CLIENT_STATUSES.has(status)) {
    return false;
  }

  if (retryableErrors && retryableErrors.length > 0) {
    const code = readCode(error);
    return code !== undefined && retryableErrors.includes(code);
  }

  // An AppError without a 5xx status is a decision, not a transient fault.
  return !AppError.isAppError(error) || error.statusCode >= 500;
}

/** min(maxDelay, baseDelay * 2^attempt) scaled by a random factor in [0.5, 1). */
function backoff(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(maxDelayMs, baseDelayMs * 2 ** attempt);
  return Math.floor(capped * (0.5 + Math.random() * 0.5));
}

function warnRetry(attempt: number, maxRetries: number, delayMs: number): void {
  console.warn(
    `[retry] attempt ${String(attempt)}/${String(maxRetries)} failed, next in ${String(delayMs)}ms`,
  );
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;
  const onRetry = options.onRetry ?? warnRetry;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= maxRetries || !isRetryable(error, options.retryableErrors)) {
        throw error;
      }
      const delay = backoff(attempt, baseDelayMs, maxDelayMs);
      onRetry(attempt + 1, maxRetries, delay, error);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}
