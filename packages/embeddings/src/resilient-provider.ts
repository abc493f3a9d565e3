import type { EmbeddingResult } from "@studydesk/types";
import {
  ExternalServiceError,
  createCircuitBreaker,
  toAppError,
  withRetry,
  type CircuitBreakerOptions,
  type RetryOptions,
} from "@studydesk/errors";
import type { Logger } from "@studydesk/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

type EmbedMode = "query" | "document";

export interface ResilienceOptions {
  logger: Logger;
  retry?: Omit<RetryOptions, "onRetry">;
  breaker?: Omit<CircuitBreakerOptions, "onStateChange">;
}

// Used when the wrapped provider does not declare its request limit.
const DEFAULT_DOCUMENT_BATCH = 96;

function splitBatches(texts: string[], size: number): string[][] {
  if (texts.length === 0) return [[]];
  const batches: string[][] = [];
  for (let i = 0; i < texts.length; i += size) {
    batches.push(texts.slice(i, i + size));
  }
  return batches;
}

/**
 * Wrap a provider with retries (exponential backoff) inside a circuit
 * breaker. One breaker failure is counted per fully retried request.
 * Failures surface as ExternalServiceError.
 *
 * Document embedding is sent one provider-sized request at a time and is
 * never timed out: a base build blocks until every batch is embedded.
 * Queries keep the breaker timeout.
 */
export function withResilience(
  provider: IEmbeddingProvider,
  options: ResilienceOptions,
): IEmbeddingProvider {
  const { logger } = options;
  const batchSize = Math.max(1, provider.maxBatchSize ?? DEFAULT_DOCUMENT_BATCH);

  const call = (texts: string[], mode: EmbedMode): Promise<EmbeddingResult> =>
    withRetry(
      () => {
        const [first] = texts;
        return mode === "query" && first !== undefined
          ? provider.embed(first)
          : provider.batchEmbed(texts);
      },
      {
        ...options.retry,
        onRetry: (attempt, maxRetries, delayMs, error) => {
          logger.warn(
            { provider: provider.name, mode, attempt, maxRetries, delayMs, err: error },
            "Embedding call failed, retrying",
          );
        },
      },
    );

  const onStateChange = (name: string, state: string): void => {
    logger.warn({ breaker: name, state }, "Embedding circuit state changed");
  };
  const breakers = {
    query: createCircuitBreaker(`embeddings:${provider.name}:query`, call, {
      ...options.breaker,
      onStateChange,
    }),
    document: createCircuitBreaker(`embeddings:${provider.name}:document`, call, {
      ...options.breaker,
      timeout: false,
      onStateChange,
    }),
  };

  const fire = async (texts: string[], mode: EmbedMode): Promise<EmbeddingResult> => {
    try {
      return await breakers[mode].fire(texts, mode);
    } catch (err) {
      throw toAppError(
        err,
        (message, cause) =>
          new ExternalServiceError(`Embedding provider failed: ${message}`, provider.name, {
            operation: `embeddings.${mode}`,
            cause,
          }),
      );
    }
  };

  const embedDocuments = async (texts: string[]): Promise<EmbeddingResult> => {
    const embeddings: number[][] = [];
    let tokensUsed = 0;
    let model = "";

    for (const batch of splitBatches(texts, batchSize)) {
      const result = await fire(batch, "document");
      embeddings.push(...result.embeddings);
      tokensUsed += result.tokensUsed;
      model = result.model;
    }
    return { embeddings, model, tokensUsed, dimensions: provider.dimensions };
  };

  return {
    name: provider.name,
    dimensions: provider.dimensions,
    maxBatchSize: batchSize,
    embed: (text) => fire([text], "query"),
    batchEmbed: embedDocuments,
    healthCheck: () => provider.healthCheck(),
  };
}
