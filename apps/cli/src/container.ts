import type { AppConfig } from "@studydesk/types";
import {
  BatchUploadCoordinator,
  DocumentStore,
  DualVectorIndex,
  HybridRetriever,
} from "@studydesk/core";
import { createEmbeddingProvider, withResilience, type IEmbeddingProvider } from "@studydesk/embeddings";
import { createAnswerGenerator, type IAnswerGenerator } from "@studydesk/generator";
import { createChildLogger, type Logger } from "@studydesk/logger";
import { PdfParser, type IParser } from "@studydesk/parser";
import { createVectorStore, type IVectorStore } from "@studydesk/vector-store";

export interface Container {
  config: AppConfig;
  logger: Logger;
  store: DocumentStore;
  index: DualVectorIndex;
  retriever: HybridRetriever;
  coordinator: BatchUploadCoordinator;
  generator: IAnswerGenerator;
}

/** Replaceable collaborators; tests swap in fakes. */
export interface ContainerOverrides {
  vectorStore?: IVectorStore;
  embeddings?: IEmbeddingProvider;
  parser?: IParser;
  generator?: IAnswerGenerator;
}

function buildEmbeddings(config: AppConfig, logger: Logger): IEmbeddingProvider {
  const provider = createEmbeddingProvider({
    provider: config.embeddings.provider,
    openai: { apiKey: config.openai.apiKey, model: config.openai.embedModel },
    cohere: { apiKey: config.cohere.apiKey, model: config.cohere.embedModel },
  });
  return withResilience(provider, { logger: createChildLogger(logger, { component: "embeddings" }) });
}

export function createContainer(
  config: AppConfig,
  logger: Logger,
  overrides: ContainerOverrides = {},
): Container {
  const vectorStore =
    overrides.vectorStore ??
    createVectorStore({
      type: config.vectorStore.type,
      rootDir: config.vectorStore.rootDir,
      qdrantUrl: config.vectorStore.qdrantUrl,
      qdrantApiKey: config.vectorStore.qdrantApiKey,
    });
  const embeddings = overrides.embeddings ?? buildEmbeddings(config, logger);
  const generator =
    overrides.generator ??
    createAnswerGenerator({
      provider: config.generator.provider,
      openai: { apiKey: config.openai.apiKey, model: config.openai.chatModel },
      cohere: { apiKey: config.cohere.apiKey, model: config.cohere.chatModel },
    });

  const store = new DocumentStore({
    uploadDir: config.storage.uploadDir,
    metadataFile: config.storage.metadataFile,
    maxUploadBytes: config.storage.maxUploadBytes,
    logger: createChildLogger(logger, { component: "document-store" }),
  });

  const index = new DualVectorIndex({
    vectorStore,
    embeddings,
    parser: overrides.parser ?? new PdfParser(),
    logger: createChildLogger(logger, { component: "dual-index" }),
    baseDocsDir: config.storage.baseDocsDir,
    baseCollection: config.vectorStore.baseCollection,
    userCollection: config.vectorStore.userCollection,
    chunkSize: config.chunking.chunkSize,
    chunkOverlap: config.chunking.chunkOverlap,
    strategy: config.chunking.strategy,
  });

  const retriever = new HybridRetriever({
    vectorStore,
    embeddings,
    logger: createChildLogger(logger, { component: "retriever" }),
    baseCollection: index.baseCollection,
    userCollection: index.userCollection,
  });

  const coordinator = new BatchUploadCoordinator({
    store,
    index,
    logger: createChildLogger(logger, { component: "batch-upload" }),
  });

  return { config, logger, store, index, retriever, coordinator, generator };
}
