import { z } from "zod";
import type { AppConfig } from "@studydesk/types";
import { ValidationError } from "@studydesk/errors";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Document storage ----------
    UPLOAD_DIR: z.string().min(1).default("UserUploads"),
    METADATA_FILE: z.string().min(1).default("document_metadata.json"),
    MAX_UPLOAD_MB: positiveInt("50"),
    BASE_DOCS_DIR: z.string().min(1).default("CourseMaterials"),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["local", "qdrant"]).default("local"),
    VECTOR_STORE_DIR: z.string().min(1).default("vector_db"),
    BASE_COLLECTION: z.string().min(1).default("base"),
    USER_COLLECTION: z.string().min(1).default("user"),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),

    // ---------- Providers ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    GENERATOR_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),

    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBED_MODEL: z.string().default("text-embedding-3-small"),
    OPENAI_CHAT_MODEL: z.string().default("gpt-3.5-turbo"),

    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    COHERE_CHAT_MODEL: z.string().default("command-r-08-2024"),

    // ---------- Chunking & retrieval ----------
    CHUNK_STRATEGY: z.enum(["recursive", "fixed"]).default("recursive"),
    CHUNK_SIZE: positiveInt("1000"),
    CHUNK_OVERLAP: z.string().default("200").transform(Number).pipe(z.number().int().nonnegative()),
    RETRIEVAL_TOP_K: positiveInt("3"),
  })
  .refine((env) => env.CHUNK_OVERLAP < env.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  })
  .refine((env) => env.VECTOR_STORE !== "qdrant" || env.QDRANT_URL !== undefined, {
    message: "QDRANT_URL is required when VECTOR_STORE is qdrant",
    path: ["QDRANT_URL"],
  })
  .refine(
    (env) =>
      (env.EMBEDDING_PROVIDER !== "openai" && env.GENERATOR_PROVIDER !== "openai") ||
      Boolean(env.OPENAI_API_KEY),
    { message: "OPENAI_API_KEY is required for the openai provider", path: ["OPENAI_API_KEY"] },
  )
  .refine(
    (env) =>
      (env.EMBEDDING_PROVIDER !== "cohere" && env.GENERATOR_PROVIDER !== "cohere") ||
      Boolean(env.COHERE_API_KEY),
    { message: "COHERE_API_KEY is required for the cohere provider", path: ["COHERE_API_KEY"] },
  );

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    storage: {
      uploadDir: parsed.UPLOAD_DIR,
      metadataFile: parsed.METADATA_FILE,
      maxUploadBytes: parsed.MAX_UPLOAD_MB * 1024 * 1024,
      baseDocsDir: parsed.BASE_DOCS_DIR,
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      rootDir: parsed.VECTOR_STORE_DIR,
      baseCollection: parsed.BASE_COLLECTION,
      userCollection: parsed.USER_COLLECTION,
      qdrantUrl: parsed.QDRANT_URL,
      qdrantApiKey: parsed.QDRANT_API_KEY,
    },

    embeddings: { provider: parsed.EMBEDDING_PROVIDER },
    generator: { provider: parsed.GENERATOR_PROVIDER },

    openai: {
      apiKey: parsed.OPENAI_API_KEY ?? "",
      embedModel: parsed.OPENAI_EMBED_MODEL,
      chatModel: parsed.OPENAI_CHAT_MODEL,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      chatModel: parsed.COHERE_CHAT_MODEL,
    },

    chunking: {
      strategy: parsed.CHUNK_STRATEGY,
      chunkSize: parsed.CHUNK_SIZE,
      chunkOverlap: parsed.CHUNK_OVERLAP,
    },

    retrieval: {
      topK: parsed.RETRIEVAL_TOP_K,
    },
  };
}

/**
 * {@link parseEnv} with validation failures reported as a ValidationError,
 * one field per offending variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  try {
    return parseEnv(env);
  } catch (err) {
    if (!(err instanceof z.ZodError)) throw err;

    const fields: Record<string, string> = {};
    for (const issue of err.issues) {
      const key = issue.path.join(".") || "env";
      fields[key] ??= issue.message;
    }
    const summary = Object.entries(fields)
      .map(([key, message]) => `${key}: ${message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration (${summary})`, fields, {
      operation: "config.load",
      cause: err,
    });
  }
}
