import "dotenv/config";
import path from "node:path";
import { z } from "zod";

import { ConfigError } from "../errors";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../services/chunker";

const integer = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    STORE_DIR: z.string().min(1).default("./data/store"),
    OLLAMA_HOST: z.string().url().default("http://127.0.0.1:11434"),
    OLLAMA_MODEL: z.string().min(1).default("llama3.1:8b"),
    EMBEDDING_MODEL: z.string().min(1).default("bge-m3"),
    CHUNK_SIZE: integer(DEFAULT_CHUNK_SIZE, 1),
    CHUNK_OVERLAP: integer(DEFAULT_CHUNK_OVERLAP, 0),
    TOP_K: integer(5, 1),
    MIN_SCORE: z.coerce.number().min(-1).max(1).default(0),
    EMBED_BATCH_SIZE: integer(16, 1),
    INGEST_CONCURRENCY: integer(2, 1),
    PROVIDER_TIMEOUT_MS: integer(120_000, 1),
    LOG_LEVEL: z
      .enum(["debug", "info", "warn", "error", "silent"])
      .default("info"),
  })
  .refine((value) => value.CHUNK_OVERLAP < value.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export type Env = {
  port: number;
  storeDir: string;
  ollamaHost: string;
  ollamaModel: string;
  embeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  minScore: number;
  embedBatchSize: number;
  ingestConcurrency: number;
  providerTimeoutMs: number;
  logLevel: "debug" | "info" | "warn" | "error" | "silent";
};

export const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );

// Empty strings count as unset so a blank line in .env keeps the default.
const withoutBlanks = (source: NodeJS.ProcessEnv) =>
  Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
  const parsed = envSchema.safeParse(withoutBlanks(source));
  if (!parsed.success) {
    throw new ConfigError("Invalid environment", formatIssues(parsed.error));
  }

  const value = parsed.data;
  return {
    port: value.PORT,
    storeDir: path.resolve(value.STORE_DIR),
    ollamaHost: value.OLLAMA_HOST,
    ollamaModel: value.OLLAMA_MODEL,
    embeddingModel: value.EMBEDDING_MODEL,
    chunkSize: value.CHUNK_SIZE,
    chunkOverlap: value.CHUNK_OVERLAP,
    topK: value.TOP_K,
    minScore: value.MIN_SCORE,
    embedBatchSize: value.EMBED_BATCH_SIZE,
    ingestConcurrency: value.INGEST_CONCURRENCY,
    providerTimeoutMs: value.PROVIDER_TIMEOUT_MS,
    logLevel: value.LOG_LEVEL,
  };
};
