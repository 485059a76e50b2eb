import path from "node:path";
import { z } from "zod";
import { RagError, RagErrorCode } from "./errors.js";

export const RAG_CONFIG = {
  storageDir: path.resolve(".rag-cache"),
  indexDirName: "vectra-index",
  chunkStoreFileName: "chunks.json",

  distanceMetric: "cosine",

  embeddingProvider: "hashing",
  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingDimensions: 4096,
  embeddingBatchSize: 20,
  embeddingConcurrency: 5,
  hashingDimensions: 256,

  topK: 3,
  maxTopK: 20,

  maxChunkLength: 500,
  chunkOverlap: 100,
  pageLength: 1800,

  defaultChunkingStrategy: "window-chunker",

  logLevel: "info",
} as const;

export type EmbeddingProviderName = "hashing" | "openrouter";
export type DistanceMetric = "cosine";

export interface RagConfig {
  storageDir: string;
  indexDir: string;
  chunkStorePath: string;
  distanceMetric: DistanceMetric;
  embeddingProvider: EmbeddingProviderName;
  embeddingModel: string;
  /** Fixed up front for remote models; hashing derives it from `hashingDimensions`. */
  embeddingDimensions: number;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  hashingDimensions: number;
  topK: number;
  /** Upper bound applied to every requested `k`. */
  maxTopK: number;
  chunkingStrategy: string;
  openRouterApiKey: string | undefined;
  logLevel: string;
}

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  RAG_STORAGE_DIR: z.string().min(1).optional(),
  RAG_EMBEDDING_PROVIDER: z.enum(["hashing", "openrouter"]).optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).optional(),
  RAG_EMBEDDING_DIMENSIONS: positiveInt.optional(),
  RAG_HASHING_DIMENSIONS: positiveInt.optional(),
  RAG_TOP_K: positiveInt.optional(),
  RAG_MAX_TOP_K: positiveInt.optional(),
  RAG_CHUNKING_STRATEGY: z.string().min(1).optional(),
  OPENROUTER_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).optional(),
});

/**
 * Resolves the runtime configuration from `RAG_CONFIG` defaults and the environment.
 * Empty variables count as unset.
 */
export function loadRagConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new RagError(RagErrorCode.CONFIGURATION_INVALID, `Invalid configuration: ${detail}`);
  }
  const vars = parsed.data;

  const storageDir = vars.RAG_STORAGE_DIR
    ? path.resolve(vars.RAG_STORAGE_DIR)
    : RAG_CONFIG.storageDir;
  const embeddingProvider = vars.RAG_EMBEDDING_PROVIDER ?? RAG_CONFIG.embeddingProvider;

  if (embeddingProvider === "openrouter" && !vars.OPENROUTER_API_KEY) {
    throw new RagError(
      RagErrorCode.CONFIGURATION_INVALID,
      "OPENROUTER_API_KEY is required when RAG_EMBEDDING_PROVIDER=openrouter",
    );
  }

  return {
    storageDir,
    indexDir: path.join(storageDir, RAG_CONFIG.indexDirName),
    chunkStorePath: path.join(storageDir, RAG_CONFIG.chunkStoreFileName),
    distanceMetric: RAG_CONFIG.distanceMetric,
    embeddingProvider,
    embeddingModel: vars.RAG_EMBEDDING_MODEL ?? RAG_CONFIG.embeddingModel,
    embeddingDimensions: vars.RAG_EMBEDDING_DIMENSIONS ?? RAG_CONFIG.embeddingDimensions,
    embeddingBatchSize: RAG_CONFIG.embeddingBatchSize,
    embeddingConcurrency: RAG_CONFIG.embeddingConcurrency,
    hashingDimensions: vars.RAG_HASHING_DIMENSIONS ?? RAG_CONFIG.hashingDimensions,
    topK: vars.RAG_TOP_K ?? RAG_CONFIG.topK,
    maxTopK: vars.RAG_MAX_TOP_K ?? RAG_CONFIG.maxTopK,
    chunkingStrategy: vars.RAG_CHUNKING_STRATEGY ?? RAG_CONFIG.defaultChunkingStrategy,
    openRouterApiKey: vars.OPENROUTER_API_KEY,
    logLevel: vars.LOG_LEVEL ?? RAG_CONFIG.logLevel,
  };
}
