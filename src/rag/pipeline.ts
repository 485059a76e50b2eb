import type { Logger } from "winston";
import { createLogger } from "../logger.js";
import { chunkId, parseChunk } from "./chunk.js";
import { getChunkingStrategy } from "./chunking/index.js";
import { ChunkStore } from "./chunk-store.js";
import type { RagConfig } from "./config.js";
import { createEmbeddingFunction, type EmbeddingFunction } from "./embedding-service.js";
import { getErrorMessage, RagError, RagErrorCode } from "./errors.js";
import { RetrievalService } from "./retriever.js";
import type { Chunk, ExtractedDocument, IndexedChunkMetadata, Match } from "./types.js";
import { VectorIndex } from "./vector-store.js";

const REBUILD_BATCH_SIZE = 100;

function toIndexedMetadata(chunk: Chunk): IndexedChunkMetadata {
  return { docId: chunk.docId, page: chunk.page, paragraph: chunk.paragraph, text: chunk.text };
}

export interface IngestionDeps {
  store: ChunkStore;
  index: VectorIndex;
  embedder: EmbeddingFunction;
  logger?: Logger;
}

/**
 * Writes chunks to both the chunk store and the vector index. A chunk becomes
 * retrievable only once its vector and metadata are committed together in the
 * index; the store is the source for `rebuildIndex`.
 */
export class IngestionPipeline {
  private readonly store: ChunkStore;
  private readonly index: VectorIndex;
  private readonly embedder: EmbeddingFunction;
  private readonly logger: Logger;

  constructor(deps: IngestionDeps) {
    if (deps.embedder.modelId !== deps.index.embeddingModel) {
      throw new RagError(
        RagErrorCode.EMBEDDING_MODEL_MISMATCH,
        `Embedder "${deps.embedder.modelId}" does not match index model "${deps.index.embeddingModel}"`,
      );
    }
    this.store = deps.store;
    this.index = deps.index;
    this.embedder = deps.embedder;
    this.logger = deps.logger ?? createLogger("ingestion");
  }

  /** Returns the number of chunks added. */
  async addDocuments(chunks: readonly Chunk[]): Promise<number> {
    const validated = chunks.map((chunk) => parseChunk(chunk));
    if (validated.length === 0) return 0;

    const vectors = await this.embedAll(validated);
    await this.store.append(validated);

    try {
      await this.upsertChunks(validated, vectors);
    } catch (err) {
      this.logger.error("Chunks stored but not indexed; run rebuild to resync", {
        chunks: validated.length,
        error: getErrorMessage(err),
      });
      throw err;
    }

    this.logger.info("Ingested chunks", {
      chunks: validated.length,
      documents: new Set(validated.map((c) => c.docId)).size,
    });
    return validated.length;
  }

  async ingestDocument(document: ExtractedDocument, strategyName: string): Promise<number> {
    const strategy = getChunkingStrategy(strategyName);
    const chunks = strategy.chunk(document);
    if (chunks.length === 0) {
      this.logger.warn("Document produced no chunks, skipping", { docId: document.docId });
      return 0;
    }
    this.logger.debug("Chunked document", {
      docId: document.docId,
      pages: document.pages.length,
      chunks: chunks.length,
      strategy: strategy.name,
    });
    return this.addDocuments(chunks);
  }

  /**
   * Re-embeds the latest version of every stored chunk and then replaces the
   * index contents in one commit. Until that commit the old entries stay
   * searchable, and a failure leaves them in place.
   */
  async rebuildIndex(onProgress?: (done: number, total: number) => void): Promise<number> {
    const chunks = await this.store.latest();

    const vectors: number[][] = [];
    for (let i = 0; i < chunks.length; i += REBUILD_BATCH_SIZE) {
      const batch = chunks.slice(i, i + REBUILD_BATCH_SIZE);
      vectors.push(...(await this.embedAll(batch)));
      onProgress?.(i + batch.length, chunks.length);
    }
    await this.index.replaceAll(chunks.map(chunkId), vectors, chunks.map(toIndexedMetadata));

    this.logger.info("Rebuilt vector index", { chunks: chunks.length });
    return chunks.length;
  }

  private async embedAll(chunks: readonly Chunk[]): Promise<number[][]> {
    const vectors = await this.embedder.embed(chunks.map((c) => c.text));
    if (vectors.length !== chunks.length) {
      throw new RagError(
        RagErrorCode.EMBEDDING_FAILURE,
        `Embedding count mismatch: texts=${chunks.length} embeddings=${vectors.length}`,
      );
    }
    return vectors;
  }

  private async upsertChunks(chunks: readonly Chunk[], vectors: readonly number[][]): Promise<void> {
    await this.index.upsert(chunks.map(chunkId), vectors, chunks.map(toIndexedMetadata));
  }
}

export interface RagStats {
  storedChunks: number;
  indexedChunks: number;
  embeddingModel: string;
  dimension: number | null;
}

export interface RagPipeline {
  addDocuments(chunks: readonly Chunk[]): Promise<number>;
  ingestDocument(document: ExtractedDocument): Promise<number>;
  /** `k` defaults to `config.topK` and is capped at `config.maxTopK`. */
  query(queryText: string, k?: number): Promise<Match[]>;
  documents(): Promise<Map<string, Chunk[]>>;
  rebuild(onProgress?: (done: number, total: number) => void): Promise<number>;
  stats(): Promise<RagStats>;
}

export interface RagPipelineOptions {
  embedder?: EmbeddingFunction;
  logger?: Logger;
  /** Discard an index built with another embedding model; follow with `rebuild`. */
  resetOnModelChange?: boolean;
  /** Discard an index vectra cannot read; follow with `rebuild`. */
  recreateIfUnreadable?: boolean;
}

/**
 * Opens the chunk store and vector index under `config.storageDir` and wires
 * them to one embedding function.
 */
export async function initRagPipeline(
  config: RagConfig,
  options: RagPipelineOptions = {},
): Promise<RagPipeline> {
  const logger = options.logger ?? createLogger("rag");
  const embedder = options.embedder ?? createEmbeddingFunction(config, logger);

  const store = await ChunkStore.open(config.chunkStorePath, logger);
  const index = await VectorIndex.open(
    {
      storagePath: config.indexDir,
      distanceMetric: config.distanceMetric,
      embeddingDimension: config.embeddingProvider === "openrouter" ? config.embeddingDimensions : undefined,
      embeddingModel: embedder.modelId,
    },
    logger,
    { resetOnModelChange: options.resetOnModelChange, recreateIfUnreadable: options.recreateIfUnreadable },
  );

  const ingestion = new IngestionPipeline({ store, index, embedder, logger });
  const retrieval = new RetrievalService(embedder, index, logger);

  logger.info("RAG ready", {
    storageDir: config.storageDir,
    embeddingModel: embedder.modelId,
    indexedChunks: await index.size(),
  });

  return {
    addDocuments: (chunks) => ingestion.addDocuments(chunks),
    ingestDocument: (document) => ingestion.ingestDocument(document, config.chunkingStrategy),
    query: (queryText, k = config.topK) => retrieval.queryTopK(queryText, Math.min(k, config.maxTopK)),
    documents: () => store.byDocument(),
    rebuild: (onProgress) => ingestion.rebuildIndex(onProgress),
    async stats() {
      const [stored, indexed] = await Promise.all([store.all(), index.size()]);
      return {
        storedChunks: stored.length,
        indexedChunks: indexed,
        embeddingModel: index.embeddingModel,
        dimension: index.dimension,
      };
    },
  };
}
