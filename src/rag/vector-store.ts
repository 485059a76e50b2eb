import path from "node:path";
import { LocalIndex } from "vectra";
import type { Logger } from "winston";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { formatIssues } from "./chunk.js";
import type { DistanceMetric } from "./config.js";
import { getErrorMessage, RagError, RagErrorCode } from "./errors.js";
import { readFileIfExists, writeFileAtomic } from "./fs-utils.js";
import { SerialQueue } from "./serial-queue.js";
import type { IndexManifest, IndexedChunkMetadata, SearchHit } from "./types.js";

const MANIFEST_FILE = "manifest.json";

const manifestSchema = z.object({
  embeddingModel: z.string().min(1),
  distanceMetric: z.literal("cosine"),
  embeddingDimension: z.number().int().positive().nullable(),
});

export interface VectorIndexConfig {
  storagePath: string;
  distanceMetric: DistanceMetric;
  /** Left unset, the first upsert establishes it. */
  embeddingDimension?: number;
  embeddingModel: string;
}

export interface VectorIndexOpenOptions {
  /** Start an empty index instead of failing when the stored model differs. */
  resetOnModelChange?: boolean;
  /** Start an empty index instead of failing when vectra's `index.json` cannot be read. */
  recreateIfUnreadable?: boolean;
}

interface StagedItem {
  id: string;
  vector: number[];
  // A type literal, so it fits vectra's metadata record.
  metadata: { docId: string; page: number; paragraph: number; text: string };
}

/**
 * Cosine distance to score: `score = 1 - distance`, i.e. the cosine similarity.
 * 1 means same direction; downstream consumers treat higher as better.
 */
export function scoreFromDistance(distance: number): number {
  return 1 - distance;
}

function norm(vector: readonly number[]): number {
  let sum = 0;
  for (const v of vector) sum += v * v;
  return Math.sqrt(sum);
}

function checkLengths(ids: readonly string[], vectors: readonly unknown[], metadatas: readonly unknown[]): void {
  if (ids.length !== vectors.length || ids.length !== metadatas.length) {
    throw new RagError(
      RagErrorCode.INVALID_ARGUMENT,
      `upsert needs equal lengths: ids=${ids.length} vectors=${vectors.length} metadatas=${metadatas.length}`,
    );
  }
}

function toItems(
  ids: readonly string[],
  vectors: readonly (readonly number[])[],
  metadatas: readonly IndexedChunkMetadata[],
  dimension: number,
): StagedItem[] {
  return ids.map((id, i) => {
    const vector = vectors[i] ?? [];
    const metadata = metadatas[i];
    if (!id || !metadata) {
      throw new RagError(RagErrorCode.INVALID_ARGUMENT, `Entry ${i} has no id or metadata`);
    }
    if (vector.length !== dimension) {
      throw new RagError(
        RagErrorCode.DIMENSION_MISMATCH,
        `Vector for "${id}" has ${vector.length} dimensions, index expects ${dimension}`,
      );
    }
    if (norm(vector) === 0) {
      throw new RagError(RagErrorCode.INVALID_ARGUMENT, `Vector for "${id}" has zero length`);
    }
    return {
      id,
      vector: [...vector],
      metadata: {
        docId: metadata.docId,
        page: metadata.page,
        paragraph: metadata.paragraph,
        text: metadata.text,
      },
    };
  });
}

/**
 * Must run inside an update. vectra overwrites an existing id in place but keeps
 * the norm of the old vector, so the old entry is removed first.
 */
async function writeItems(index: LocalIndex, items: readonly StagedItem[]): Promise<void> {
  for (const item of items) {
    await index.deleteItem(item.id);
    await index.upsertItem(item);
  }
}

async function recreateIndex(storagePath: string): Promise<void> {
  try {
    await new LocalIndex(storagePath).createIndex({ version: 1, deleteIfExists: true });
  } catch (err) {
    throw new RagError(RagErrorCode.IO_FAILURE, `Cannot reset vector index at ${storagePath}`, err);
  }
}

/**
 * Persistent nearest-neighbor index over embedded chunks, backed by a vectra
 * `LocalIndex` folder. A `manifest.json` beside vectra's `index.json` pins the
 * embedding model and dimensionality for the index's lifetime.
 *
 * Readers always go through a fully loaded handle. Writes are staged on a
 * second handle and swapped in once vectra has written `index.json`, so a
 * batch is visible whole or not at all.
 */
export class VectorIndex {
  private index: LocalIndex;
  private readonly writes = new SerialQueue();

  private constructor(
    private readonly config: VectorIndexConfig,
    private manifest: IndexManifest,
    private readonly logger: Logger,
  ) {
    this.index = new LocalIndex(config.storagePath);
  }

  static async open(
    config: VectorIndexConfig,
    logger: Logger = createLogger("vector-index"),
    options: VectorIndexOpenOptions = {},
  ): Promise<VectorIndex> {
    let stored = await readManifest(config.storagePath);

    if (stored && stored.embeddingModel !== config.embeddingModel && options.resetOnModelChange) {
      logger.warn("Embedding model changed, discarding vector index", {
        from: stored.embeddingModel,
        to: config.embeddingModel,
      });
      await recreateIndex(config.storagePath);
      stored = null;
    }

    if (stored && stored.embeddingModel !== config.embeddingModel) {
      throw new RagError(
        RagErrorCode.EMBEDDING_MODEL_MISMATCH,
        `Index at ${config.storagePath} was built with "${stored.embeddingModel}", not "${config.embeddingModel}"; rebuild it to switch models`,
      );
    }
    if (
      stored?.embeddingDimension != null &&
      config.embeddingDimension !== undefined &&
      stored.embeddingDimension !== config.embeddingDimension
    ) {
      throw new RagError(
        RagErrorCode.DIMENSION_MISMATCH,
        `Index dimension is ${stored.embeddingDimension}, configured ${config.embeddingDimension}`,
      );
    }

    const manifest: IndexManifest = {
      embeddingModel: config.embeddingModel,
      distanceMetric: config.distanceMetric,
      embeddingDimension: stored?.embeddingDimension ?? config.embeddingDimension ?? null,
    };

    const vectorIndex = new VectorIndex(config, manifest, logger);
    let firstDimension: number | null;
    try {
      firstDimension = await vectorIndex.load();
    } catch (err) {
      if (!options.recreateIfUnreadable) throw err;
      logger.warn("Vector index is unreadable, recreating it empty", {
        storagePath: config.storagePath,
        error: getErrorMessage(err),
      });
      await recreateIndex(config.storagePath);
      manifest.embeddingDimension = config.embeddingDimension ?? null;
      firstDimension = await vectorIndex.load();
    }
    if (manifest.embeddingDimension === null) {
      manifest.embeddingDimension = firstDimension;
    }

    await writeManifest(config.storagePath, manifest);
    return vectorIndex;
  }

  get embeddingModel(): string {
    return this.manifest.embeddingModel;
  }

  get dimension(): number | null {
    return this.manifest.embeddingDimension;
  }

  async size(): Promise<number> {
    const items = await this.index.listItems();
    return items.length;
  }

  /**
   * Inserts or replaces entries by id. Every entry is validated before anything
   * is written, and the batch is committed with a single index write.
   */
  async upsert(
    ids: readonly string[],
    vectors: readonly (readonly number[])[],
    metadatas: readonly IndexedChunkMetadata[],
  ): Promise<void> {
    checkLengths(ids, vectors, metadatas);
    if (ids.length === 0) return;

    await this.writes.run(async () => {
      const dimension = this.manifest.embeddingDimension ?? vectors[0]?.length ?? 0;
      const items = toItems(ids, vectors, metadatas, dimension);

      await this.commit((staging) => writeItems(staging, items));

      if (this.manifest.embeddingDimension === null) {
        this.manifest = { ...this.manifest, embeddingDimension: dimension };
        await writeManifest(this.config.storagePath, this.manifest);
      }
      this.logger.debug("Upserted vectors", { count: items.length });
    });
  }

  /**
   * Replaces every entry with the given batch in one commit. The dimension is
   * taken from the configuration or the new vectors, not from the old entries.
   */
  async replaceAll(
    ids: readonly string[],
    vectors: readonly (readonly number[])[],
    metadatas: readonly IndexedChunkMetadata[],
  ): Promise<void> {
    checkLengths(ids, vectors, metadatas);

    await this.writes.run(async () => {
      const dimension = this.config.embeddingDimension ?? vectors[0]?.length ?? null;
      const items = dimension === null ? [] : toItems(ids, vectors, metadatas, dimension);

      await this.commit(async (staging) => {
        const existing = (await staging.listItems()).map((item) => item.id);
        for (const id of existing) {
          await staging.deleteItem(id);
        }
        await writeItems(staging, items);
      });

      this.manifest = { ...this.manifest, embeddingDimension: dimension };
      await writeManifest(this.config.storagePath, this.manifest);
      this.logger.info("Replaced vector index contents", { count: items.length });
    });
  }

  /**
   * Up to `k` nearest entries, nearest first. Ties keep the order vectra
   * returns them in.
   */
  async search(queryVector: readonly number[], k: number): Promise<SearchHit[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new RagError(RagErrorCode.INVALID_ARGUMENT, `k must be an integer >= 1, got ${k}`);
    }
    const dimension = this.manifest.embeddingDimension;
    if (dimension === null) return [];
    if (queryVector.length !== dimension) {
      throw new RagError(
        RagErrorCode.DIMENSION_MISMATCH,
        `Query vector has ${queryVector.length} dimensions, index expects ${dimension}`,
      );
    }
    if (norm(queryVector) === 0) return [];

    const results = await this.index.queryItems([...queryVector], k);
    return results.map((r) => ({
      id: r.item.id,
      metadata: r.item.metadata,
      distance: 1 - r.score,
    }));
  }

  /** Drops every entry. Model and dimension stay as configured. */
  async reset(): Promise<void> {
    await this.replaceAll([], [], []);
  }

  /** Creates the index if needed and loads it; returns the dimension of the first entry. */
  private async load(): Promise<number | null> {
    try {
      if (!(await this.index.isIndexCreated())) {
        await this.index.createIndex({ version: 1 });
        this.logger.info("Created vector index", { storagePath: this.config.storagePath });
      }
      const [first] = await this.index.listItems();
      return first ? first.vector.length : null;
    } catch (err) {
      throw new RagError(RagErrorCode.IO_FAILURE, `Cannot open vector index at ${this.config.storagePath}`, err);
    }
  }

  /**
   * vectra's `beginUpdate` copies its data shallowly, so updates on the read
   * handle would show up in searches before `endUpdate`. `apply` gets a fresh
   * handle instead, which replaces the read handle after a successful write.
   * vectra writes `index.json` in place; `rebuild` recovers a torn write.
   */
  private async commit(apply: (staging: LocalIndex) => Promise<void>): Promise<void> {
    const staging = new LocalIndex(this.config.storagePath);
    try {
      await staging.beginUpdate();
      await apply(staging);
      await staging.endUpdate();
    } catch (err) {
      staging.cancelUpdate();
      if (err instanceof RagError) throw err;
      throw new RagError(RagErrorCode.IO_FAILURE, "Vector index commit failed", err);
    }
    this.index = staging;
  }
}

async function readManifest(storagePath: string): Promise<IndexManifest | null> {
  const filePath = path.join(storagePath, MANIFEST_FILE);
  let raw: string | null;
  try {
    raw = await readFileIfExists(filePath);
  } catch (err) {
    throw new RagError(RagErrorCode.IO_FAILURE, `Cannot read index manifest ${filePath}`, err);
  }
  if (raw === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new RagError(RagErrorCode.IO_FAILURE, `Index manifest ${filePath} is not valid JSON`, err);
  }
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new RagError(RagErrorCode.IO_FAILURE, `Index manifest ${filePath} is corrupted: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

async function writeManifest(storagePath: string, manifest: IndexManifest): Promise<void> {
  const filePath = path.join(storagePath, MANIFEST_FILE);
  try {
    await writeFileAtomic(filePath, JSON.stringify(manifest, null, 2));
  } catch (err) {
    throw new RagError(RagErrorCode.IO_FAILURE, `Cannot write index manifest ${filePath}`, err);
  }
}
