import type { Logger } from "winston";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { chunkId, formatIssues, fromRecord, parseChunk, storedChunkRecordSchema, toRecord } from "./chunk.js";
import { RagError, RagErrorCode } from "./errors.js";
import { readFileIfExists, writeFileAtomic } from "./fs-utils.js";
import { SerialQueue } from "./serial-queue.js";
import type { Chunk } from "./types.js";

const storeFileSchema = z.array(storedChunkRecordSchema);

/**
 * Append-only JSON record of every ingested chunk, independent of the vector
 * index. The file is re-read on every access so that appends from another
 * process are not overwritten.
 */
export class ChunkStore {
  private readonly writes = new SerialQueue();

  private constructor(
    readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  /** Loads the store, creating an empty one when the file is absent. */
  static async open(filePath: string, logger: Logger = createLogger("chunk-store")): Promise<ChunkStore> {
    const store = new ChunkStore(filePath, logger);
    const existing = await store.read();
    if (existing === null) {
      await store.write([]);
      logger.info("Created empty chunk store", { filePath });
    } else {
      logger.debug("Loaded chunk store", { filePath, chunks: existing.length });
    }
    return store;
  }

  async append(chunks: readonly Chunk[]): Promise<void> {
    const validated = chunks.map((chunk) => parseChunk(chunk));
    if (validated.length === 0) return;

    await this.writes.run(async () => {
      const current = (await this.read()) ?? [];
      await this.write([...current, ...validated]);
      this.logger.debug("Appended chunks", { added: validated.length, total: current.length + validated.length });
    });
  }

  async all(): Promise<Chunk[]> {
    return (await this.read()) ?? [];
  }

  /** One chunk per chunk id; a later record replaces an earlier one in place. */
  async latest(): Promise<Chunk[]> {
    const byId = new Map<string, Chunk>();
    for (const chunk of await this.all()) {
      byId.set(chunkId(chunk), chunk);
    }
    return [...byId.values()];
  }

  /** Latest chunks grouped by document, documents in the order they were first ingested. */
  async byDocument(): Promise<Map<string, Chunk[]>> {
    const groups = new Map<string, Chunk[]>();
    for (const chunk of await this.latest()) {
      const group = groups.get(chunk.docId);
      if (group) {
        group.push(chunk);
      } else {
        groups.set(chunk.docId, [chunk]);
      }
    }
    return groups;
  }

  private async read(): Promise<Chunk[] | null> {
    let raw: string | null;
    try {
      raw = await readFileIfExists(this.filePath);
    } catch (err) {
      throw new RagError(RagErrorCode.IO_FAILURE, `Cannot read chunk store ${this.filePath}`, err);
    }
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new RagError(RagErrorCode.IO_FAILURE, `Chunk store ${this.filePath} is not valid JSON`, err);
    }

    const parsed = storeFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new RagError(
        RagErrorCode.IO_FAILURE,
        `Chunk store ${this.filePath} is corrupted: ${formatIssues(parsed.error)}`,
      );
    }
    return parsed.data.map(fromRecord);
  }

  private async write(chunks: readonly Chunk[]): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, JSON.stringify(chunks.map(toRecord), null, 2));
    } catch (err) {
      throw new RagError(RagErrorCode.IO_FAILURE, `Cannot write chunk store ${this.filePath}`, err);
    }
  }
}
