import type { Logger } from "winston";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { formatIssues } from "./chunk.js";
import type { RagConfig } from "./config.js";
import { RagError, RagErrorCode } from "./errors.js";
import { HashingEmbeddingFunction } from "./hashing-embedder.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

/**
 * Maps texts to dense vectors, one per input and in input order. Indexing and
 * querying must share one `modelId` for scores to be comparable.
 */
export interface EmbeddingFunction {
  readonly modelId: string;
  embed(texts: readonly string[]): Promise<number[][]>;
}

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export interface OpenRouterEmbeddingOptions {
  apiKey: string;
  model: string;
  batchSize: number;
  concurrency: number;
  endpoint?: string;
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
}

export class OpenRouterEmbeddingFunction implements EmbeddingFunction {
  readonly modelId: string;
  private readonly endpoint: string;
  private readonly logger: Logger;

  constructor(private readonly options: OpenRouterEmbeddingOptions) {
    this.modelId = options.model;
    this.endpoint = options.endpoint ?? OPENROUTER_EMBEDDINGS_URL;
    this.logger = options.logger ?? createLogger("embeddings");
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const { batchSize, concurrency } = this.options;

    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += batchSize) {
      batches.push({ texts: texts.slice(i, i + batchSize), startIdx: i });
    }

    const results: number[][] = new Array<number[]>(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from({ length: Math.min(concurrency, queue.length) }, async () => {
      while (queue.length > 0) {
        const batch = queue.shift();
        if (!batch) break;
        const embeddings = await this.embedBatch(batch.texts);
        embeddings.forEach((embedding, j) => {
          results[batch.startIdx + j] = embedding;
        });
        completed += batch.texts.length;
        this.options.onProgress?.(Math.min(completed, texts.length), texts.length);
      }
    });

    await Promise.all(workers);
    this.logger.debug("Embedded texts", { count: texts.length, batches: batches.length });
    return results;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.modelId, input: batch }),
      });
    } catch (err) {
      throw new RagError(RagErrorCode.EMBEDDING_FAILURE, "Embedding request failed", err);
    }

    if (!res.ok) {
      const text = await res.text();
      throw new RagError(RagErrorCode.EMBEDDING_FAILURE, `Embedding API error (${res.status}): ${text}`);
    }

    const parsed = embeddingResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new RagError(
        RagErrorCode.EMBEDDING_FAILURE,
        `Malformed embedding response: ${formatIssues(parsed.error)}`,
      );
    }
    if (parsed.data.data.length !== batch.length) {
      throw new RagError(
        RagErrorCode.EMBEDDING_FAILURE,
        `Embedding count mismatch: texts=${batch.length} embeddings=${parsed.data.data.length}`,
      );
    }
    return parsed.data.data.map((item) => item.embedding);
  }
}

export function createEmbeddingFunction(config: RagConfig, logger?: Logger): EmbeddingFunction {
  if (config.embeddingProvider === "hashing") {
    return new HashingEmbeddingFunction(config.hashingDimensions);
  }
  if (!config.openRouterApiKey) {
    throw new RagError(RagErrorCode.CONFIGURATION_INVALID, "OPENROUTER_API_KEY is required");
  }
  return new OpenRouterEmbeddingFunction({
    apiKey: config.openRouterApiKey,
    model: config.embeddingModel,
    batchSize: config.embeddingBatchSize,
    concurrency: config.embeddingConcurrency,
    logger,
  });
}

/** Embeds a single query text. */
export async function embedQuery(embedder: EmbeddingFunction, query: string): Promise<number[]> {
  const [embedding] = await embedder.embed([query]);
  if (!embedding) {
    throw new RagError(RagErrorCode.EMBEDDING_FAILURE, "Embedding function returned no vector for the query");
  }
  return embedding;
}
