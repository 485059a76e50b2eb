import type { Logger } from "winston";
import { createLogger } from "../logger.js";
import { embedQuery, type EmbeddingFunction } from "./embedding-service.js";
import { RagError, RagErrorCode } from "./errors.js";
import { NOT_AVAILABLE, type Match, type NotAvailable, type SearchHit } from "./types.js";
import { scoreFromDistance, type VectorIndex } from "./vector-store.js";

function intField(value: unknown): number | NotAvailable {
  return typeof value === "number" && Number.isInteger(value) ? value : NOT_AVAILABLE;
}

function textField(value: unknown): string {
  return typeof value === "string" && value.length > 0 ? value : NOT_AVAILABLE;
}

export function toMatch(hit: SearchHit): Match {
  return {
    docId: textField(hit.metadata["docId"]),
    page: intField(hit.metadata["page"]),
    paragraph: intField(hit.metadata["paragraph"]),
    text: textField(hit.metadata["text"]),
    score: scoreFromDistance(hit.distance),
  };
}

/**
 * Query-time orchestration: embed, search, join. Holds no per-query state.
 */
export class RetrievalService {
  constructor(
    private readonly embedder: EmbeddingFunction,
    private readonly index: VectorIndex,
    private readonly logger: Logger = createLogger("retriever"),
  ) {
    if (embedder.modelId !== index.embeddingModel) {
      throw new RagError(
        RagErrorCode.EMBEDDING_MODEL_MISMATCH,
        `Query embedder "${embedder.modelId}" does not match index model "${index.embeddingModel}"`,
      );
    }
  }

  /**
   * Up to `k` matches, nearest first, in the order the index returned them.
   * Returns `[]` for an empty index.
   */
  async queryTopK(queryText: string, k: number): Promise<Match[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new RagError(RagErrorCode.INVALID_ARGUMENT, `k must be an integer >= 1, got ${k}`);
    }
    if (queryText.trim().length === 0) {
      throw new RagError(RagErrorCode.INVALID_ARGUMENT, "Query text must not be empty");
    }

    const queryVector = await embedQuery(this.embedder, queryText);
    const hits = await this.index.search(queryVector, k);
    const matches = hits.map(toMatch);

    this.logger.debug("Query answered", { k, matches: matches.length });
    return matches;
  }
}
