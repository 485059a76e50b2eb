import type { EmbeddingFunction } from "./embedding-service.js";

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Offline embedding: L2-normalized bag of words, each token hashed (FNV-1a)
 * into one of `dimensions` buckets. Deterministic, so indexing and querying
 * agree as long as `dimensions` does. Text without letters or digits is
 * hashed whole; only blank text maps to the zero vector.
 */
export class HashingEmbeddingFunction implements EmbeddingFunction {
  readonly modelId: string;

  constructor(readonly dimensions = 256) {
    this.modelId = `hashing-fnv1a-${dimensions}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    const tokens = tokenize(text);
    const trimmed = text.trim();
    if (tokens.length === 0 && trimmed) tokens.push(trimmed);
    for (const token of tokens) {
      const bucket = fnv1a(token) % this.dimensions;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}
