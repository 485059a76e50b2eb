import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { EmbeddingFunction } from "../embedding-service.js";
import type { Chunk } from "../types.js";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "doc-rag-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function chunk(docId: string, page: number, paragraph: number, text: string): Chunk {
  return { docId, page, paragraph, text };
}

/**
 * Embeds every text as `[text.length, 1, 1, ...]` with `dimensions` entries;
 * `dimensions` can be changed between calls.
 */
export class LengthEmbeddingFunction implements EmbeddingFunction {
  readonly modelId = "length-test";
  calls = 0;

  constructor(public dimensions = 3) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls++;
    return texts.map((text) => [text.length, ...new Array<number>(this.dimensions - 1).fill(1)]);
  }
}
