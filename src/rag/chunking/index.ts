import { RagError, RagErrorCode } from "../errors.js";
import { PageChunker } from "./page-chunker.js";
import type { ChunkingStrategy } from "./types.js";
import { WindowChunker } from "./window-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new RagError(RagErrorCode.INVALID_ARGUMENT, `Unknown chunking strategy: ${name}`);
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new WindowChunker());
registerChunkingStrategy(new PageChunker());

export { PageChunker, recursiveSplit } from "./page-chunker.js";
export { WindowChunker } from "./window-chunker.js";
export type { ChunkingStrategy } from "./types.js";
