import type { Chunk, ExtractedDocument } from "../types.js";

export interface ChunkingStrategy {
  readonly name: string;
  chunk(document: ExtractedDocument): Chunk[];
}
