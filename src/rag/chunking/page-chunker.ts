import { RAG_CONFIG } from "../config.js";
import type { Chunk, ExtractedDocument } from "../types.js";
import type { ChunkingStrategy } from "./types.js";

/**
 * Recursively splits text by trying separators in order: \n\n → \n → " " → hard char limit.
 */
export function recursiveSplit(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const separators = ["\n\n", "\n", " "];
  for (const sep of separators) {
    const idx = text.lastIndexOf(sep, maxLength);
    if (idx > 0) {
      return [
        text.slice(0, idx),
        ...recursiveSplit(text.slice(idx + sep.length), maxLength),
      ];
    }
  }

  // Hard split at maxLength
  return [
    text.slice(0, maxLength),
    ...recursiveSplit(text.slice(maxLength), maxLength),
  ];
}

/** Chunks each extracted page separately; paragraph numbers restart at 1 per page. */
export class PageChunker implements ChunkingStrategy {
  readonly name = "page-chunker";

  constructor(private readonly maxChunkLength: number = RAG_CONFIG.maxChunkLength) {}

  chunk(document: ExtractedDocument): Chunk[] {
    const chunks: Chunk[] = [];

    for (const page of document.pages) {
      const text = page.text.trim();
      if (!text) continue;

      let paragraph = 1;
      for (const subText of recursiveSplit(text, this.maxChunkLength)) {
        const trimmed = subText.trim();
        if (!trimmed) continue;
        chunks.push({
          docId: document.docId,
          page: page.pageNumber,
          paragraph: paragraph++,
          text: trimmed,
        });
      }
    }

    return chunks;
  }
}
