import { RAG_CONFIG } from "../config.js";
import { RagError, RagErrorCode } from "../errors.js";
import type { Chunk, ExtractedDocument } from "../types.js";
import type { ChunkingStrategy } from "./types.js";

export interface WindowChunkerOptions {
  chunkSize: number;
  overlap: number;
  /** Approximate characters per page, used to estimate the page of a window. */
  pageLength: number;
}

/**
 * Fixed-size character windows over the whole document text (pages joined by
 * a newline), each overlapping the previous one by `overlap` characters.
 * Whitespace inside a window is collapsed. Paragraph numbers run across the
 * document starting at 1; the page is estimated from the window's offset.
 */
export class WindowChunker implements ChunkingStrategy {
  readonly name = "window-chunker";
  private readonly options: WindowChunkerOptions;

  constructor(options: Partial<WindowChunkerOptions> = {}) {
    this.options = {
      chunkSize: options.chunkSize ?? RAG_CONFIG.maxChunkLength,
      overlap: options.overlap ?? RAG_CONFIG.chunkOverlap,
      pageLength: options.pageLength ?? RAG_CONFIG.pageLength,
    };
    if (this.options.overlap < 0 || this.options.overlap >= this.options.chunkSize) {
      throw new RagError(
        RagErrorCode.INVALID_ARGUMENT,
        `overlap must be in [0, chunkSize), got ${this.options.overlap} for chunkSize ${this.options.chunkSize}`,
      );
    }
  }

  chunk(document: ExtractedDocument): Chunk[] {
    const { chunkSize, overlap, pageLength } = this.options;
    const text = document.pages.map((p) => p.text).join("\n");
    const chunks: Chunk[] = [];

    let paragraph = 1;
    for (let start = 0; start < text.length; start += chunkSize - overlap) {
      const cleaned = text.slice(start, start + chunkSize).replace(/\s+/g, " ").trim();
      const current = paragraph++;
      if (!cleaned) continue;
      chunks.push({
        docId: document.docId,
        page: Math.floor(start / pageLength) + 1,
        paragraph: current,
        text: cleaned,
      });
    }

    return chunks;
  }
}
