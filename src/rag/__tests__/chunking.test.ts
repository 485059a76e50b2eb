import { describe, expect, it } from "@jest/globals";
import { getChunkingStrategy, PageChunker, recursiveSplit, WindowChunker } from "../chunking/index.js";
import { RagErrorCode } from "../errors.js";

describe("WindowChunker", () => {
  it("emits overlapping windows with estimated pages and running paragraphs", () => {
    const chunker = new WindowChunker({ chunkSize: 10, overlap: 2, pageLength: 16 });
    const chunks = chunker.chunk({
      docId: "alpha.txt",
      pages: [{ pageNumber: 1, text: "abcdefghijklmnopqrstuvwxyz" }],
    });

    expect(chunks).toEqual([
      { docId: "alpha.txt", page: 1, paragraph: 1, text: "abcdefghij" },
      { docId: "alpha.txt", page: 1, paragraph: 2, text: "ijklmnopqr" },
      { docId: "alpha.txt", page: 2, paragraph: 3, text: "qrstuvwxyz" },
      { docId: "alpha.txt", page: 2, paragraph: 4, text: "yz" },
    ]);
  });

  it("joins pages and collapses whitespace", () => {
    const chunker = new WindowChunker({ chunkSize: 100, overlap: 10, pageLength: 1800 });
    const chunks = chunker.chunk({
      docId: "d",
      pages: [
        { pageNumber: 1, text: "Hello\n\n  world" },
        { pageNumber: 2, text: "next" },
      ],
    });

    expect(chunks).toEqual([{ docId: "d", page: 1, paragraph: 1, text: "Hello world next" }]);
  });

  it("skips blank windows without reusing their paragraph number", () => {
    const chunker = new WindowChunker({ chunkSize: 4, overlap: 0, pageLength: 100 });
    const chunks = chunker.chunk({ docId: "d", pages: [{ pageNumber: 1, text: "ab      cd" }] });

    expect(chunks.map((c) => [c.paragraph, c.text])).toEqual([
      [1, "ab"],
      [3, "cd"],
    ]);
  });

  it("rejects an overlap that would not advance", () => {
    expect(() => new WindowChunker({ chunkSize: 10, overlap: 10 })).toThrow(
      "overlap must be in [0, chunkSize), got 10 for chunkSize 10",
    );
  });
});

describe("PageChunker", () => {
  it("splits each page on separators and numbers paragraphs per page", () => {
    const chunker = new PageChunker(10);
    const chunks = chunker.chunk({
      docId: "scan.pdf",
      pages: [
        { pageNumber: 1, text: "hello world foo" },
        { pageNumber: 2, text: "   " },
        { pageNumber: 3, text: "bye" },
      ],
    });

    expect(chunks).toEqual([
      { docId: "scan.pdf", page: 1, paragraph: 1, text: "hello" },
      { docId: "scan.pdf", page: 1, paragraph: 2, text: "world foo" },
      { docId: "scan.pdf", page: 3, paragraph: 1, text: "bye" },
    ]);
  });
});

describe("recursiveSplit", () => {
  it("falls back to a hard split without separators", () => {
    expect(recursiveSplit("abcdefghijkl", 5)).toEqual(["abcde", "fghij", "kl"]);
  });

  it("prefers paragraph breaks", () => {
    expect(recursiveSplit("one two\n\nthree", 10)).toEqual(["one two", "three"]);
  });
});

describe("chunking registry", () => {
  it("registers both default strategies", () => {
    expect(getChunkingStrategy("window-chunker").name).toBe("window-chunker");
    expect(getChunkingStrategy("page-chunker").name).toBe("page-chunker");
  });

  it("rejects unknown strategies", () => {
    expect(() => getChunkingStrategy("sentence")).toThrow("Unknown chunking strategy: sentence");
    try {
      getChunkingStrategy("sentence");
    } catch (err) {
      expect(err).toMatchObject({ code: RagErrorCode.INVALID_ARGUMENT });
    }
  });
});
