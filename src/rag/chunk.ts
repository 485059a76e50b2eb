import { z } from "zod";
import { RagError, RagErrorCode } from "./errors.js";
import type { Chunk, ChunkMetadata, StoredChunkRecord } from "./types.js";

const nonBlank = z
  .string()
  .refine((value) => value.trim().length > 0, { message: "must not be empty" });

export const chunkSchema = z.object({
  docId: nonBlank,
  page: z.number().int().nonnegative(),
  paragraph: z.number().int().nonnegative(),
  text: nonBlank,
});

export const storedChunkRecordSchema = z.object({
  doc_id: nonBlank,
  page: z.number().int().nonnegative(),
  paragraph: z.number().int().nonnegative(),
  chunk_text: nonBlank,
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validates an incoming chunk at the core boundary. Unknown keys are dropped.
 */
export function parseChunk(input: unknown): Chunk {
  const result = chunkSchema.safeParse(input);
  if (!result.success) {
    throw new RagError(RagErrorCode.INVALID_ARGUMENT, `Invalid chunk: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function chunkId(chunk: ChunkMetadata): string {
  return `${encodeURIComponent(chunk.docId)}#${chunk.page}#${chunk.paragraph}`;
}

export function toRecord(chunk: Chunk): StoredChunkRecord {
  return {
    doc_id: chunk.docId,
    page: chunk.page,
    paragraph: chunk.paragraph,
    chunk_text: chunk.text,
  };
}

export function fromRecord(record: StoredChunkRecord): Chunk {
  return {
    docId: record.doc_id,
    page: record.page,
    paragraph: record.paragraph,
    text: record.chunk_text,
  };
}
