export interface Chunk {
  docId: string;
  page: number;
  paragraph: number;
  text: string;
}

export interface ChunkMetadata {
  docId: string;
  page: number;
  paragraph: number;
}

/** Chunk record as persisted in the chunk store file. */
export interface StoredChunkRecord {
  doc_id: string;
  page: number;
  paragraph: number;
  chunk_text: string;
}

export interface ExtractedDocument {
  docId: string;
  pages: PageContent[];
}

export interface PageContent {
  pageNumber: number;
  text: string;
}

/** Metadata written beside every vector: provenance plus the chunk text itself. */
export interface IndexedChunkMetadata extends ChunkMetadata {
  text: string;
}

export interface SearchHit {
  id: string;
  metadata: Readonly<Record<string, unknown>>;
  distance: number;
}

export const NOT_AVAILABLE = "not available";
export type NotAvailable = typeof NOT_AVAILABLE;

export interface Match {
  docId: string;
  page: number | NotAvailable;
  paragraph: number | NotAvailable;
  text: string;
  score: number;
}

export interface IndexManifest {
  embeddingModel: string;
  distanceMetric: "cosine";
  embeddingDimension: number | null;
}
