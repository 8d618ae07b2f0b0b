import type { MetadataMap } from "./json.js";

export interface DocumentChunk {
  id: string;
  documentId: string;
  /** Null for chunks cut from the document summary. */
  fileId: string | null;
  content: string;
  chunkIndex: number;
  vectorId: string | null;
  embeddingModel: string;
  embeddingVersion: string;
  metadata: MetadataMap;
  createdAt: Date;
}

export type NewDocumentChunk = Omit<DocumentChunk, "id" | "createdAt"> & { id?: string };

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}
