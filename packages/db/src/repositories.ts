import type {
  Document,
  DocumentChunk,
  DocumentFile,
  DocumentFilePatch,
  DocumentPatch,
  NewDocument,
  NewDocumentChunk,
  NewDocumentFile,
} from "@docboard/types";

export interface DocumentRepository {
  findById(id: string): Promise<Document | null>;
  insert(document: NewDocument): Promise<Document>;
  /** Applies the patch and bumps `updatedAt`. Null when the row is gone. */
  update(id: string, patch: DocumentPatch): Promise<Document | null>;
  delete(id: string): Promise<boolean>;
  /** Vectorized documents whose validity window excludes `now`. */
  findVectorizedOutsideWindow(now: Date): Promise<Document[]>;
}

export interface DocumentFileRepository {
  findById(id: string): Promise<DocumentFile | null>;
  /** Oldest first. */
  listByDocument(documentId: string): Promise<DocumentFile[]>;
  countByDocument(documentId: string): Promise<number>;
  insert(file: NewDocumentFile): Promise<DocumentFile>;
  update(id: string, patch: DocumentFilePatch): Promise<DocumentFile | null>;
  delete(id: string): Promise<boolean>;
  deleteByDocument(documentId: string): Promise<number>;
}

export interface DocumentChunkRepository {
  /** Summary chunks first, then by file id and chunk index. */
  listByDocument(documentId: string): Promise<DocumentChunk[]>;
  countByDocument(documentId: string): Promise<number>;
  insertMany(chunks: readonly NewDocumentChunk[]): Promise<DocumentChunk[]>;
  /** Deleted rows are returned so their vector ids can be purged remotely. */
  deleteByDocument(documentId: string): Promise<DocumentChunk[]>;
  deleteByFile(fileId: string): Promise<DocumentChunk[]>;
}

export interface Repositories {
  documents: DocumentRepository;
  files: DocumentFileRepository;
  chunks: DocumentChunkRepository;
}

/**
 * Entry point to persistence. `repos` runs each call on its own; `transaction`
 * runs `fn` atomically and rolls back when it throws. Transactions do not nest.
 */
export interface UnitOfWork {
  readonly repos: Repositories;
  transaction<T>(fn: (scope: Repositories) => Promise<T>): Promise<T>;
}
