import { randomUUID } from "node:crypto";
import { ConflictError } from "@docboard/errors";
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
import type {
  DocumentChunkRepository,
  DocumentFileRepository,
  DocumentRepository,
  Repositories,
  UnitOfWork,
} from "./repositories.js";

interface MemoryState {
  documents: Map<string, Document>;
  files: Map<string, DocumentFile>;
  chunks: Map<string, DocumentChunk>;
}

function emptyState(): MemoryState {
  return { documents: new Map(), files: new Map(), chunks: new Map() };
}

function compareChunks(a: DocumentChunk, b: DocumentChunk): number {
  if (a.fileId !== b.fileId) {
    if (a.fileId === null) return -1;
    if (b.fileId === null) return 1;
    return a.fileId < b.fileId ? -1 : 1;
  }
  return a.chunkIndex - b.chunkIndex;
}

/**
 * In-process persistence with the same contract as the Drizzle unit of work:
 * cascading deletes, the chunk and storage-key unique constraints, and
 * rollback on error. Transactions are serialised. Rows are copied on the way
 * in and out so callers never share references with the store.
 */
export class MemoryUnitOfWork implements UnitOfWork {
  private state: MemoryState = emptyState();
  private queue: Promise<unknown> = Promise.resolve();
  readonly repos: Repositories;

  constructor() {
    const current = () => this.state;
    this.repos = {
      documents: new MemoryDocumentRepository(current),
      files: new MemoryDocumentFileRepository(current),
      chunks: new MemoryDocumentChunkRepository(current),
    };
  }

  async transaction<T>(fn: (scope: Repositories) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await fn(this.repos);
      } catch (err) {
        this.state = snapshot;
        throw err;
      }
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Drops every row. */
  reset(): void {
    this.state = emptyState();
  }
}

class MemoryDocumentRepository implements DocumentRepository {
  constructor(private readonly state: () => MemoryState) {}

  async findById(id: string): Promise<Document | null> {
    const row = this.state().documents.get(id);
    return row ? structuredClone(row) : null;
  }

  async insert(document: NewDocument): Promise<Document> {
    const id = document.id ?? randomUUID();
    if (this.state().documents.has(id)) throw new ConflictError(`Document ${id} already exists`);
    const now = new Date();
    const row: Document = {
      id,
      title: document.title,
      summary: document.summary ?? null,
      tags: document.tags ?? [],
      status: document.status ?? "pending-approval",
      ownerId: document.ownerId,
      isPublic: document.isPublic ?? false,
      startDate: document.startDate ?? null,
      endDate: document.endDate ?? null,
      viewCount: 0,
      downloadCount: 0,
      vectorized: false,
      metadata: document.metadata ?? {},
      createdAt: now,
      updatedAt: now,
    };
    this.state().documents.set(id, structuredClone(row));
    return row;
  }

  async update(id: string, patch: DocumentPatch): Promise<Document | null> {
    const existing = this.state().documents.get(id);
    if (!existing) return null;
    const row: Document = { ...existing, ...structuredClone(patch), updatedAt: new Date() };
    this.state().documents.set(id, row);
    return structuredClone(row);
  }

  async delete(id: string): Promise<boolean> {
    const state = this.state();
    if (!state.documents.delete(id)) return false;
    for (const [fileId, file] of state.files) {
      if (file.documentId === id) state.files.delete(fileId);
    }
    for (const [chunkId, chunk] of state.chunks) {
      if (chunk.documentId === id) state.chunks.delete(chunkId);
    }
    return true;
  }

  async findVectorizedOutsideWindow(now: Date): Promise<Document[]> {
    const time = now.getTime();
    return [...this.state().documents.values()]
      .filter(
        (doc) =>
          doc.vectorized &&
          ((doc.endDate !== null && doc.endDate.getTime() < time) ||
            (doc.startDate !== null && doc.startDate.getTime() > time)),
      )
      .map((doc) => structuredClone(doc));
  }
}

class MemoryDocumentFileRepository implements DocumentFileRepository {
  constructor(private readonly state: () => MemoryState) {}

  async findById(id: string): Promise<DocumentFile | null> {
    const row = this.state().files.get(id);
    return row ? structuredClone(row) : null;
  }

  async listByDocument(documentId: string): Promise<DocumentFile[]> {
    return [...this.state().files.values()]
      .filter((file) => file.documentId === documentId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((file) => structuredClone(file));
  }

  async countByDocument(documentId: string): Promise<number> {
    let total = 0;
    for (const file of this.state().files.values()) {
      if (file.documentId === documentId) total++;
    }
    return total;
  }

  async insert(file: NewDocumentFile): Promise<DocumentFile> {
    const state = this.state();
    const id = file.id ?? randomUUID();
    if (state.files.has(id)) throw new ConflictError(`File ${id} already exists`);
    for (const other of state.files.values()) {
      if (other.storageKey === file.storageKey) {
        throw new ConflictError(`Storage key ${file.storageKey} is already in use`);
      }
    }
    if (file.documentId !== null && !state.documents.has(file.documentId)) {
      throw new ConflictError(`Document ${file.documentId} does not exist`);
    }
    const now = new Date();
    const row: DocumentFile = {
      id,
      documentId: file.documentId,
      storageKey: file.storageKey,
      originalName: file.originalName,
      fileType: file.fileType,
      fileSize: file.fileSize,
      contentType: file.contentType,
      processingStatus: file.processingStatus ?? "pending",
      metadata: file.metadata ?? {},
      errorMessage: null,
      createdAt: now,
      updatedAt: now,
    };
    state.files.set(id, structuredClone(row));
    return row;
  }

  async update(id: string, patch: DocumentFilePatch): Promise<DocumentFile | null> {
    const existing = this.state().files.get(id);
    if (!existing) return null;
    const row: DocumentFile = { ...existing, ...structuredClone(patch), updatedAt: new Date() };
    this.state().files.set(id, row);
    return structuredClone(row);
  }

  async delete(id: string): Promise<boolean> {
    const state = this.state();
    if (!state.files.delete(id)) return false;
    for (const [chunkId, chunk] of state.chunks) {
      if (chunk.fileId === id) state.chunks.delete(chunkId);
    }
    return true;
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const ids = [...this.state().files.values()]
      .filter((file) => file.documentId === documentId)
      .map((file) => file.id);
    for (const id of ids) await this.delete(id);
    return ids.length;
  }
}

class MemoryDocumentChunkRepository implements DocumentChunkRepository {
  constructor(private readonly state: () => MemoryState) {}

  async listByDocument(documentId: string): Promise<DocumentChunk[]> {
    return [...this.state().chunks.values()]
      .filter((chunk) => chunk.documentId === documentId)
      .sort(compareChunks)
      .map((chunk) => structuredClone(chunk));
  }

  async countByDocument(documentId: string): Promise<number> {
    let total = 0;
    for (const chunk of this.state().chunks.values()) {
      if (chunk.documentId === documentId) total++;
    }
    return total;
  }

  async insertMany(chunks: readonly NewDocumentChunk[]): Promise<DocumentChunk[]> {
    const state = this.state();
    const taken = new Set(
      [...state.chunks.values()].map((c) => `${c.documentId}/${c.fileId ?? ""}/${c.chunkIndex}`),
    );
    const rows: DocumentChunk[] = [];
    const createdAt = new Date();

    for (const chunk of chunks) {
      const slot = `${chunk.documentId}/${chunk.fileId ?? ""}/${chunk.chunkIndex}`;
      if (taken.has(slot)) {
        throw new ConflictError(`Chunk ${chunk.chunkIndex} already exists for ${chunk.documentId}`);
      }
      if (!state.documents.has(chunk.documentId)) {
        throw new ConflictError(`Document ${chunk.documentId} does not exist`);
      }
      taken.add(slot);
      rows.push({ ...structuredClone(chunk), id: chunk.id ?? randomUUID(), createdAt });
    }

    for (const row of rows) state.chunks.set(row.id, structuredClone(row));
    return rows;
  }

  async deleteByDocument(documentId: string): Promise<DocumentChunk[]> {
    return this.deleteWhere((chunk) => chunk.documentId === documentId);
  }

  async deleteByFile(fileId: string): Promise<DocumentChunk[]> {
    return this.deleteWhere((chunk) => chunk.fileId === fileId);
  }

  private deleteWhere(predicate: (chunk: DocumentChunk) => boolean): DocumentChunk[] {
    const state = this.state();
    const removed = [...state.chunks.values()].filter(predicate).sort(compareChunks);
    for (const chunk of removed) state.chunks.delete(chunk.id);
    return removed;
  }
}
