import { randomUUID } from "node:crypto";
import type CircuitBreaker from "opossum";
import { chunkSentences, DEFAULT_SENTENCE_BUDGET } from "@docboard/chunker";
import type { UnitOfWork } from "@docboard/db";
import {
  ValidationError,
  createCircuitBreaker,
  errorMessage,
  type CircuitBreakerOptions,
} from "@docboard/errors";
import type { Logger } from "@docboard/logger";
import {
  CHUNK_METADATA_KEYS,
  DOCUMENT_METADATA_KEYS,
  type Document,
  type DocumentChunk,
  type DocumentFile,
  type NewDocumentChunk,
} from "@docboard/types";
import type { IVectorStore } from "@docboard/vector-store";
import { isoOrNull, systemClock, type Clock } from "./metadata.js";
import { stampDocument } from "./records.js";
import { runTransaction, type TransactionScope } from "./transaction.js";

export const EMBEDDING_MODEL = "placeholder";
export const EMBEDDING_VERSION = "0.1";

export const EXPIRED_REASON = "Document expired or not yet valid";

export interface ChunkLifecycleOptions {
  uow: UnitOfWork;
  vectorStore: IVectorStore;
  logger: Logger;
  /** Character budget for summary chunks. */
  summaryChunkSize?: number;
  clock?: Clock;
  breaker?: CircuitBreakerOptions;
}

/**
 * Owns chunk rows and their remote vectors. Local rows are authoritative:
 * remote deletion runs after the local unit of work commits, and a failure
 * there is recorded on the document instead of undoing the local change.
 *
 * Every operation accepts an open {@link TransactionScope}; without one it
 * runs in a unit of work of its own.
 */
export class ChunkLifecycleManager {
  private readonly uow: UnitOfWork;
  private readonly logger: Logger;
  private readonly summaryChunkSize: number;
  private readonly clock: Clock;
  private readonly purgeBreaker: CircuitBreaker<[readonly string[]], void>;

  constructor(options: ChunkLifecycleOptions) {
    this.uow = options.uow;
    this.logger = options.logger;
    this.summaryChunkSize = options.summaryChunkSize ?? DEFAULT_SENTENCE_BUDGET;
    this.clock = options.clock ?? systemClock;
    const { vectorStore } = options;
    this.purgeBreaker = createCircuitBreaker(
      "vector-store",
      (vectorIds: readonly string[]) => vectorStore.deleteVectors(vectorIds),
      options.logger,
      options.breaker,
    );
  }

  buildFileChunks(document: Document, file: DocumentFile, chunkTexts: readonly string[]): NewDocumentChunk[] {
    const createdAt = this.clock().toISOString();
    return chunkTexts.map((content, chunkIndex) => ({
      documentId: document.id,
      fileId: file.id,
      content,
      chunkIndex,
      vectorId: randomUUID(),
      embeddingModel: EMBEDDING_MODEL,
      embeddingVersion: EMBEDDING_VERSION,
      metadata: {
        [CHUNK_METADATA_KEYS.FILE_ID]: file.id,
        [CHUNK_METADATA_KEYS.FILE_NAME]: file.originalName,
        [CHUNK_METADATA_KEYS.FILE_TYPE]: file.fileType,
        [CHUNK_METADATA_KEYS.CHUNK_INDEX]: chunkIndex,
        [CHUNK_METADATA_KEYS.TOTAL_CHUNKS]: chunkTexts.length,
        [CHUNK_METADATA_KEYS.DOCUMENT_TITLE]: document.title,
        [CHUNK_METADATA_KEYS.DOCUMENT_TAGS]: [...document.tags],
        [CHUNK_METADATA_KEYS.CREATED_AT]: createdAt,
        [CHUNK_METADATA_KEYS.DOCUMENT_CREATED_AT]: document.createdAt.toISOString(),
        [CHUNK_METADATA_KEYS.DOCUMENT_START_DATE]: isoOrNull(document.startDate),
        [CHUNK_METADATA_KEYS.DOCUMENT_END_DATE]: isoOrNull(document.endDate),
        [CHUNK_METADATA_KEYS.IS_SUMMARY]: false,
      },
    }));
  }

  buildSummaryChunks(document: Document): NewDocumentChunk[] {
    const texts = chunkSentences(document.summary ?? "", this.summaryChunkSize);
    const createdAt = this.clock().toISOString();
    return texts.map((content, chunkIndex) => ({
      documentId: document.id,
      fileId: null,
      content,
      chunkIndex,
      vectorId: randomUUID(),
      embeddingModel: EMBEDDING_MODEL,
      embeddingVersion: EMBEDDING_VERSION,
      metadata: {
        [CHUNK_METADATA_KEYS.CHUNK_INDEX]: chunkIndex,
        [CHUNK_METADATA_KEYS.TOTAL_CHUNKS]: texts.length,
        [CHUNK_METADATA_KEYS.DOCUMENT_TITLE]: document.title,
        [CHUNK_METADATA_KEYS.DOCUMENT_TAGS]: [...document.tags],
        [CHUNK_METADATA_KEYS.CREATED_AT]: createdAt,
        [CHUNK_METADATA_KEYS.DOCUMENT_CREATED_AT]: document.createdAt.toISOString(),
        [CHUNK_METADATA_KEYS.DOCUMENT_START_DATE]: isoOrNull(document.startDate),
        [CHUNK_METADATA_KEYS.DOCUMENT_END_DATE]: isoOrNull(document.endDate),
        [CHUNK_METADATA_KEYS.IS_SUMMARY]: true,
      },
    }));
  }

  async createChunksForFile(
    document: Document,
    file: DocumentFile,
    chunkTexts: readonly string[],
    scope?: TransactionScope,
  ): Promise<DocumentChunk[]> {
    if (file.documentId !== document.id) {
      throw new ValidationError(`File ${file.id} does not belong to document ${document.id}`);
    }
    const chunks = this.buildFileChunks(document, file, chunkTexts);
    return this.inScope(scope, (s) => s.repos.chunks.insertMany(chunks));
  }

  async createChunksForSummary(document: Document, scope?: TransactionScope): Promise<DocumentChunk[]> {
    const chunks = this.buildSummaryChunks(document);
    return this.inScope(scope, (s) => s.repos.chunks.insertMany(chunks));
  }

  /** Removes every chunk of the document and clears `vectorized`. */
  async deleteChunksForDocument(documentId: string, scope?: TransactionScope): Promise<number> {
    return this.inScope(scope, async (s) => {
      const removed = await s.repos.chunks.deleteByDocument(documentId);
      const document = await s.repos.documents.findById(documentId);
      if (document?.vectorized) {
        await s.repos.documents.update(documentId, { vectorized: false });
      }
      this.purgeAfterCommit(s, documentId, removed);
      return removed.length;
    });
  }

  /** Removes a file's chunks; clears `vectorized` when the document has none left. */
  async deleteChunksForFile(fileId: string, scope?: TransactionScope): Promise<number> {
    return this.inScope(scope, async (s) => {
      const file = await s.repos.files.findById(fileId);
      const removed = await s.repos.chunks.deleteByFile(fileId);
      const documentId = file?.documentId ?? removed[0]?.documentId ?? null;

      if (documentId !== null && (await s.repos.chunks.countByDocument(documentId)) === 0) {
        const document = await s.repos.documents.findById(documentId);
        if (document?.vectorized) {
          await s.repos.documents.update(documentId, { vectorized: false });
        }
      }
      if (documentId !== null) this.purgeAfterCommit(s, documentId, removed);
      return removed.length;
    });
  }

  /**
   * Un-vectorizes documents whose validity window excludes `now`. Returns the
   * number of documents reconciled; a second call finds nothing to do.
   */
  async reconcileExpired(now: Date = this.clock(), scope?: TransactionScope): Promise<number> {
    return this.inScope(scope, async (s) => {
      const documents = await s.repos.documents.findVectorizedOutsideWindow(now);
      for (const document of documents) {
        await this.deleteChunksForDocument(document.id, s);
        await stampDocument(
          s.repos.documents,
          document.id,
          {
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_BY]: "system",
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_AT]: now.toISOString(),
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_REASON]: EXPIRED_REASON,
          },
          { vectorized: false },
        );
      }
      if (documents.length > 0) {
        this.logger.info({ count: documents.length }, "Expired documents un-vectorized");
      }
      return documents.length;
    });
  }

  shutdown(): void {
    this.purgeBreaker.shutdown();
  }

  private inScope<T>(scope: TransactionScope | undefined, fn: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return scope ? fn(scope) : runTransaction(this.uow, fn);
  }

  private purgeAfterCommit(scope: TransactionScope, documentId: string, removed: readonly DocumentChunk[]): void {
    const vectorIds = removed.flatMap((chunk) => (chunk.vectorId === null ? [] : [chunk.vectorId]));
    if (vectorIds.length === 0) return;
    scope.afterCommit(() => this.purgeVectors(documentId, vectorIds));
  }

  private async purgeVectors(documentId: string, vectorIds: readonly string[]): Promise<void> {
    try {
      await this.purgeBreaker.fire(vectorIds);
    } catch (err) {
      this.logger.warn({ err, documentId, count: vectorIds.length }, "Remote vector deletion failed");
      try {
        await stampDocument(this.uow.repos.documents, documentId, {
          [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_ERROR]: errorMessage(err),
          [DOCUMENT_METADATA_KEYS.ERROR_TIME]: this.clock().toISOString(),
        });
      } catch (stampErr) {
        this.logger.error({ err: stampErr, documentId }, "Could not record vector deletion failure");
      }
    }
  }
}
