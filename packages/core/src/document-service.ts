import type { UnitOfWork } from "@docboard/db";
import { ConflictError, NotFoundError, ValidationError, errorMessage } from "@docboard/errors";
import { createChildLogger, type Logger } from "@docboard/logger";
import type { TaskEnqueuer, TaskInspector } from "@docboard/queue";
import type { ObjectStore } from "@docboard/storage";
import {
  DOCUMENT_METADATA_KEYS,
  FILE_METADATA_KEYS,
  type BatchResult,
  type Document,
  type DocumentChunk,
  type DocumentFile,
  type MetadataMap,
  type TaskInfo,
  type TaskStatus,
  type UploadTaskData,
} from "@docboard/types";
import type { ChunkLifecycleManager } from "./chunk-lifecycle.js";
import { systemClock, type Clock } from "./metadata.js";
import { stampDocument, transitionFile } from "./records.js";
import type { StagingArea } from "./staging.js";
import { runTransaction } from "./transaction.js";

export const STORAGE_MISSING_MESSAGE = "File not found in storage";

export interface DocumentServiceOptions {
  uow: UnitOfWork;
  store: ObjectStore;
  staging: StagingArea;
  tasks: TaskEnqueuer & TaskInspector;
  lifecycle: ChunkLifecycleManager;
  logger: Logger;
  clock?: Clock;
  /** Lifetime of download URLs when the caller gives none. Default: 3600 */
  presignTtlSeconds?: number;
}

export interface VectorizeRequest {
  /** Chunk every completed file instead of only the summary. Default: false */
  full?: boolean;
  /** Skip the validity-window check. Default: false */
  force?: boolean;
}

export interface DownloadLink {
  url: string;
  originalName: string;
  contentType: string;
}

/**
 * Operations the request layer calls on documents once identity is settled:
 * review, vectorization requests, removal, status queries and downloads.
 */
export class DocumentService {
  private readonly uow: UnitOfWork;
  private readonly store: ObjectStore;
  private readonly staging: StagingArea;
  private readonly tasks: TaskEnqueuer & TaskInspector;
  private readonly lifecycle: ChunkLifecycleManager;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly presignTtlSeconds: number;

  constructor(options: DocumentServiceOptions) {
    this.uow = options.uow;
    this.store = options.store;
    this.staging = options.staging;
    this.tasks = options.tasks;
    this.lifecycle = options.lifecycle;
    this.logger = createChildLogger(options.logger, { component: "document-service" });
    this.clock = options.clock ?? systemClock;
    this.presignTtlSeconds = options.presignTtlSeconds ?? 3_600;
  }

  // Review

  async approve(documentId: string, actorId: string): Promise<Document> {
    return this.applyApproval(documentId, actorId, {});
  }

  async reject(documentId: string, actorId: string, reason?: string): Promise<Document> {
    return this.applyRejection(documentId, actorId, reason, {});
  }

  async approveMany(documentIds: readonly string[], actorId: string): Promise<BatchResult> {
    return this.forEach(documentIds, (id) =>
      this.applyApproval(id, actorId, { [DOCUMENT_METADATA_KEYS.BATCH_APPROVAL]: true }),
    );
  }

  async rejectMany(documentIds: readonly string[], actorId: string, reason?: string): Promise<BatchResult> {
    return this.forEach(documentIds, (id) =>
      this.applyRejection(id, actorId, reason, { [DOCUMENT_METADATA_KEYS.BATCH_REJECTION]: true }),
    );
  }

  // Vectors

  /** Returns the id of the enqueued vectorize task. */
  async requestVectorize(documentId: string, actorId: string, request: VectorizeRequest = {}): Promise<string> {
    const full = request.full ?? false;
    const force = request.force ?? false;
    const document = await this.requireDocument(documentId);

    if (!force) {
      const now = this.clock();
      if (document.endDate && document.endDate < now) {
        throw new ValidationError("Document has expired; force the request to vectorize anyway", {
          endDate: document.endDate.toISOString(),
        });
      }
      if (document.startDate && document.startDate > now) {
        throw new ValidationError("Document is not valid yet; force the request to vectorize anyway", {
          startDate: document.startDate.toISOString(),
        });
      }
    }
    if ((await this.uow.repos.files.countByDocument(documentId)) === 0) {
      throw new ValidationError("Document has no files", { documentId: "no files" });
    }
    if (!full && !document.summary?.trim()) {
      throw new ValidationError("Document has no summary to vectorize", { summary: "blank" });
    }

    await stampDocument(
      this.uow.repos.documents,
      documentId,
      {
        [DOCUMENT_METADATA_KEYS.VECTORIZE_REQUESTED_BY]: actorId,
        [DOCUMENT_METADATA_KEYS.VECTORIZE_REQUESTED_AT]: this.clock().toISOString(),
        [DOCUMENT_METADATA_KEYS.FULL_VECTORIZE]: full,
        [DOCUMENT_METADATA_KEYS.FORCE_VECTORIZE]: force,
      },
      { vectorized: false },
    );

    const taskId = await this.enqueueFor(documentId, DOCUMENT_METADATA_KEYS.VECTORIZE_ERROR, () =>
      this.tasks.enqueue({
        kind: "vectorize",
        data: { documentId, mode: full ? "full" : "summary", requestedBy: actorId },
      }),
    );
    await stampDocument(this.uow.repos.documents, documentId, {
      [DOCUMENT_METADATA_KEYS.VECTORIZE_TASK_ID]: taskId,
    });
    return taskId;
  }

  async requestVectorDelete(documentId: string, actorId: string): Promise<string> {
    await this.requireDocument(documentId);
    await stampDocument(this.uow.repos.documents, documentId, {
      [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_REQUESTED_BY]: actorId,
      [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_REQUESTED_AT]: this.clock().toISOString(),
    });

    const taskId = await this.enqueueFor(documentId, DOCUMENT_METADATA_KEYS.VECTOR_DELETE_ERROR, () =>
      this.tasks.enqueue({ kind: "delete-vectors", data: { documentId, requestedBy: actorId } }),
    );
    await stampDocument(this.uow.repos.documents, documentId, {
      [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_TASK_ID]: taskId,
    });
    return taskId;
  }

  // Removal

  /**
   * Deletes the stored object (best-effort), the file's chunks and its row.
   * Removing the last file of a vectorized document drops every remaining
   * chunk and clears `vectorized`.
   */
  async removeFile(fileId: string): Promise<void> {
    const file = await this.uow.repos.files.findById(fileId);
    if (!file) throw new NotFoundError(`File ${fileId} not found`);

    try {
      await this.store.delete(file.storageKey);
    } catch (err) {
      this.logger.warn({ err, fileId, storageKey: file.storageKey }, "Stored object could not be deleted");
    }

    await runTransaction(this.uow, async (scope) => {
      const document = file.documentId === null ? null : await scope.repos.documents.findById(file.documentId);

      await this.lifecycle.deleteChunksForFile(fileId, scope);
      await scope.repos.files.delete(fileId);

      if (document?.vectorized && (await scope.repos.files.countByDocument(document.id)) === 0) {
        await this.lifecycle.deleteChunksForDocument(document.id, scope);
      }
    });
    this.logger.info({ fileId, documentId: file.documentId }, "File removed");
  }

  /** Chunks and vectors first, then stored objects, then the rows in one unit of work. */
  async deleteDocument(documentId: string): Promise<void> {
    await this.requireDocument(documentId);
    const files = await this.uow.repos.files.listByDocument(documentId);

    const chunkCount = await this.lifecycle.deleteChunksForDocument(documentId);

    if (files.length > 0) {
      const { allOk, failedKeys } = await this.store.deleteMany(files.map((file) => file.storageKey));
      if (!allOk) {
        this.logger.warn({ documentId, failedKeys }, "Some stored objects could not be deleted");
      }
    }

    await this.uow.transaction(async (repos) => {
      await repos.files.deleteByDocument(documentId);
      await repos.documents.delete(documentId);
    });
    this.logger.info({ documentId, files: files.length, chunks: chunkCount }, "Document deleted");
  }

  // Queries

  /**
   * Files of the document, oldest first. A completed file whose object has
   * gone missing from storage is marked failed on the way.
   */
  async getFileStatuses(documentId: string): Promise<DocumentFile[]> {
    await this.requireDocument(documentId);
    const files = await this.uow.repos.files.listByDocument(documentId);

    const statuses: DocumentFile[] = [];
    for (const file of files) {
      if (file.processingStatus !== "completed" || (await this.store.exists(file.storageKey))) {
        statuses.push(file);
        continue;
      }
      this.logger.warn({ fileId: file.id, storageKey: file.storageKey }, "Completed file missing from storage");
      const failed = await this.uow.transaction((repos) =>
        transitionFile(repos.files, file.id, "failed", {
          administrative: true,
          errorMessage: STORAGE_MISSING_MESSAGE,
          metadata: { [FILE_METADATA_KEYS.STORAGE_MISSING_AT]: this.clock().toISOString() },
        }),
      );
      statuses.push(failed);
    }
    return statuses;
  }

  /** Ids the runner has never seen report PENDING. */
  async getTaskStatus(taskId: string): Promise<TaskInfo> {
    const info = await this.tasks.getStatus(taskId);
    return info ?? { taskId, kind: null, status: "PENDING", result: null, error: null };
  }

  /**
   * A revoked upload never reaches its handler again, so its file is failed
   * here and the staged bytes are dropped. The file can then be re-uploaded.
   */
  async revokeTask(taskId: string): Promise<TaskStatus> {
    const request = await this.tasks.requestOf(taskId);
    const status = await this.tasks.revoke(taskId);
    this.logger.info({ taskId, status }, "Task revocation requested");

    if (status === "REVOKED" && request?.kind === "upload") {
      await this.failRevokedUpload(taskId, request.data);
    }
    return status;
  }

  private async failRevokedUpload(taskId: string, data: UploadTaskData): Promise<void> {
    const { fileId } = data;
    const message = `Task ${taskId} was revoked`;
    const now = this.clock().toISOString();

    const owned =
      fileId === null ||
      (await this.uow.transaction(async (repos) => {
        const file = await repos.files.findById(fileId);
        if (!file) return true;
        // A re-upload hands the row and its staging path to a newer task.
        if (file.metadata[FILE_METADATA_KEYS.TASK_ID] !== taskId) return false;
        if (file.processingStatus === "processing") {
          await transitionFile(repos.files, fileId, "failed", {
            errorMessage: message,
            metadata: {
              [FILE_METADATA_KEYS.UPLOAD_ERROR]: message,
              [FILE_METADATA_KEYS.ERROR_TIME]: now,
              [FILE_METADATA_KEYS.REVOKED_AT]: now,
            },
          });
        }
        return true;
      }));

    if (owned) {
      await this.staging.remove(data.stagingPath);
      this.logger.info({ taskId, fileId }, "Revoked upload marked failed");
    }
  }

  /** Summary chunks first, then by file and chunk index. */
  async listChunks(documentId: string): Promise<DocumentChunk[]> {
    return this.uow.repos.chunks.listByDocument(documentId);
  }

  // Downloads and views

  async presignDownload(fileId: string, ttlSeconds: number = this.presignTtlSeconds): Promise<DownloadLink> {
    const file = await this.uow.repos.files.findById(fileId);
    if (!file) throw new NotFoundError(`File ${fileId} not found`);
    if (file.processingStatus !== "completed") {
      throw new ConflictError(`File ${fileId} is ${file.processingStatus} and cannot be downloaded`);
    }

    const url = await this.store.presignGet(file.storageKey, ttlSeconds);

    if (file.documentId !== null) {
      const document = await this.uow.repos.documents.findById(file.documentId);
      if (document) {
        await this.uow.repos.documents.update(document.id, { downloadCount: document.downloadCount + 1 });
      }
    }
    return { url, originalName: file.originalName, contentType: file.contentType };
  }

  async recordView(documentId: string): Promise<Document> {
    const document = await this.requireDocument(documentId);
    const updated = await this.uow.repos.documents.update(documentId, { viewCount: document.viewCount + 1 });
    if (!updated) throw new NotFoundError(`Document ${documentId} not found`);
    return updated;
  }

  private async requireDocument(documentId: string): Promise<Document> {
    const document = await this.uow.repos.documents.findById(documentId);
    if (!document) throw new NotFoundError(`Document ${documentId} not found`);
    return document;
  }

  private async applyApproval(documentId: string, actorId: string, extra: MetadataMap): Promise<Document> {
    const document = await this.requireDocument(documentId);
    if (document.status === "approved") return document;

    const updated = await stampDocument(
      this.uow.repos.documents,
      documentId,
      {
        [DOCUMENT_METADATA_KEYS.APPROVED_BY]: actorId,
        [DOCUMENT_METADATA_KEYS.APPROVED_AT]: this.clock().toISOString(),
        ...extra,
      },
      { status: "approved" },
    );
    if (!updated) throw new NotFoundError(`Document ${documentId} not found`);
    return updated;
  }

  private async applyRejection(
    documentId: string,
    actorId: string,
    reason: string | undefined,
    extra: MetadataMap,
  ): Promise<Document> {
    await this.requireDocument(documentId);
    const updated = await stampDocument(
      this.uow.repos.documents,
      documentId,
      {
        ...(reason ? { [DOCUMENT_METADATA_KEYS.REJECT_REASON]: reason } : {}),
        [DOCUMENT_METADATA_KEYS.REJECTED_BY]: actorId,
        [DOCUMENT_METADATA_KEYS.REJECTED_AT]: this.clock().toISOString(),
        ...extra,
      },
      { status: "pending-approval" },
    );
    if (!updated) throw new NotFoundError(`Document ${documentId} not found`);
    return updated;
  }

  private async forEach(
    documentIds: readonly string[],
    apply: (documentId: string) => Promise<Document>,
  ): Promise<BatchResult> {
    if (documentIds.length === 0) throw new ValidationError("No document ids provided", { documentIds: "empty" });

    const result: BatchResult = { succeeded: [], failed: [] };
    for (const id of documentIds) {
      try {
        await apply(id);
        result.succeeded.push(id);
      } catch (err) {
        this.logger.warn({ err, documentId: id }, "Batch review step failed");
        result.failed.push({ id, reason: errorMessage(err) });
      }
    }
    return result;
  }

  private async enqueueFor(
    documentId: string,
    errorKey: string,
    enqueue: () => Promise<string>,
  ): Promise<string> {
    try {
      return await enqueue();
    } catch (err) {
      this.logger.error({ err, documentId }, "Could not enqueue document task");
      await stampDocument(this.uow.repos.documents, documentId, {
        [errorKey]: errorMessage(err),
        [DOCUMENT_METADATA_KEYS.ERROR_TIME]: this.clock().toISOString(),
      });
      throw err;
    }
  }
}
