import { randomUUID } from "node:crypto";
import type { UnitOfWork } from "@docboard/db";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  errorMessage,
  withRetry,
  type RetryOptions,
} from "@docboard/errors";
import { createChildLogger, type Logger } from "@docboard/logger";
import type { TaskEnqueuer } from "@docboard/queue";
import type { ObjectStore } from "@docboard/storage";
import {
  FILE_METADATA_KEYS,
  type DocumentFile,
  type FileAcceptResult,
  type IncomingFile,
  type MetadataMap,
} from "@docboard/types";
import { extensionOf, ruleForName, type FileTypeRule } from "./file-types.js";
import { systemClock, type Clock } from "./metadata.js";
import { transitionFile } from "./records.js";
import type { StagingArea } from "./staging.js";

export interface UploadCoordinatorOptions {
  uow: UnitOfWork;
  store: ObjectStore;
  staging: StagingArea;
  enqueuer: TaskEnqueuer;
  logger: Logger;
  clock?: Clock;
  /** Inline (sync mode) uploads. Default: 3 attempts, 2s apart. */
  uploadRetry?: Pick<RetryOptions, "maxAttempts" | "delayMs">;
}

export interface AcceptBatchOptions {
  /** Stage the bytes and hand them to an upload task instead of storing them inline. */
  deferred: boolean;
}

interface AcceptedFile {
  file: IncomingFile;
  rule: FileTypeRule;
}

const MB = 1024 * 1024;

/**
 * Validates an upload batch, creates one file row per distinct file and either
 * stores the bytes inline or stages them for a deferred upload task.
 */
export class UploadCoordinator {
  private readonly uow: UnitOfWork;
  private readonly store: ObjectStore;
  private readonly staging: StagingArea;
  private readonly enqueuer: TaskEnqueuer;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly uploadRetry: Pick<RetryOptions, "maxAttempts" | "delayMs">;

  constructor(options: UploadCoordinatorOptions) {
    this.uow = options.uow;
    this.store = options.store;
    this.staging = options.staging;
    this.enqueuer = options.enqueuer;
    this.logger = createChildLogger(options.logger, { component: "upload-coordinator" });
    this.clock = options.clock ?? systemClock;
    this.uploadRetry = { maxAttempts: 3, delayMs: 2_000, ...options.uploadRetry };
  }

  /**
   * Results follow request order. A rejected batch writes nothing; once
   * accepted, a failure of one file never stops the others.
   */
  async acceptBatch(
    files: readonly IncomingFile[],
    ownerId: string,
    documentId: string,
    options: AcceptBatchOptions,
  ): Promise<FileAcceptResult[]> {
    const accepted = validateBatch(files);
    const targetId = await this.resolveDocument(documentId, options.deferred);

    const results: FileAcceptResult[] = [];
    for (const { file, rule } of dedupeByName(accepted)) {
      const storageKey = `${randomUUID()}${extensionOf(file.originalName)}`;
      const taskId = options.deferred ? randomUUID() : null;
      const metadata: MetadataMap = {
        [FILE_METADATA_KEYS.UPLOAD_TYPE]: options.deferred ? "async" : "sync",
        [FILE_METADATA_KEYS.UPLOADED_BY]: ownerId,
        ...(taskId === null ? {} : { [FILE_METADATA_KEYS.TASK_ID]: taskId }),
      };

      const row = await this.uow.transaction(async (repos) => {
        const inserted = await repos.files.insert({
          documentId: targetId,
          storageKey,
          originalName: file.originalName,
          fileType: rule.fileType,
          fileSize: file.content.length,
          contentType: rule.contentType,
          processingStatus: "pending",
          metadata,
        });
        return transitionFile(repos.files, inserted.id, "processing");
      });

      results.push(
        taskId === null
          ? await this.storeInline(row, file.content)
          : await this.stageAndEnqueue(row, file.content, taskId),
      );
    }

    this.logger.info(
      { documentId: targetId, files: results.length, deferred: options.deferred },
      "Upload batch accepted",
    );
    return results;
  }

  /**
   * Puts a failed file back into processing with new bytes under its existing
   * storage key and enqueues a fresh upload task.
   */
  async reupload(fileId: string, file: IncomingFile, actorId: string): Promise<FileAcceptResult> {
    const existing = await this.uow.repos.files.findById(fileId);
    if (!existing) throw new NotFoundError(`File ${fileId} not found`);
    if (existing.processingStatus !== "failed") {
      throw new ConflictError(`Only failed files can be re-uploaded; file ${fileId} is ${existing.processingStatus}`);
    }
    if (file.originalName !== existing.originalName) {
      throw new ValidationError("Re-uploaded file must keep its original name", {
        originalName: `expected ${existing.originalName}`,
      });
    }
    validateFile(file);

    const taskId = randomUUID();
    const row = await this.uow.transaction((repos) =>
      transitionFile(repos.files, fileId, "processing", {
        errorMessage: null,
        fileSize: file.content.length,
        metadata: {
          [FILE_METADATA_KEYS.REUPLOADED_BY]: actorId,
          [FILE_METADATA_KEYS.REUPLOADED_AT]: this.clock().toISOString(),
          [FILE_METADATA_KEYS.ORIGINAL_ERROR]: existing.errorMessage,
          [FILE_METADATA_KEYS.REUPLOAD_TASK_ID]: taskId,
          [FILE_METADATA_KEYS.TASK_ID]: taskId,
        },
      }),
    );

    return this.stageAndEnqueue(row, file.content, taskId);
  }

  private async resolveDocument(documentId: string, deferred: boolean): Promise<string | null> {
    const document = await this.uow.repos.documents.findById(documentId);
    if (document) return document.id;
    if (deferred) throw new NotFoundError(`Document ${documentId} not found`);
    this.logger.warn({ documentId }, "Document not found, storing files without a document");
    return null;
  }

  private async stageAndEnqueue(row: DocumentFile, content: Buffer, taskId: string): Promise<FileAcceptResult> {
    let stagingPath: string | null = null;
    try {
      stagingPath = await this.staging.stage(row.storageKey, content);
      await this.enqueuer.enqueue({
        kind: "upload",
        taskId,
        data: { stagingPath, storageKey: row.storageKey, documentId: row.documentId, fileId: row.id },
      });
      return toResult(row, "processing", taskId, null);
    } catch (err) {
      this.logger.error({ err, fileId: row.id, storageKey: row.storageKey }, "Could not hand file to an upload task");
      if (stagingPath !== null) await this.staging.remove(stagingPath);
      return this.fail(row, err);
    }
  }

  private async storeInline(row: DocumentFile, content: Buffer): Promise<FileAcceptResult> {
    let attempts = 0;
    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          await this.store.put(row.storageKey, content, content.length, row.contentType);
        },
        {
          ...this.uploadRetry,
          onRetry: (err, attempt) => {
            this.logger.warn({ err, storageKey: row.storageKey, attempt }, "Inline upload failed, retrying");
          },
        },
      );
    } catch (err) {
      this.logger.error({ err, fileId: row.id, storageKey: row.storageKey }, "Inline upload failed");
      return this.fail(row, err);
    }

    const completed = await this.uow.transaction((repos) =>
      transitionFile(repos.files, row.id, "completed", {
        metadata: {
          [FILE_METADATA_KEYS.UPLOAD_COMPLETED_AT]: this.clock().toISOString(),
          [FILE_METADATA_KEYS.FILE_SIZE]: content.length,
          [FILE_METADATA_KEYS.CONTENT_TYPE]: row.contentType,
          [FILE_METADATA_KEYS.UPLOAD_ATTEMPTS]: attempts,
        },
      }),
    );
    return toResult(completed, "completed", null, null);
  }

  private async fail(row: DocumentFile, err: unknown): Promise<FileAcceptResult> {
    const message = errorMessage(err);
    const failed = await this.uow.transaction((repos) =>
      transitionFile(repos.files, row.id, "failed", {
        errorMessage: message,
        metadata: {
          [FILE_METADATA_KEYS.UPLOAD_ERROR]: message,
          [FILE_METADATA_KEYS.ERROR_TIME]: this.clock().toISOString(),
        },
      }),
    );
    return toResult(failed, "failed", null, message);
  }
}

function toResult(
  row: DocumentFile,
  status: FileAcceptResult["status"],
  taskId: string | null,
  error: string | null,
): FileAcceptResult {
  return {
    fileId: row.id,
    storageKey: row.storageKey,
    originalName: row.originalName,
    status,
    taskId,
    error,
  };
}

function validateFile(file: IncomingFile): FileTypeRule {
  const rule = ruleForName(file.originalName);
  if (!rule) {
    throw new ValidationError(`File type not allowed: ${file.originalName}`, {
      [file.originalName]: "unsupported extension",
    });
  }
  if (file.content.length === 0) {
    throw new ValidationError(`File is empty: ${file.originalName}`, { [file.originalName]: "empty" });
  }
  if (file.content.length > rule.maxBytes) {
    throw new ValidationError(
      `File exceeds the ${String(rule.maxBytes / MB)}MB limit for ${rule.extension}: ${file.originalName}`,
      { [file.originalName]: "too large" },
    );
  }
  return rule;
}

/** All or nothing: the first invalid file rejects the batch. */
function validateBatch(files: readonly IncomingFile[]): AcceptedFile[] {
  if (files.length === 0) throw new ValidationError("No files provided", { files: "empty" });
  return files.map((file) => ({ file, rule: validateFile(file) }));
}

function dedupeByName(files: readonly AcceptedFile[]): AcceptedFile[] {
  const seen = new Set<string>();
  return files.filter(({ file }) => {
    if (seen.has(file.originalName)) return false;
    seen.add(file.originalName);
    return true;
  });
}
