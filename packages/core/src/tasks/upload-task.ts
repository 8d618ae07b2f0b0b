import { createReadStream } from "node:fs";
import type { UnitOfWork } from "@docboard/db";
import { IntegrityError, ValidationError, errorMessage, withRetry, type RetryOptions } from "@docboard/errors";
import { createChildLogger, type Logger } from "@docboard/logger";
import { isRetryableTaskError, type TaskContext, type TaskHandler } from "@docboard/queue";
import type { ObjectStore } from "@docboard/storage";
import { FILE_METADATA_KEYS, type UploadTaskData, type UploadTaskResult } from "@docboard/types";
import { contentTypeFor } from "../file-types.js";
import { mergeMetadata, systemClock, type Clock } from "../metadata.js";
import { stampFile, transitionFile } from "../records.js";
import type { StagingArea } from "../staging.js";

type AttemptPolicy = Pick<RetryOptions, "maxAttempts" | "delayMs">;

export interface UploadTaskDeps {
  uow: UnitOfWork;
  store: ObjectStore;
  staging: StagingArea;
  logger: Logger;
  clock?: Clock;
  /** Default: 3 attempts, 2s apart. */
  uploadRetry?: AttemptPolicy;
  /** Default: 3 attempts, 1s apart. */
  verifyRetry?: AttemptPolicy;
}

/**
 * Moves a staged file into the object store, verifies the stored size and
 * completes the owning file row. Safe to re-run: a vanished row, or a
 * completed row whose object is already in place, is skipped.
 */
export function createUploadTask(deps: UploadTaskDeps): TaskHandler<"upload"> {
  const log = createChildLogger(deps.logger, { component: "upload-task" });
  const clock = deps.clock ?? systemClock;
  const uploadRetry: AttemptPolicy = { maxAttempts: 3, delayMs: 2_000, ...deps.uploadRetry };
  const verifyRetry: AttemptPolicy = { maxAttempts: 3, delayMs: 1_000, ...deps.verifyRetry };

  async function skipIfDone(data: UploadTaskData): Promise<UploadTaskResult | null> {
    const { fileId, storageKey, stagingPath } = data;
    if (fileId === null) return null;

    const file = await deps.uow.repos.files.findById(fileId);
    if (file && file.processingStatus !== "completed") return null;

    let fileSize = 0;
    if (file) {
      const stored = await deps.store.stat(storageKey, { maxAttempts: 1 });
      const expected = (await deps.staging.sizeOf(stagingPath)) ?? file.fileSize;
      if (stored?.size !== expected) return null;
      fileSize = expected;
      log.info({ fileId, storageKey }, "File already uploaded, skipping");
    } else {
      log.warn({ fileId, storageKey }, "File row no longer exists, skipping upload");
    }

    await deps.staging.remove(stagingPath);
    return { status: "skipped", storageKey, fileId, fileSize, uploadAttempts: 0, validationAttempts: 0 };
  }

  async function recordFailure(data: UploadTaskData, ctx: TaskContext, err: unknown, permanent: boolean): Promise<void> {
    const { fileId } = data;
    if (fileId !== null) {
      await deps.uow.transaction(async (repos) => {
        const file = await repos.files.findById(fileId);
        if (!file) return;
        const metadata = {
          [FILE_METADATA_KEYS.UPLOAD_ERROR]: errorMessage(err),
          [FILE_METADATA_KEYS.ERROR_TIME]: clock().toISOString(),
          [FILE_METADATA_KEYS.UPLOAD_TASK_ID]: ctx.taskId,
        };
        if (permanent && file.processingStatus === "processing") {
          await transitionFile(repos.files, fileId, "failed", { metadata, errorMessage: errorMessage(err) });
        } else {
          await stampFile(repos.files, fileId, metadata);
        }
      });
    }
    if (permanent) await deps.staging.remove(data.stagingPath);
  }

  return async (data, ctx) => {
    const { stagingPath, storageKey, fileId } = data;

    const skipped = await skipIfDone(data);
    if (skipped) return skipped;

    let uploadAttempts = 0;
    let validationAttempts = 0;

    try {
      const size = await deps.staging.sizeOf(stagingPath);
      if (size === null) {
        throw new ValidationError(`Staged file not found: ${stagingPath}`, { stagingPath: "missing" });
      }
      if (size === 0) {
        throw new ValidationError(`Staged file is empty: ${stagingPath}`, { stagingPath: "empty" });
      }
      const contentType = contentTypeFor(storageKey);

      await withRetry(
        async (attempt) => {
          uploadAttempts = attempt;
          await ctx.throwIfRevoked();
          const body = createReadStream(stagingPath);
          try {
            await deps.store.put(storageKey, body, size, contentType);
          } finally {
            body.destroy();
          }
        },
        {
          ...uploadRetry,
          onRetry: (err, attempt) => {
            log.warn({ err, storageKey, attempt }, "Upload attempt failed, retrying");
          },
        },
      );

      await withRetry(
        async (attempt) => {
          validationAttempts = attempt;
          const stored = await deps.store.stat(storageKey, { maxAttempts: 1 });
          if (stored?.size !== size) {
            throw new IntegrityError(
              `Stored size of ${storageKey} is ${String(stored?.size ?? 0)}, expected ${String(size)}`,
            );
          }
        },
        {
          ...verifyRetry,
          onRetry: (err, attempt) => {
            log.warn({ err, storageKey, attempt }, "Upload verification failed, retrying");
          },
        },
      );

      if (fileId !== null) {
        const metadata = {
          [FILE_METADATA_KEYS.UPLOAD_COMPLETED_AT]: clock().toISOString(),
          [FILE_METADATA_KEYS.UPLOAD_TASK_ID]: ctx.taskId,
          [FILE_METADATA_KEYS.FILE_SIZE]: size,
          [FILE_METADATA_KEYS.CONTENT_TYPE]: contentType,
          [FILE_METADATA_KEYS.UPLOAD_VALIDATION_SUCCESS]: true,
          [FILE_METADATA_KEYS.UPLOAD_ATTEMPTS]: uploadAttempts,
          [FILE_METADATA_KEYS.VALIDATION_ATTEMPTS]: validationAttempts,
        };
        await deps.uow.transaction(async (repos) => {
          const file = await repos.files.findById(fileId);
          if (!file) return;
          if (file.processingStatus === "completed") {
            await repos.files.update(fileId, {
              fileSize: size,
              contentType,
              metadata: mergeMetadata(file.metadata, metadata),
            });
          } else {
            await transitionFile(repos.files, fileId, "completed", {
              metadata,
              fileSize: size,
              contentType,
              errorMessage: null,
            });
          }
        });
      }

      await deps.staging.remove(stagingPath);
      log.info({ fileId, storageKey, size, uploadAttempts, validationAttempts }, "File uploaded");
      return { status: "uploaded", storageKey, fileId, fileSize: size, uploadAttempts, validationAttempts };
    } catch (err) {
      const permanent = !isRetryableTaskError(err) || ctx.isFinalAttempt;
      log.error({ err, fileId, storageKey, attempt: ctx.attempt, permanent }, "Upload task failed");
      try {
        await recordFailure(data, ctx, err, permanent);
      } catch (recordErr) {
        log.error({ err: recordErr, fileId }, "Could not record upload failure");
      }
      throw err;
    }
  };
}
