import { chunkTokens } from "@docboard/chunker";
import type { UnitOfWork } from "@docboard/db";
import { NotFoundError, TaskRevokedError, errorMessage } from "@docboard/errors";
import { createChildLogger, type Logger } from "@docboard/logger";
import type { TaskHandler } from "@docboard/queue";
import {
  DOCUMENT_METADATA_KEYS,
  type ChunkOptions,
  type DocumentFile,
  type VectorizeTaskResult,
} from "@docboard/types";
import type { ChunkLifecycleManager } from "../chunk-lifecycle.js";
import { systemClock, type Clock } from "../metadata.js";
import { stampDocument } from "../records.js";
import { runTransaction } from "../transaction.js";

/** Text of a stored file. Usually `extractText` bound to the object store. */
export type TextSource = (file: DocumentFile) => Promise<string>;

export interface VectorizeTaskDeps {
  uow: UnitOfWork;
  lifecycle: ChunkLifecycleManager;
  readText: TextSource;
  chunking: ChunkOptions;
  logger: Logger;
  clock?: Clock;
}

interface FileChunks {
  file: DocumentFile;
  texts: string[];
}

export function createVectorizeTask(deps: VectorizeTaskDeps): TaskHandler<"vectorize"> {
  const log = createChildLogger(deps.logger, { component: "vectorize-task" });
  const clock = deps.clock ?? systemClock;

  return async ({ documentId, mode }, ctx) => {
    const { documents, files } = deps.uow.repos;

    const document = await documents.findById(documentId);
    if (!document) throw new NotFoundError(`Document ${documentId} not found`);

    await stampDocument(documents, documentId, {
      [DOCUMENT_METADATA_KEYS.VECTORIZE_TASK_ID]: ctx.taskId,
      [DOCUMENT_METADATA_KEYS.VECTORIZE_STARTED_AT]: clock().toISOString(),
    });

    try {
      const fileChunks: FileChunks[] = [];
      const failedFiles: string[] = [];

      if (mode === "full") {
        const completed = (await files.listByDocument(documentId)).filter(
          (file) => file.processingStatus === "completed",
        );
        for (const file of completed) {
          await ctx.throwIfRevoked();
          let texts: string[];
          try {
            texts = chunkTokens(await deps.readText(file), deps.chunking);
          } catch (err) {
            if (err instanceof TaskRevokedError) throw err;
            log.warn({ err, documentId, fileId: file.id }, "Text extraction failed, file contributes no chunks");
            failedFiles.push(file.id);
            texts = [];
          }
          fileChunks.push({ file, texts });
        }
      }

      await ctx.throwIfRevoked();

      const chunkCount = await runTransaction(deps.uow, async (scope) => {
        const current = await scope.repos.documents.findById(documentId);
        if (!current) throw new NotFoundError(`Document ${documentId} not found`);

        await deps.lifecycle.deleteChunksForDocument(documentId, scope);

        let count = 0;
        if (mode === "full") {
          for (const { file, texts } of fileChunks) {
            count += (await deps.lifecycle.createChunksForFile(current, file, texts, scope)).length;
          }
        } else {
          count = (await deps.lifecycle.createChunksForSummary(current, scope)).length;
        }

        await stampDocument(
          scope.repos.documents,
          documentId,
          {
            [DOCUMENT_METADATA_KEYS.VECTORIZE_COMPLETED_AT]: clock().toISOString(),
            [DOCUMENT_METADATA_KEYS.CHUNK_COUNT]: count,
            [DOCUMENT_METADATA_KEYS.VECTORIZE_FAILED_FILES]: failedFiles,
            [DOCUMENT_METADATA_KEYS.SUMMARY_VECTORIZED]: mode === "summary",
          },
          { vectorized: count > 0 },
        );
        return count;
      });

      log.info({ documentId, mode, chunkCount, failedFiles: failedFiles.length }, "Document vectorized");
      const result: VectorizeTaskResult = { documentId, mode, chunkCount, failedFiles };
      return result;
    } catch (err) {
      log.error({ err, documentId, mode }, "Vectorization failed");
      try {
        await stampDocument(documents, documentId, {
          [DOCUMENT_METADATA_KEYS.VECTORIZE_ERROR]: errorMessage(err),
          [DOCUMENT_METADATA_KEYS.ERROR_TIME]: clock().toISOString(),
        });
      } catch (stampErr) {
        log.error({ err: stampErr, documentId }, "Could not record vectorization failure");
      }
      throw err;
    }
  };
}
