import type { UnitOfWork } from "@docboard/db";
import { errorMessage } from "@docboard/errors";
import { createChildLogger, type Logger } from "@docboard/logger";
import type { TaskHandler } from "@docboard/queue";
import { DOCUMENT_METADATA_KEYS } from "@docboard/types";
import type { ChunkLifecycleManager } from "../chunk-lifecycle.js";
import { systemClock, type Clock } from "../metadata.js";
import { stampDocument } from "../records.js";
import { runTransaction } from "../transaction.js";

export interface DeleteVectorsTaskDeps {
  uow: UnitOfWork;
  lifecycle: ChunkLifecycleManager;
  logger: Logger;
  clock?: Clock;
}

export function createDeleteVectorsTask(deps: DeleteVectorsTaskDeps): TaskHandler<"delete-vectors"> {
  const log = createChildLogger(deps.logger, { component: "delete-vectors-task" });
  const clock = deps.clock ?? systemClock;

  return async ({ documentId, requestedBy }, ctx) => {
    await ctx.throwIfRevoked();
    try {
      const deletedChunks = await runTransaction(deps.uow, async (scope) => {
        const count = await deps.lifecycle.deleteChunksForDocument(documentId, scope);
        await stampDocument(
          scope.repos.documents,
          documentId,
          {
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_AT]: clock().toISOString(),
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_BY]: requestedBy,
            [DOCUMENT_METADATA_KEYS.VECTOR_DELETED_BY_TASK]: ctx.taskId,
          },
          { vectorized: false },
        );
        return count;
      });
      log.info({ documentId, deletedChunks }, "Document vectors deleted");
      return { documentId, deletedChunks };
    } catch (err) {
      log.error({ err, documentId }, "Vector deletion failed");
      try {
        await stampDocument(deps.uow.repos.documents, documentId, {
          [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_ERROR]: errorMessage(err),
          [DOCUMENT_METADATA_KEYS.ERROR_TIME]: clock().toISOString(),
        });
      } catch (stampErr) {
        log.error({ err: stampErr, documentId }, "Could not record vector deletion failure");
      }
      throw err;
    }
  };
}
