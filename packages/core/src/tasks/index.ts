import type { UnitOfWork } from "@docboard/db";
import type { Logger } from "@docboard/logger";
import { extractText } from "@docboard/parser";
import type { TaskHandlers } from "@docboard/queue";
import type { ObjectStore } from "@docboard/storage";
import type { ChunkOptions } from "@docboard/types";
import type { ChunkLifecycleManager } from "../chunk-lifecycle.js";
import type { Clock } from "../metadata.js";
import type { StagingArea } from "../staging.js";
import { createDeleteVectorsTask } from "./delete-vectors-task.js";
import { createReconcileTask } from "./reconcile-task.js";
import { createUploadTask, type UploadTaskDeps } from "./upload-task.js";
import { createVectorizeTask, type TextSource } from "./vectorize-task.js";

export interface TaskDependencies {
  uow: UnitOfWork;
  store: ObjectStore;
  staging: StagingArea;
  lifecycle: ChunkLifecycleManager;
  chunking: ChunkOptions;
  logger: Logger;
  /** Defaults to extraction through a temporary copy downloaded from `store`. */
  readText?: TextSource;
  /** Directory for extraction's temporary copies. Defaults to the OS temp dir. */
  tmpDir?: string;
  clock?: Clock;
  uploadRetry?: UploadTaskDeps["uploadRetry"];
  verifyRetry?: UploadTaskDeps["verifyRetry"];
}

/** Binds every task kind to its handler. */
export function createTaskHandlers(deps: TaskDependencies): TaskHandlers {
  const readText: TextSource =
    deps.readText ??
    ((file) =>
      extractText(file.storageKey, file.fileType, {
        downloader: deps.store,
        tmpDir: deps.tmpDir,
        logger: deps.logger,
      }));

  return {
    upload: createUploadTask(deps),
    vectorize: createVectorizeTask({ ...deps, readText }),
    "delete-vectors": createDeleteVectorsTask(deps),
    "reconcile-expired": createReconcileTask(deps.lifecycle, deps.clock),
  };
}

export { createUploadTask, createVectorizeTask, createDeleteVectorsTask, createReconcileTask };
export type { UploadTaskDeps, TextSource };
export type { VectorizeTaskDeps } from "./vectorize-task.js";
export type { DeleteVectorsTaskDeps } from "./delete-vectors-task.js";
