export { UploadCoordinator } from "./upload-coordinator.js";
export type { UploadCoordinatorOptions, AcceptBatchOptions } from "./upload-coordinator.js";

export { DocumentService, STORAGE_MISSING_MESSAGE } from "./document-service.js";
export type { DocumentServiceOptions, VectorizeRequest, DownloadLink } from "./document-service.js";

export {
  ChunkLifecycleManager,
  EMBEDDING_MODEL,
  EMBEDDING_VERSION,
  EXPIRED_REASON,
} from "./chunk-lifecycle.js";
export type { ChunkLifecycleOptions } from "./chunk-lifecycle.js";

export {
  createTaskHandlers,
  createUploadTask,
  createVectorizeTask,
  createDeleteVectorsTask,
  createReconcileTask,
} from "./tasks/index.js";
export type {
  TaskDependencies,
  UploadTaskDeps,
  VectorizeTaskDeps,
  DeleteVectorsTaskDeps,
  TextSource,
} from "./tasks/index.js";

export { StagingArea } from "./staging.js";
export { runTransaction } from "./transaction.js";
export type { TransactionScope, AfterCommit } from "./transaction.js";
export { canTransition, assertTransition } from "./file-status.js";
export { FILE_TYPE_RULES, extensionOf, ruleForName, contentTypeFor } from "./file-types.js";
export type { FileTypeRule } from "./file-types.js";
export { systemClock } from "./metadata.js";
export type { Clock } from "./metadata.js";
