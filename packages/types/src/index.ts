export type { JsonPrimitive, JsonValue, MetadataMap } from "./json.js";
export { DOCUMENT_STATUSES } from "./document.js";
export type {
  Document,
  DocumentStatus,
  NewDocument,
  DocumentPatch,
  BatchResult,
} from "./document.js";
export type {
  DocumentFile,
  NewDocumentFile,
  DocumentFilePatch,
  FileProcessingStatus,
  FileType,
  IncomingFile,
  FileAcceptResult,
} from "./file.js";
export type { DocumentChunk, NewDocumentChunk, ChunkOptions } from "./chunk.js";
export { TASK_STATUSES } from "./job.js";
export type {
  TaskKind,
  TaskStatus,
  TaskPayloads,
  TaskResults,
  TaskRequest,
  TaskInfo,
  UploadTaskData,
  UploadTaskResult,
  VectorizeMode,
  VectorizeTaskData,
  VectorizeTaskResult,
  DeleteVectorsTaskData,
  DeleteVectorsTaskResult,
  ReconcileExpiredTaskData,
  ReconcileExpiredTaskResult,
} from "./job.js";
export {
  DOCUMENT_METADATA_KEYS,
  FILE_METADATA_KEYS,
  CHUNK_METADATA_KEYS,
} from "./metadata.js";
export type { DocumentMetadataKey, FileMetadataKey, ChunkMetadataKey } from "./metadata.js";
export type {
  AppConfig,
  DatabaseConfig,
  RedisConfig,
  StorageConfig,
  QdrantConfig,
  ChunkingConfig,
  WorkerConfig,
} from "./config.js";
