export type { StorageBackend, ObjectStat, ObjectBody } from "./backend.js";
export { S3Backend } from "./s3-backend.js";
export type { S3BackendOptions } from "./s3-backend.js";
export { MemoryBackend } from "./memory-backend.js";
export type { MemoryBackendOptions } from "./memory-backend.js";
export { ObjectStore } from "./object-store.js";
export type {
  ObjectStoreOptions,
  ObjectStream,
  DeleteManyResult,
  StatRetryPolicy,
} from "./object-store.js";
export { readInChunks, DEFAULT_READ_CHUNK_SIZE } from "./chunked-reader.js";
export { toExternalUrl } from "./external-url.js";
export type { ExternalUrlOptions } from "./external-url.js";
