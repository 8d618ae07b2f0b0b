/**
 * Recognised metadata keys.
 *
 * Documents, files and chunks keep a free-form JSON map, but consumers read
 * specific keys by convention. Every key the pipeline writes is listed here;
 * code and tests refer to keys through these constants only.
 */

export const DOCUMENT_METADATA_KEYS = {
  /** Admin id that approved the document. */
  APPROVED_BY: "approved_by",
  /** ISO timestamp of the approval. */
  APPROVED_AT: "approved_at",
  /** True when the approval came from a batch call. */
  BATCH_APPROVAL: "batch_approval",
  REJECT_REASON: "reject_reason",
  REJECTED_BY: "rejected_by",
  REJECTED_AT: "rejected_at",
  BATCH_REJECTION: "batch_rejection",

  VECTORIZE_REQUESTED_BY: "vectorize_requested_by",
  VECTORIZE_REQUESTED_AT: "vectorize_requested_at",
  /** True when every completed file is chunked, false for summary-only runs. */
  FULL_VECTORIZE: "full_vectorize",
  /** True when the validity-window check was skipped. */
  FORCE_VECTORIZE: "force_vectorize",
  VECTORIZE_TASK_ID: "vectorize_task_id",
  VECTORIZE_STARTED_AT: "vectorize_started_at",
  VECTORIZE_COMPLETED_AT: "vectorize_completed_at",
  SUMMARY_VECTORIZED: "summary_vectorized",
  /** Number of chunks written by the last successful pass. */
  CHUNK_COUNT: "chunk_count",
  /** File ids whose extraction failed during the last pass. */
  VECTORIZE_FAILED_FILES: "vectorize_failed_files",
  VECTORIZE_ERROR: "vectorize_error",

  VECTOR_DELETE_REQUESTED_BY: "vector_delete_requested_by",
  VECTOR_DELETE_REQUESTED_AT: "vector_delete_requested_at",
  VECTOR_DELETE_TASK_ID: "vector_delete_task_id",
  VECTOR_DELETED_AT: "vector_deleted_at",
  /** Actor that cleared the chunks: an admin id or "system". */
  VECTOR_DELETED_BY: "vector_deleted_by",
  VECTOR_DELETED_BY_TASK: "vector_deleted_by_task",
  VECTOR_DELETED_REASON: "vector_deleted_reason",
  /** Last failure to delete vectors from the remote index. */
  VECTOR_DELETE_ERROR: "vector_delete_error",

  ERROR_TIME: "error_time",
} as const;

export const FILE_METADATA_KEYS = {
  /** "async" for deferred uploads, "sync" for inline ones. */
  UPLOAD_TYPE: "upload_type",
  UPLOADED_BY: "uploaded_by",
  /** Id of the deferred upload task that owns the row. */
  TASK_ID: "task_id",
  UPLOAD_TASK_ID: "upload_task_id",
  UPLOAD_COMPLETED_AT: "upload_completed_at",
  UPLOAD_ATTEMPTS: "upload_attempts",
  VALIDATION_ATTEMPTS: "validation_attempts",
  UPLOAD_VALIDATION_SUCCESS: "upload_validation_success",
  FILE_SIZE: "file_size",
  CONTENT_TYPE: "content_type",
  UPLOAD_ERROR: "upload_error",
  ERROR_TIME: "error_time",

  REUPLOADED_BY: "reuploaded_by",
  REUPLOADED_AT: "reuploaded_at",
  /** Error message the file carried before it was re-uploaded. */
  ORIGINAL_ERROR: "original_error",
  REUPLOAD_TASK_ID: "reupload_task_id",

  /** Set when the upload task was revoked before it could finish. */
  REVOKED_AT: "revoked_at",

  /** Set when a completed file was found missing from the object store. */
  STORAGE_MISSING_AT: "storage_missing_at",
} as const;

/** Point-in-time snapshot written on every chunk. Allowed to go stale. */
export const CHUNK_METADATA_KEYS = {
  FILE_ID: "file_id",
  FILE_NAME: "file_name",
  FILE_TYPE: "file_type",
  CHUNK_INDEX: "chunk_index",
  TOTAL_CHUNKS: "total_chunks",
  DOCUMENT_TITLE: "document_title",
  DOCUMENT_TAGS: "document_tags",
  CREATED_AT: "created_at",
  DOCUMENT_CREATED_AT: "document_created_at",
  DOCUMENT_START_DATE: "document_start_date",
  DOCUMENT_END_DATE: "document_end_date",
  IS_SUMMARY: "is_summary",
} as const;

export type DocumentMetadataKey = (typeof DOCUMENT_METADATA_KEYS)[keyof typeof DOCUMENT_METADATA_KEYS];
export type FileMetadataKey = (typeof FILE_METADATA_KEYS)[keyof typeof FILE_METADATA_KEYS];
export type ChunkMetadataKey = (typeof CHUNK_METADATA_KEYS)[keyof typeof CHUNK_METADATA_KEYS];
