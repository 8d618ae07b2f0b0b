export type TaskKind = "upload" | "vectorize" | "delete-vectors" | "reconcile-expired";

/** Externally observable task states. The strings are compared verbatim by pollers. */
export type TaskStatus = "PENDING" | "STARTED" | "SUCCESS" | "FAILURE" | "REVOKED";

export const TASK_STATUSES = [
  "PENDING",
  "STARTED",
  "SUCCESS",
  "FAILURE",
  "REVOKED",
] as const satisfies readonly TaskStatus[];

export interface UploadTaskData {
  stagingPath: string;
  storageKey: string;
  documentId: string | null;
  fileId: string | null;
}

export type VectorizeMode = "full" | "summary";

export interface VectorizeTaskData {
  documentId: string;
  mode: VectorizeMode;
  requestedBy: string;
}

export interface DeleteVectorsTaskData {
  documentId: string;
  requestedBy: string;
}

export interface ReconcileExpiredTaskData {
  requestedBy: string;
}

export interface TaskPayloads {
  upload: UploadTaskData;
  vectorize: VectorizeTaskData;
  "delete-vectors": DeleteVectorsTaskData;
  "reconcile-expired": ReconcileExpiredTaskData;
}

export interface UploadTaskResult {
  status: "uploaded" | "skipped";
  storageKey: string;
  fileId: string | null;
  fileSize: number;
  uploadAttempts: number;
  validationAttempts: number;
}

export interface VectorizeTaskResult {
  documentId: string;
  mode: VectorizeMode;
  chunkCount: number;
  failedFiles: string[];
}

export interface DeleteVectorsTaskResult {
  documentId: string;
  deletedChunks: number;
}

export interface ReconcileExpiredTaskResult {
  documentsReconciled: number;
}

export interface TaskResults {
  upload: UploadTaskResult;
  vectorize: VectorizeTaskResult;
  "delete-vectors": DeleteVectorsTaskResult;
  "reconcile-expired": ReconcileExpiredTaskResult;
}

/** A task submission. The kind discriminates the payload. */
export type TaskRequest = {
  [K in TaskKind]: { kind: K; data: TaskPayloads[K]; taskId?: string };
}[TaskKind];

export interface TaskInfo {
  taskId: string;
  kind: TaskKind | null;
  status: TaskStatus;
  result: unknown;
  error: string | null;
}
