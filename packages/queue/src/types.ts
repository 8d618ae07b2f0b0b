import type {
  TaskInfo,
  TaskKind,
  TaskPayloads,
  TaskRequest,
  TaskResults,
  TaskStatus,
} from "@docboard/types";

/** What a running task knows about its own execution. */
export interface TaskContext {
  taskId: string;
  /** 1-based. */
  attempt: number;
  /** No queue-level retry follows a failure of this attempt. */
  isFinalAttempt: boolean;
  /** Throws TaskRevokedError once the task has been revoked. */
  throwIfRevoked(): Promise<void>;
}

export type TaskHandler<K extends TaskKind> = (
  data: TaskPayloads[K],
  ctx: TaskContext,
) => Promise<TaskResults[K]>;

export type TaskHandlers = { [K in TaskKind]: TaskHandler<K> };

/** Submission port. Returns the task id, pre-assigned or generated. */
export interface TaskEnqueuer {
  enqueue(request: TaskRequest): Promise<string>;
}

export interface TaskInspector {
  /** Null for an id the runner has never seen. */
  getStatus(taskId: string): Promise<TaskInfo | null>;
  /**
   * Finished tasks report their status unchanged; anything else is marked
   * revoked and reports REVOKED.
   */
  revoke(taskId: string): Promise<TaskStatus>;
  /** The submission behind a task id, or null once the runner has dropped it. */
  requestOf(taskId: string): Promise<TaskRequest | null>;
}

export interface TaskQueue extends TaskEnqueuer, TaskInspector {
  close(): Promise<void>;
}
