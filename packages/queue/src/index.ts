export { QUEUE_NAMES, QUEUE_FOR_KIND, DEFAULT_TASK_ATTEMPTS, createQueues, queueForKind } from "./queues.js";
export type { QueueConfig, QueueName, Queues } from "./queues.js";
export { parseRedisConnection } from "./connection.js";
export type {
  TaskContext,
  TaskHandler,
  TaskHandlers,
  TaskEnqueuer,
  TaskInspector,
  TaskQueue,
} from "./types.js";
export { mapJobState, isFinishedStatus, isRetryableTaskError } from "./status.js";
export { dispatchTask } from "./dispatch.js";
export { BullmqTaskQueue } from "./bullmq-task-queue.js";
export {
  RedisRevocationStore,
  REVOKED_KEY_PREFIX,
  DEFAULT_REVOCATION_TTL_SECONDS,
} from "./revocation-store.js";
export type { RevocationClient } from "./revocation-store.js";
export type { BullmqTaskQueueOptions } from "./bullmq-task-queue.js";
export { createJobProcessor } from "./job-processor.js";
export type { ProcessableJob, RevocationCheck } from "./job-processor.js";
export { InProcessTaskQueue } from "./in-process-task-queue.js";
export type { InProcessTaskQueueOptions } from "./in-process-task-queue.js";
