import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { TaskKind, TaskRequest } from "@docboard/types";

export const QUEUE_NAMES = {
  UPLOAD: "docboard:upload",
  VECTORIZE: "docboard:vectorize",
  DELETE_VECTORS: "docboard:delete-vectors",
  MAINTENANCE: "docboard:maintenance",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const QUEUE_FOR_KIND: Record<TaskKind, QueueName> = {
  upload: QUEUE_NAMES.UPLOAD,
  vectorize: QUEUE_NAMES.VECTORIZE,
  "delete-vectors": QUEUE_NAMES.DELETE_VECTORS,
  "reconcile-expired": QUEUE_NAMES.MAINTENANCE,
};

export const DEFAULT_TASK_ATTEMPTS = 3;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: DEFAULT_TASK_ATTEMPTS,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const uploadQueue = new Queue<TaskRequest>(QUEUE_NAMES.UPLOAD, defaultOpts);

  const vectorizeQueue = new Queue<TaskRequest>(QUEUE_NAMES.VECTORIZE, defaultOpts);

  const deleteVectorsQueue = new Queue<TaskRequest>(QUEUE_NAMES.DELETE_VECTORS, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      priority: 1, // High priority for deletes
    },
  });

  const maintenanceQueue = new Queue<TaskRequest>(QUEUE_NAMES.MAINTENANCE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1,
    },
  });

  return { uploadQueue, vectorizeQueue, deleteVectorsQueue, maintenanceQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export function queueForKind(queues: Queues, kind: TaskKind): Queue<TaskRequest> {
  switch (QUEUE_FOR_KIND[kind]) {
    case QUEUE_NAMES.UPLOAD:
      return queues.uploadQueue;
    case QUEUE_NAMES.VECTORIZE:
      return queues.vectorizeQueue;
    case QUEUE_NAMES.DELETE_VECTORS:
      return queues.deleteVectorsQueue;
    case QUEUE_NAMES.MAINTENANCE:
      return queues.maintenanceQueue;
  }
}
