import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { Logger } from "@docboard/logger";
import {
  QUEUE_NAMES,
  createJobProcessor,
  type ProcessableJob,
  type QueueName,
  type RevocationCheck,
  type TaskHandlers,
} from "@docboard/queue";

export interface ClosableWorker {
  close(): Promise<void>;
}

export type WorkerFactory = (
  queueName: QueueName,
  processor: (job: ProcessableJob) => Promise<unknown>,
  concurrency: number,
) => ClosableWorker;

export interface CreateWorkersOptions {
  connection: ConnectionOptions;
  handlers: TaskHandlers;
  revocations: RevocationCheck;
  logger: Logger;
  concurrency: number;
  factory?: WorkerFactory;
}

/** Maintenance work is serial; the other queues share the configured concurrency. */
export function concurrencyFor(queueName: QueueName, concurrency: number): number {
  return queueName === QUEUE_NAMES.MAINTENANCE ? 1 : concurrency;
}

function bullmqFactory(connection: ConnectionOptions, logger: Logger): WorkerFactory {
  return (queueName, processor, concurrency) => {
    const worker = new Worker(queueName, processor, { connection, concurrency });
    worker.on("error", (err) => {
      logger.error({ err, queue: queueName }, "Worker error");
    });
    return worker;
  };
}

/** One worker per task queue, all running the same job processor. */
export function createWorkers(options: CreateWorkersOptions): ClosableWorker[] {
  const factory = options.factory ?? bullmqFactory(options.connection, options.logger);
  const processor = createJobProcessor(options.handlers, options.revocations, options.logger);

  return Object.values(QUEUE_NAMES).map((queueName) =>
    factory(queueName, processor, concurrencyFor(queueName, options.concurrency)),
  );
}
