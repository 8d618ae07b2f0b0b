import { randomUUID } from "node:crypto";
import type { Job, Queue } from "bullmq";
import type { Logger } from "@docboard/logger";
import type { TaskInfo, TaskRequest, TaskStatus } from "@docboard/types";
import { queueForKind, type Queues } from "./queues.js";
import { RedisRevocationStore } from "./revocation-store.js";
import { isFinishedStatus, mapJobState } from "./status.js";
import type { TaskQueue } from "./types.js";

const REMOVABLE_STATES = new Set(["waiting", "delayed", "prioritized", "waiting-children"]);

export interface BullmqTaskQueueOptions {
  queues: Queues;
  logger: Logger;
  /** How long a revocation is remembered. Default: 7 days */
  revocationTtlSeconds?: number;
}

/**
 * Task runner boundary on BullMQ. Job ids are task ids; revocations live in
 * expiring Redis keys shared by every producer and worker.
 */
export class BullmqTaskQueue implements TaskQueue {
  private readonly queues: Queues;
  private readonly logger: Logger;
  private readonly revocations: RedisRevocationStore;

  constructor(options: BullmqTaskQueueOptions) {
    this.queues = options.queues;
    this.logger = options.logger;
    this.revocations = new RedisRevocationStore(
      () => this.queues.uploadQueue.client,
      options.revocationTtlSeconds,
    );
  }

  async enqueue(request: TaskRequest): Promise<string> {
    const taskId = request.taskId ?? randomUUID();
    const queue = queueForKind(this.queues, request.kind);

    try {
      await queue.add(request.kind, { ...request, taskId }, { jobId: taskId });
    } catch (err) {
      this.logger.error({ err, taskId, kind: request.kind }, "Failed to enqueue task");
      throw err;
    }

    this.logger.debug({ taskId, kind: request.kind, queue: queue.name }, "Task enqueued");
    return taskId;
  }

  /** Repeating task keyed by kind, so restarts do not stack schedules. */
  async schedule(request: TaskRequest, everyMs: number): Promise<void> {
    const queue = queueForKind(this.queues, request.kind);
    await queue.add(request.kind, request, {
      repeat: { every: everyMs },
      jobId: `repeat:${request.kind}`,
    });
    this.logger.info({ kind: request.kind, everyMs }, "Repeating task scheduled");
  }

  async getStatus(taskId: string): Promise<TaskInfo | null> {
    const revoked = await this.isRevoked(taskId);
    const job = await this.findJob(taskId);

    if (!job) {
      return revoked
        ? { taskId, kind: null, status: "REVOKED", result: null, error: `Task ${taskId} was revoked` }
        : null;
    }

    const status = mapJobState(await job.getState(), revoked);
    return {
      taskId,
      kind: job.data.kind,
      status,
      result: status === "SUCCESS" ? (job.returnvalue ?? null) : null,
      error: status === "FAILURE" || status === "REVOKED" ? (job.failedReason || null) : null,
    };
  }

  async revoke(taskId: string): Promise<TaskStatus> {
    const job = await this.findJob(taskId);
    const state = job ? await job.getState() : "unknown";
    const current = mapJobState(state, false);
    if (job && isFinishedStatus(current)) return current;

    await this.revocations.markRevoked(taskId);

    if (job && REMOVABLE_STATES.has(state)) {
      await job.remove();
      this.logger.info({ taskId }, "Queued task removed");
    } else {
      this.logger.info({ taskId, state }, "Task revoked");
    }

    return "REVOKED";
  }

  async requestOf(taskId: string): Promise<TaskRequest | null> {
    const job = await this.findJob(taskId);
    return job ? job.data : null;
  }

  async isRevoked(taskId: string): Promise<boolean> {
    return this.revocations.isRevoked(taskId);
  }

  async close(): Promise<void> {
    await Promise.all(Object.values(this.queues).map((queue: Queue<TaskRequest>) => queue.close()));
  }

  private async findJob(taskId: string): Promise<Job<TaskRequest> | null> {
    for (const queue of Object.values(this.queues)) {
      const job: Job<TaskRequest> | undefined = await queue.getJob(taskId);
      if (job) return job;
    }
    return null;
  }
}
