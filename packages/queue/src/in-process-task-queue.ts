import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import { TaskRevokedError, errorMessage } from "@docboard/errors";
import { createSilentLogger, type Logger } from "@docboard/logger";
import type { TaskInfo, TaskRequest, TaskStatus } from "@docboard/types";
import { dispatchTask } from "./dispatch.js";
import { DEFAULT_TASK_ATTEMPTS } from "./queues.js";
import { isFinishedStatus, isRetryableTaskError } from "./status.js";
import type { TaskContext, TaskHandlers, TaskQueue } from "./types.js";

interface TaskRecord {
  taskId: string;
  request: TaskRequest;
  status: TaskStatus;
  result: unknown;
  error: string | null;
  attempts: number;
}

export interface InProcessTaskQueueOptions {
  handlers: TaskHandlers;
  concurrency?: number;
  maxAttempts?: number;
  /** Delay before a retry; 0 retries immediately. */
  retryDelayMs?: number;
  /** Start with the pool paused; tasks stay PENDING until `resume()`. */
  paused?: boolean;
  logger?: Logger;
}

/**
 * Runs tasks on a pool inside the current process, with the same status,
 * retry and revocation semantics as the BullMQ runner.
 */
export class InProcessTaskQueue implements TaskQueue {
  private readonly handlers: TaskHandlers;
  private readonly concurrency: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly records = new Map<string, TaskRecord>();
  private readonly revoked = new Set<string>();
  private readonly waiting: TaskRecord[] = [];
  private readonly running = new Set<Promise<void>>();
  private paused: boolean;

  constructor(options: InProcessTaskQueueOptions) {
    this.handlers = options.handlers;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_TASK_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.paused = options.paused ?? false;
    this.logger = options.logger ?? createSilentLogger();
  }

  async enqueue(request: TaskRequest): Promise<string> {
    const taskId = request.taskId ?? randomUUID();
    if (this.records.has(taskId)) return taskId;

    const record: TaskRecord = {
      taskId,
      request: { ...request, taskId },
      status: "PENDING",
      result: null,
      error: null,
      attempts: 0,
    };
    this.records.set(taskId, record);
    this.waiting.push(record);
    this.pump();
    return taskId;
  }

  async getStatus(taskId: string): Promise<TaskInfo | null> {
    const record = this.records.get(taskId);
    if (!record) {
      return this.revoked.has(taskId)
        ? { taskId, kind: null, status: "REVOKED", result: null, error: `Task ${taskId} was revoked` }
        : null;
    }

    const status: TaskStatus =
      record.status !== "SUCCESS" && this.revoked.has(taskId) ? "REVOKED" : record.status;
    return {
      taskId,
      kind: record.request.kind,
      status,
      result: status === "SUCCESS" ? record.result : null,
      error: status === "FAILURE" || status === "REVOKED" ? record.error : null,
    };
  }

  async revoke(taskId: string): Promise<TaskStatus> {
    const record = this.records.get(taskId);
    if (record && isFinishedStatus(record.status)) return record.status;

    this.revoked.add(taskId);
    if (record?.status === "PENDING") {
      const index = this.waiting.indexOf(record);
      if (index >= 0) this.waiting.splice(index, 1);
      record.status = "REVOKED";
      record.error = `Task ${taskId} was revoked`;
    }
    return "REVOKED";
  }

  async requestOf(taskId: string): Promise<TaskRequest | null> {
    return this.records.get(taskId)?.request ?? null;
  }

  /** Number of times the task's handler has been invoked. */
  attemptsOf(taskId: string): number {
    return this.records.get(taskId)?.attempts ?? 0;
  }

  resume(): void {
    this.paused = false;
    this.pump();
  }

  /** Resolves once nothing is waiting or running. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0 || (!this.paused && this.waiting.length > 0)) {
      await Promise.all(this.running);
    }
  }

  async close(): Promise<void> {
    this.paused = true;
    await this.whenIdle();
  }

  private pump(): void {
    while (!this.paused && this.running.size < this.concurrency) {
      const record = this.waiting.shift();
      if (!record) return;

      const run: Promise<void> = this.run(record)
        .catch((err: unknown) => {
          this.logger.error({ err, taskId: record.taskId }, "Task runner crashed");
        })
        .finally(() => {
          this.running.delete(run);
          this.pump();
        });
      this.running.add(run);
    }
  }

  private async run(record: TaskRecord): Promise<void> {
    const { taskId } = record;
    const log = this.logger.child({ taskId, kind: record.request.kind });
    record.status = "STARTED";

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const ctx: TaskContext = {
        taskId,
        attempt,
        isFinalAttempt: attempt === this.maxAttempts,
        throwIfRevoked: async () => {
          if (this.revoked.has(taskId)) throw new TaskRevokedError(taskId);
        },
      };

      try {
        await ctx.throwIfRevoked();
        record.attempts++;
        record.result = await dispatchTask(this.handlers, record.request, ctx);
        record.status = "SUCCESS";
        record.error = null;
        log.info({ attempt }, "Task succeeded");
        return;
      } catch (err) {
        record.error = errorMessage(err);
        if (err instanceof TaskRevokedError) {
          record.status = "REVOKED";
          log.info({ attempt }, "Task stopped after revocation");
          return;
        }
        if (!isRetryableTaskError(err) || ctx.isFinalAttempt) {
          record.status = "FAILURE";
          log.warn({ err, attempt }, "Task failed");
          return;
        }
        log.warn({ err, attempt }, "Task attempt failed, retrying");
        if (this.retryDelayMs > 0) await sleep(this.retryDelayMs);
      }
    }
  }
}
