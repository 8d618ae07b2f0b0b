import { UnrecoverableError } from "bullmq";
import type { Job } from "bullmq";
import { TaskRevokedError, errorMessage } from "@docboard/errors";
import type { Logger } from "@docboard/logger";
import type { TaskRequest } from "@docboard/types";
import { dispatchTask } from "./dispatch.js";
import { isRetryableTaskError } from "./status.js";
import type { TaskContext, TaskHandlers } from "./types.js";

export interface RevocationCheck {
  isRevoked(taskId: string): Promise<boolean>;
}

export type ProcessableJob = Pick<Job<TaskRequest>, "id" | "data" | "attemptsMade" | "opts">;

/**
 * BullMQ processor for task jobs. Permanent failures are rethrown as
 * UnrecoverableError so BullMQ skips the remaining attempts.
 */
export function createJobProcessor(
  handlers: TaskHandlers,
  revocations: RevocationCheck,
  logger: Logger,
): (job: ProcessableJob) => Promise<unknown> {
  return async (job) => {
    const taskId = job.id ?? job.data.taskId;
    if (!taskId) throw new UnrecoverableError("Task job has no id");

    const attempt = job.attemptsMade + 1;
    const ctx: TaskContext = {
      taskId,
      attempt,
      isFinalAttempt: attempt >= (job.opts.attempts ?? 1),
      async throwIfRevoked() {
        if (await revocations.isRevoked(taskId)) throw new TaskRevokedError(taskId);
      },
    };
    const log = logger.child({ taskId, kind: job.data.kind, attempt });

    try {
      await ctx.throwIfRevoked();
      log.info("Task started");
      const result = await dispatchTask(handlers, job.data, ctx);
      log.info("Task succeeded");
      return result;
    } catch (err) {
      if (!isRetryableTaskError(err)) {
        log.warn({ err }, "Task failed permanently");
        throw new UnrecoverableError(errorMessage(err));
      }
      log.error({ err, final: ctx.isFinalAttempt }, "Task attempt failed");
      throw err;
    }
  };
}
