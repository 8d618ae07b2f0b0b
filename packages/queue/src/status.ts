import { AppError, TaskRevokedError } from "@docboard/errors";
import type { TaskStatus } from "@docboard/types";

/**
 * BullMQ job state to task status. A completed job stays SUCCESS even when a
 * revocation arrived too late to stop it.
 */
export function mapJobState(state: string, revoked: boolean): TaskStatus {
  if (state === "completed") return "SUCCESS";
  if (revoked) return "REVOKED";
  switch (state) {
    case "active":
      return "STARTED";
    case "failed":
      return "FAILURE";
    default:
      return "PENDING";
  }
}

export function isFinishedStatus(status: TaskStatus): boolean {
  return status === "SUCCESS" || status === "FAILURE";
}

/** Client errors and revocations fail the task for good; the rest may be retried. */
export function isRetryableTaskError(err: unknown): boolean {
  if (err instanceof TaskRevokedError) return false;
  if (AppError.isAppError(err)) return !err.isClientError;
  return true;
}
