import { describe, it, expect, vi } from "vitest";
import { IntegrityError, ValidationError } from "@docboard/errors";
import type { TaskRequest } from "@docboard/types";
import { InProcessTaskQueue } from "./in-process-task-queue.js";
import type { TaskContext } from "./types.js";
import { deferred, stubHandlers } from "./test-helpers.js";

const reconcile: TaskRequest = { kind: "reconcile-expired", data: { requestedBy: "system" } };

describe("InProcessTaskQueue", () => {
  it("runs a task to SUCCESS and keeps its result", async () => {
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({ "reconcile-expired": async () => ({ documentsReconciled: 3 }) }),
    });

    const taskId = await queue.enqueue(reconcile);
    await queue.whenIdle();

    await expect(queue.getStatus(taskId)).resolves.toEqual({
      taskId,
      kind: "reconcile-expired",
      status: "SUCCESS",
      result: { documentsReconciled: 3 },
      error: null,
    });
  });

  it("uses a pre-assigned task id", async () => {
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({ "reconcile-expired": async () => ({ documentsReconciled: 0 }) }),
    });

    await expect(queue.enqueue({ ...reconcile, taskId: "fixed-id" })).resolves.toBe("fixed-id");
  });

  it("retries transient failures", async () => {
    const handler = vi
      .fn<(data: { requestedBy: string }, ctx: TaskContext) => Promise<{ documentsReconciled: number }>>()
      .mockRejectedValueOnce(new IntegrityError("size mismatch"))
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValue({ documentsReconciled: 1 });
    const queue = new InProcessTaskQueue({ handlers: stubHandlers({ "reconcile-expired": handler }) });

    const taskId = await queue.enqueue(reconcile);
    await queue.whenIdle();

    expect((await queue.getStatus(taskId))?.status).toBe("SUCCESS");
    expect(queue.attemptsOf(taskId)).toBe(3);
    expect(handler.mock.calls.map(([, ctx]) => ctx.isFinalAttempt)).toEqual([false, false, true]);
  });

  it("fails after the last attempt", async () => {
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({
        "reconcile-expired": async () => {
          throw new Error("still down");
        },
      }),
    });

    const taskId = await queue.enqueue(reconcile);
    await queue.whenIdle();

    await expect(queue.getStatus(taskId)).resolves.toMatchObject({
      status: "FAILURE",
      error: "still down",
      result: null,
    });
    expect(queue.attemptsOf(taskId)).toBe(3);
  });

  it("does not retry permanent failures", async () => {
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({
        "reconcile-expired": async () => {
          throw new ValidationError("bad input");
        },
      }),
    });

    const taskId = await queue.enqueue(reconcile);
    await queue.whenIdle();

    expect((await queue.getStatus(taskId))?.status).toBe("FAILURE");
    expect(queue.attemptsOf(taskId)).toBe(1);
  });

  it("reports PENDING while paused and drops a revoked queued task", async () => {
    const handler = vi.fn(async () => ({ documentsReconciled: 0 }));
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({ "reconcile-expired": handler }),
      paused: true,
    });

    const taskId = await queue.enqueue(reconcile);
    expect((await queue.getStatus(taskId))?.status).toBe("PENDING");

    await expect(queue.revoke(taskId)).resolves.toBe("REVOKED");
    queue.resume();
    await queue.whenIdle();

    expect((await queue.getStatus(taskId))?.status).toBe("REVOKED");
    expect(handler).not.toHaveBeenCalled();
  });

  it("stops a running task at its next revocation checkpoint", async () => {
    const started = deferred();
    const release = deferred();
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({
        "reconcile-expired": async (_data, ctx) => {
          started.resolve();
          await release.promise;
          await ctx.throwIfRevoked();
          return { documentsReconciled: 1 };
        },
      }),
    });

    const taskId = await queue.enqueue(reconcile);
    await started.promise;
    expect((await queue.getStatus(taskId))?.status).toBe("STARTED");

    await expect(queue.revoke(taskId)).resolves.toBe("REVOKED");
    release.resolve();
    await queue.whenIdle();

    await expect(queue.getStatus(taskId)).resolves.toMatchObject({
      status: "REVOKED",
      error: `Task ${taskId} was revoked`,
    });
    expect(queue.attemptsOf(taskId)).toBe(1);
  });

  it("leaves finished tasks unchanged on revoke", async () => {
    const queue = new InProcessTaskQueue({
      handlers: stubHandlers({ "reconcile-expired": async () => ({ documentsReconciled: 0 }) }),
    });

    const taskId = await queue.enqueue(reconcile);
    await queue.whenIdle();

    await expect(queue.revoke(taskId)).resolves.toBe("SUCCESS");
    expect((await queue.getStatus(taskId))?.status).toBe("SUCCESS");
  });

  it("knows nothing about unseen ids until they are revoked", async () => {
    const queue = new InProcessTaskQueue({ handlers: stubHandlers() });

    await expect(queue.getStatus("nope")).resolves.toBeNull();
    await expect(queue.revoke("nope")).resolves.toBe("REVOKED");
    await expect(queue.getStatus("nope")).resolves.toMatchObject({ kind: null, status: "REVOKED" });
  });

  it("returns the submission behind a task id", async () => {
    const queue = new InProcessTaskQueue({ handlers: stubHandlers(), paused: true });

    const taskId = await queue.enqueue(reconcile);

    await expect(queue.requestOf(taskId)).resolves.toEqual({ ...reconcile, taskId });
    await expect(queue.requestOf("nope")).resolves.toBeNull();
  });

  it("never runs more tasks at once than its concurrency", async () => {
    let active = 0;
    let peak = 0;
    const queue = new InProcessTaskQueue({
      concurrency: 2,
      handlers: stubHandlers({
        "reconcile-expired": async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return { documentsReconciled: 0 };
        },
      }),
    });

    await Promise.all(Array.from({ length: 5 }, () => queue.enqueue(reconcile)));
    await queue.whenIdle();

    expect(peak).toBe(2);
  });
});
