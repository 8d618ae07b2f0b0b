import { describe, expect, it, vi } from "vitest";
import { createSilentLogger } from "@docboard/logger";
import { QUEUE_NAMES, type ProcessableJob, type TaskHandlers } from "@docboard/queue";
import { concurrencyFor, createWorkers, type WorkerFactory } from "./workers.js";

function handlers(): TaskHandlers {
  return {
    upload: vi.fn(),
    vectorize: vi.fn(),
    "delete-vectors": vi.fn(),
    "reconcile-expired": vi.fn(async () => ({ documentsReconciled: 2 })),
  };
}

describe("createWorkers", () => {
  it("starts one worker per queue with maintenance kept serial", () => {
    const started: Array<[string, number]> = [];
    const factory: WorkerFactory = (queueName, _processor, concurrency) => {
      started.push([queueName, concurrency]);
      return { close: async () => undefined };
    };

    const workers = createWorkers({
      connection: {},
      handlers: handlers(),
      revocations: { isRevoked: async () => false },
      logger: createSilentLogger(),
      concurrency: 4,
      factory,
    });

    expect(workers).toHaveLength(4);
    expect(started).toEqual([
      [QUEUE_NAMES.UPLOAD, 4],
      [QUEUE_NAMES.VECTORIZE, 4],
      [QUEUE_NAMES.DELETE_VECTORS, 4],
      [QUEUE_NAMES.MAINTENANCE, 1],
    ]);
  });

  it("routes jobs through the shared processor", async () => {
    const processors: Array<(job: ProcessableJob) => Promise<unknown>> = [];
    const revoked = new Set(["task-revoked"]);
    const taskHandlers = handlers();

    createWorkers({
      connection: {},
      handlers: taskHandlers,
      revocations: { isRevoked: async (id) => revoked.has(id) },
      logger: createSilentLogger(),
      concurrency: 2,
      factory: (_queueName, processor) => {
        processors.push(processor);
        return { close: async () => undefined };
      },
    });
    const run = processors[3];
    if (!run) throw new Error("maintenance processor missing");

    const job = (id: string): ProcessableJob => ({
      id,
      data: { kind: "reconcile-expired", data: { requestedBy: "system" } },
      attemptsMade: 0,
      opts: { attempts: 1 },
    });

    await expect(run(job("task-1"))).resolves.toEqual({ documentsReconciled: 2 });
    await expect(run(job("task-revoked"))).rejects.toThrow("Task task-revoked was revoked");
    expect(taskHandlers["reconcile-expired"]).toHaveBeenCalledTimes(1);
  });
});

describe("concurrencyFor", () => {
  it("caps the maintenance queue at one", () => {
    expect(concurrencyFor(QUEUE_NAMES.MAINTENANCE, 8)).toBe(1);
    expect(concurrencyFor(QUEUE_NAMES.VECTORIZE, 8)).toBe(8);
  });
});
