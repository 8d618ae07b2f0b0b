import type { TaskHandler } from "@docboard/queue";
import type { ChunkLifecycleManager } from "../chunk-lifecycle.js";
import { systemClock, type Clock } from "../metadata.js";

export function createReconcileTask(
  lifecycle: ChunkLifecycleManager,
  clock: Clock = systemClock,
): TaskHandler<"reconcile-expired"> {
  return async (_data, ctx) => {
    await ctx.throwIfRevoked();
    const documentsReconciled = await lifecycle.reconcileExpired(clock());
    return { documentsReconciled };
  };
}
