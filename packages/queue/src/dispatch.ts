import type { TaskRequest } from "@docboard/types";
import type { TaskContext, TaskHandlers } from "./types.js";

export function dispatchTask(
  handlers: TaskHandlers,
  request: TaskRequest,
  ctx: TaskContext,
): Promise<unknown> {
  switch (request.kind) {
    case "upload":
      return handlers.upload(request.data, ctx);
    case "vectorize":
      return handlers.vectorize(request.data, ctx);
    case "delete-vectors":
      return handlers["delete-vectors"](request.data, ctx);
    case "reconcile-expired":
      return handlers["reconcile-expired"](request.data, ctx);
  }
}
