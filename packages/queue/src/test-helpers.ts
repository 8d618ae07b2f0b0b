import type { TaskHandlers } from "./types.js";

/** Handlers that fail loudly unless overridden. */
export function stubHandlers(overrides: Partial<TaskHandlers> = {}): TaskHandlers {
  return {
    upload: async () => {
      throw new Error("unexpected upload task");
    },
    vectorize: async () => {
      throw new Error("unexpected vectorize task");
    },
    "delete-vectors": async () => {
      throw new Error("unexpected delete-vectors task");
    },
    "reconcile-expired": async () => {
      throw new Error("unexpected reconcile-expired task");
    },
    ...overrides,
  };
}

export interface Deferred {
  promise: Promise<void>;
  resolve(): void;
}

export function deferred(): Deferred {
  let settle: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: () => settle() };
}
