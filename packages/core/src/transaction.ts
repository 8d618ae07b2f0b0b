import type { Repositories, UnitOfWork } from "@docboard/db";

export type AfterCommit = () => Promise<void>;

/** Repositories bound to one open transaction, plus work deferred until it commits. */
export interface TransactionScope {
  repos: Repositories;
  afterCommit(task: AfterCommit): void;
}

/**
 * Runs `fn` in one unit of work and, once it has committed, the hooks it
 * registered, in order. A rollback discards the hooks. Hooks own their errors.
 */
export async function runTransaction<T>(
  uow: UnitOfWork,
  fn: (scope: TransactionScope) => Promise<T>,
): Promise<T> {
  const hooks: AfterCommit[] = [];
  const afterCommit = (task: AfterCommit): void => {
    hooks.push(task);
  };

  const result = await uow.transaction((repos) => fn({ repos, afterCommit }));
  for (const hook of hooks) await hook();
  return result;
}
