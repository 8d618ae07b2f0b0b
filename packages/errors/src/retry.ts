import { AppError } from "./app-error.js";

export interface RetryOptions {
  /** Total attempts including the first one. Default: 3 */
  maxAttempts?: number;
  /** Fixed delay in milliseconds between attempts. Default: 1000 */
  delayMs?: number;
  /** Decides whether a failure is worth another attempt. Default: {@link isTransientError} */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before sleeping ahead of the next attempt. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Client errors (4xx) are permanent; server errors and anything that is not an
 * AppError (network failures, SDK errors) are transient.
 */
export function isTransientError(error: unknown): boolean {
  if (AppError.isAppError(error)) {
    return !error.isClientError;
  }
  return true;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` until it succeeds or the attempts run out, waiting a fixed delay in
 * between. `fn` receives the 1-based attempt number. The last error is rethrown.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, options?.maxAttempts ?? 3);
  const delayMs = options?.delayMs ?? 1_000;
  const shouldRetry = options?.shouldRetry ?? isTransientError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      options?.onRetry?.(error, attempt, delayMs);
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
