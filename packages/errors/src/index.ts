export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  ValidationError,
  NotFoundError,
  ConflictError,
  InvalidTransitionError,
  ExtractionError,
  IntegrityError,
  ExternalServiceError,
  StorageError,
  TaskRevokedError,
} from "./errors.js";

export { createCircuitBreaker } from "./circuit-breaker.js";
export type { CircuitBreakerOptions } from "./circuit-breaker.js";

export { withRetry, isTransientError } from "./retry.js";
export type { RetryOptions } from "./retry.js";
