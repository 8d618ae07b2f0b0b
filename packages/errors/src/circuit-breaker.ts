import CircuitBreaker from "opossum";
import type { Logger } from "@docboard/logger";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed. Default: 10000 */
  timeout?: number;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  rollingCountTimeout?: number;
  rollingCountBuckets?: number;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 10_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

export function createCircuitBreaker<TArgs extends unknown[], TResult>(
  name: string,
  fn: (...args: TArgs) => Promise<TResult>,
  logger: Pick<Logger, "warn">,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TArgs, TResult> {
  const breaker = new CircuitBreaker(fn, { ...DEFAULT_OPTIONS, ...options, name });

  breaker.on("open", () => {
    logger.warn({ breaker: name }, "circuit opened, calls will be short-circuited");
  });

  breaker.on("halfOpen", () => {
    logger.warn({ breaker: name }, "circuit half-open, next call is a probe");
  });

  breaker.on("close", () => {
    logger.warn({ breaker: name }, "circuit closed");
  });

  return breaker;
}
