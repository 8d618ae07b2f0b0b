import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and returns the result", async () => {
    const logger = { warn: vi.fn() };
    const breaker = createCircuitBreaker(
      "vector-delete",
      async (ids: string[]) => ids.length,
      logger,
    );

    await expect(breaker.fire(["a", "b"])).resolves.toBe(2);
    breaker.shutdown();
  });

  it("opens after failures and logs the transition", async () => {
    const logger = { warn: vi.fn() };
    const breaker = createCircuitBreaker(
      "vector-delete",
      async (_ids: string[]): Promise<void> => {
        throw new Error("index unavailable");
      },
      logger,
      { errorThresholdPercentage: 1, resetTimeout: 60_000 },
    );

    await expect(breaker.fire(["a"])).rejects.toThrow("index unavailable");

    expect(breaker.opened).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      { breaker: "vector-delete" },
      "circuit opened, calls will be short-circuited",
    );
    await expect(breaker.fire(["a"])).rejects.toThrow("Breaker is open");
    breaker.shutdown();
  });
});
