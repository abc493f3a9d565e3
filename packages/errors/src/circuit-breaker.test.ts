import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and resolves with the wrapped result", async () => {
    const breaker = createCircuitBreaker("adder", async (a: number, b: number) => a + b, {
      onStateChange: () => {},
    });

    await expect(breaker.fire(2, 3)).resolves.toBe(5);
    breaker.shutdown();
  });

  it("reports the open transition once failures cross the threshold", async () => {
    const onStateChange = vi.fn();
    const breaker = createCircuitBreaker(
      "flaky",
      async () => {
        throw new Error("down");
      },
      { errorThresholdPercentage: 1, onStateChange },
    );

    await expect(breaker.fire()).rejects.toThrow("down");

    expect(onStateChange).toHaveBeenCalledWith("flaky", "open");
    breaker.shutdown();
  });
});
