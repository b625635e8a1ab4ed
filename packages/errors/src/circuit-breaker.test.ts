import { describe, it, expect, vi } from "vitest";
import { createCircuitBreaker, isOpenCircuitError } from "./circuit-breaker.js";

describe("createCircuitBreaker", () => {
  it("passes arguments through and returns the result", async () => {
    const fn = vi.fn(async (a: number, b: number) => a + b);
    const breaker = createCircuitBreaker("adder", fn, { timeout: false }, vi.fn());

    await expect(breaker.fire(2, 3)).resolves.toBe(5);
    expect(fn).toHaveBeenCalledWith(2, 3);

    breaker.shutdown();
  });

  it("opens after failures and short-circuits further calls", async () => {
    const onStateChange = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const breaker = createCircuitBreaker(
      "ollama",
      fn,
      { timeout: false, errorThresholdPercentage: 1, resetTimeout: 60_000 },
      onStateChange,
    );

    await expect(breaker.fire()).rejects.toThrow("connect ECONNREFUSED");
    expect(breaker.opened).toBe(true);
    expect(onStateChange).toHaveBeenCalledWith("ollama", "open");

    const openError: unknown = await breaker.fire().catch((err: unknown) => err);
    expect(isOpenCircuitError(openError)).toBe(true);
    expect(fn).toHaveBeenCalledOnce();

    breaker.shutdown();
  });
});

describe("isOpenCircuitError", () => {
  it("ignores other errors", () => {
    expect(isOpenCircuitError(new Error("boom"))).toBe(false);
    expect(isOpenCircuitError("EOPENBREAKER")).toBe(false);
  });
});
