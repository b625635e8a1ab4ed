import { describe, it, expect, vi, beforeEach } from "vitest";
import { withRetry, calculateDelay } from "./retry.js";
import { AppError } from "./app-error.js";
import { BackendUnavailableError, EmptyInputError } from "./errors.js";

describe("withRetry", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    // Suppress console.warn from retry logic
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    const result = await withRetry(fn);

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries on failure and returns on eventual success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("transient")).mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after maxRetries exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("persistent"));

    await expect(withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 })).rejects.toThrow(
      "persistent",
    );

    expect(fn).toHaveBeenCalledTimes(3); // 1 initial + 2 retries
  });

  it("does NOT retry 4xx AppErrors", async () => {
    const fn = vi.fn().mockRejectedValue(new EmptyInputError());

    await expect(withRetry(fn, { maxRetries: 3, baseDelayMs: 1 })).rejects.toThrow(
      "Input text must not be blank",
    );

    expect(fn).toHaveBeenCalledOnce();
  });

  it("retries BackendUnavailableError (503)", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new BackendUnavailableError("down", "ollama"))
      .mockResolvedValue("ok");

    const result = await withRetry(fn, { baseDelayMs: 1, maxDelayMs: 1 });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects retryableErrors filter", async () => {
    const fn = vi
      .fn()
      .mockRejectedValue(
        new AppError({ message: "Server error", statusCode: 502, code: "BAD_GATEWAY" }),
      );

    await expect(
      withRetry(fn, {
        maxRetries: 2,
        baseDelayMs: 1,
        retryableErrors: ["BACKEND_UNAVAILABLE"],
      }),
    ).rejects.toThrow("Server error");

    expect(fn).toHaveBeenCalledOnce();
  });

  it("reports each retry through onRetry instead of the console", async () => {
    const onRetry = vi.fn();
    const failure = new Error("ECONNREFUSED");
    const fn = vi.fn().mockRejectedValue(failure);

    await expect(
      withRetry(fn, { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1, onRetry }),
    ).rejects.toThrow("ECONNREFUSED");

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Number), failure);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(Number), failure);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error("aborted mid-call");
    });

    await expect(
      withRetry(fn, { maxRetries: 5, baseDelayMs: 1, signal: controller.signal }),
    ).rejects.toThrow("aborted mid-call");

    expect(fn).toHaveBeenCalledOnce();
  });
});

describe("calculateDelay", () => {
  it("stays between half and all of the capped exponential delay", () => {
    for (let attempt = 0; attempt < 6; attempt++) {
      const capped = Math.min(1_000, 100 * Math.pow(2, attempt));
      const delay = calculateDelay(attempt, 100, 1_000);
      expect(delay).toBeGreaterThanOrEqual(Math.floor(capped * 0.5));
      expect(delay).toBeLessThanOrEqual(capped);
    }
  });
});
