import { describe, it, expect, vi } from "vitest";
import { isRetryableError, withRetry } from "../retry.js";

function httpError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("isRetryableError", () => {
  it.each([408, 429, 500, 503, 529])("retries status %i", (status) => {
    expect(isRetryableError(httpError(status))).toBe(true);
  });

  it.each([400, 401, 403, 404])("does not retry status %i", (status) => {
    expect(isRetryableError(httpError(status))).toBe(false);
  });

  it("retries failures without an HTTP status", () => {
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
  });
});

describe("withRetry", () => {
  it("returns the first successful result without retrying", async () => {
    const fn = vi.fn().mockResolvedValue("ok");

    await expect(withRetry(fn)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries retryable failures with exponential backoff", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValue("ok");
    const delays: number[] = [];

    const result = await withRetry(fn, {
      initialDelayMs: 1,
      backoffFactor: 3,
      onRetry: (_err, _attempt, delayMs) => delays.push(delayMs),
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1, 3]);
  });

  it("gives up after maxAttempts and rethrows the last error", async () => {
    const last = httpError(500);
    const fn = vi
      .fn()
      .mockRejectedValueOnce(httpError(502))
      .mockRejectedValueOnce(last);

    await expect(
      withRetry(fn, { maxAttempts: 2, initialDelayMs: 0 }),
    ).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    const fn = vi.fn().mockRejectedValue(httpError(401));

    await expect(withRetry(fn, { initialDelayMs: 0 })).rejects.toThrow(
      "HTTP 401",
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
