import { describe, expect, it, vi } from "vitest";
import { backoffDelay, isNetworkError, withRetry } from "../../../src/connectors/core/retry.js";

const noWait = () => vi.fn(async (_ms: number) => undefined);

function statusError(status: number): Error & { status: number } {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("withRetry", () => {
  it("returns on first success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withRetry(fn);
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on failure then succeeds", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValue("ok");
    const result = await withRetry(fn, { baseDelayMs: 10 });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("throws after max retries", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    await expect(
      withRetry(fn, { maxRetries: 2, sleep: noWait() }),
    ).rejects.toThrow("ECONNRESET");
    expect(fn).toHaveBeenCalledTimes(3); // initial + 2 retries
  });

  it("does not retry non-retryable errors", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("bad input"));
    await expect(
      withRetry(fn, { maxRetries: 3, sleep: noWait() }),
    ).rejects.toThrow("bad input");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries 5xx errors by default", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(statusError(503))
      .mockResolvedValue("ok");
    await expect(withRetry(fn, { sleep: noWait() })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("respects custom retryOn", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(statusError(409))
      .mockResolvedValue("ok");
    const result = await withRetry(fn, {
      sleep: noWait(),
      retryOn: (err: unknown) => err instanceof Error && err.message === "HTTP 409",
    });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("passes the attempt index to fn", async () => {
    const fn = vi
      .fn(async (_attempt: number) => "ok")
      .mockRejectedValueOnce(new Error("ECONNRESET"));
    await withRetry(fn, { sleep: noWait() });
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
  });

  it("waits exponentially without jitter", async () => {
    const sleep = noWait();
    const fn = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    await expect(
      withRetry(fn, { maxRetries: 3, baseDelayMs: 100, jitter: 0, sleep }),
    ).rejects.toThrow("ECONNRESET");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200, 400]);
  });

  it("uses delayFor when it returns a value", async () => {
    const sleep = noWait();
    const onRetry = vi.fn();
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValue("ok");
    await withRetry(fn, { sleep, onRetry, delayFor: () => 2500 });
    expect(sleep).toHaveBeenCalledWith(2500);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 2500);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt and caps at maxDelayMs", () => {
    const opts = { baseDelayMs: 1000, maxDelayMs: 30_000, jitter: 0 };
    expect([0, 1, 2, 3, 4, 5].map((n) => backoffDelay(n, opts))).toEqual([
      1000, 2000, 4000, 8000, 16_000, 30_000,
    ]);
  });

  it("adds at most the jitter fraction", () => {
    const delay = backoffDelay(1, { baseDelayMs: 1000, jitter: 0.5 });
    expect(delay).toBeGreaterThanOrEqual(2000);
    expect(delay).toBeLessThanOrEqual(3000);
  });
});

describe("isNetworkError", () => {
  it("recognises socket failures", () => {
    expect(isNetworkError(new TypeError("fetch failed"))).toBe(true);
    expect(isNetworkError(new Error("connect ECONNREFUSED 127.0.0.1:443"))).toBe(true);
  });

  it("ignores other errors and non-errors", () => {
    expect(isNetworkError(new Error("validation failed"))).toBe(false);
    expect(isNetworkError("ECONNRESET")).toBe(false);
  });
});
