/**
 * Tests for the backoff schedule and transient retries.
 */

import { describe, it, expect, vi } from "vitest";
import type { Mock } from "vitest";
import { backoffDelay, DEFAULT_RETRY_CONFIG, retryTransient } from "../src/retry.js";
import type { RetryConfig, SleepFn } from "../src/retry.js";

const CONFIG: RetryConfig = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 };

class Flaky extends Error {
  constructor(readonly transient: boolean) {
    super(transient ? "HTTP 503" : "HTTP 401");
  }
}

const isTransient = (err: unknown): boolean => err instanceof Flaky && err.transient;

function noSleep(): Mock<SleepFn> {
  return vi.fn<SleepFn>().mockResolvedValue(undefined);
}

describe("backoffDelay", () => {
  it("doubles from the base up to the cap", () => {
    const config = { ...DEFAULT_RETRY_CONFIG, jitterMs: 0 };

    expect([0, 1, 2, 3, 4, 5].map((retry) => backoffDelay(retry, config))).toEqual([
      1000, 2000, 4000, 8000, 16000, 30000,
    ]);
  });

  it("adds jitter from the random source", () => {
    expect(backoffDelay(0, DEFAULT_RETRY_CONFIG, () => 0.5)).toBe(1100);
  });

  it("never exceeds the cap, jitter included", () => {
    expect(backoffDelay(10, DEFAULT_RETRY_CONFIG, () => 0.99)).toBe(30000);
  });
});

describe("retryTransient", () => {
  it("returns the first success", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Flaky(true)).mockResolvedValue("ok");
    const sleepFn = noSleep();

    expect(await retryTransient(fn, { config: CONFIG, isTransient, sleepFn })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleepFn.mock.calls).toEqual([[100]]);
  });

  it("rethrows the last transient failure once attempts run out", async () => {
    const last = new Flaky(true);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Flaky(true))
      .mockRejectedValueOnce(new Flaky(true))
      .mockRejectedValueOnce(last);
    const sleepFn = noSleep();

    await expect(retryTransient(fn, { config: CONFIG, isTransient, sleepFn })).rejects.toBe(last);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls).toEqual([[100], [200]]);
  });

  it("rethrows other failures without retrying", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Flaky(false));
    const sleepFn = noSleep();

    await expect(retryTransient(fn, { config: CONFIG, isTransient, sleepFn })).rejects.toThrow("HTTP 401");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("reports each retry", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Flaky(true)).mockResolvedValue("ok");
    const onRetry = vi.fn();

    await retryTransient(fn, { config: CONFIG, isTransient, sleepFn: noSleep(), onRetry });

    expect(onRetry).toHaveBeenCalledWith(expect.any(Flaky), 0, 100);
  });
});
