import { describe, expect, it, vi } from "vitest";
import {
  createRetryPolicy,
  exponentialBackoff,
  RetryExhaustedError,
  withRetry,
} from "../src/retry";

describe("withRetry", () => {
  it("should return the first successful result", async () => {
    const fn = vi.fn().mockResolvedValue("done");
    const sleep = vi.fn().mockResolvedValue(undefined);

    const value = await withRetry(fn, createRetryPolicy(3, 100), { sleep });

    expect(value).toBe("done");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("should back off between attempts", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("one"))
      .mockRejectedValueOnce(new Error("two"))
      .mockResolvedValue("third time");
    const sleep = vi.fn().mockResolvedValue(undefined);
    const onRetry = vi.fn();

    const value = await withRetry(fn, createRetryPolicy(3, 100), { sleep, onRetry });

    expect(value).toBe("third time");
    expect(fn.mock.calls).toEqual([[1], [2], [3]]);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[1][0]).toBe(2);
    expect(onRetry.mock.calls[1][1]).toBe(200);
  });

  it("should give up after the last attempt without sleeping again", async () => {
    const cause = new Error("still down");
    const fn = vi.fn().mockRejectedValue(cause);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const failure = await withRetry(fn, createRetryPolicy(2, 50), { sleep }).catch(
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(RetryExhaustedError);
    if (failure instanceof RetryExhaustedError) {
      expect(failure.message).toBe("Gave up after 2 attempt(s): still down");
      expect(failure.attempts).toBe(2);
      expect(failure.lastError).toBe(cause);
    }
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

describe("retry policies", () => {
  it("should double the delay each retry", () => {
    const backoff = exponentialBackoff(500);
    expect([1, 2, 3, 4].map(backoff)).toEqual([500, 1000, 2000, 4000]);
  });

  it("should always allow at least one attempt", () => {
    expect(createRetryPolicy(0, 100).maxAttempts).toBe(1);
    expect(createRetryPolicy(2.7, 100).maxAttempts).toBe(2);
  });
});
