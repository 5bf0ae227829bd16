import { describe, expect, it, vi } from "vitest";

import {
  permanentFailure,
  retryDelayMs,
  success,
  transientFailure,
  withRetries,
  type RemoteResult,
} from "./retry.js";

function sequence<T>(...results: Array<RemoteResult<T>>): (attempt: number) => Promise<RemoteResult<T>> {
  return async (attempt) => {
    const result = results[attempt - 1] ?? results[results.length - 1];
    if (!result) throw new Error("empty sequence");
    return result;
  };
}

describe("withRetries", () => {
  it("returns the first success without sleeping", async () => {
    const sleep = vi.fn(async () => undefined);

    const result = await withRetries(sequence(success("ok")), { maxAttempts: 3, baseDelayMs: 100 }, { sleep });

    expect(result).toEqual({ status: "success", value: "ok", attempts: 1 });
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries transient failures with exponential backoff", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const onRetry = vi.fn();

    const result = await withRetries(
      sequence(transientFailure("throttled"), transientFailure("throttled"), success(7)),
      { maxAttempts: 3, baseDelayMs: 100 },
      { sleep, onRetry },
    );

    expect(result).toEqual({ status: "success", value: 7, attempts: 3 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(onRetry).toHaveBeenNthCalledWith(1, { attempt: 1, delayMs: 100, reason: "throttled" });
  });

  it("does not retry permanent failures", async () => {
    const operation = vi.fn(sequence<string>(permanentFailure("forbidden")));

    const result = await withRetries(operation, { maxAttempts: 5, baseDelayMs: 0 }, {
      sleep: async () => undefined,
    });

    expect(result).toEqual({ status: "permanent-failure", reason: "forbidden", attempts: 1 });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("reports how many attempts were spent when retries run out", async () => {
    const result = await withRetries(
      sequence<string>(transientFailure("timeout")),
      { maxAttempts: 2, baseDelayMs: 0 },
      { sleep: async () => undefined },
    );

    expect(result).toEqual({
      status: "transient-failure",
      reason: "timeout (gave up after 2 attempts)",
      attempts: 2,
    });
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn(sequence<string>(transientFailure("timeout")));

    const result = await withRetries(operation, { maxAttempts: 3, baseDelayMs: 0 }, {
      signal: controller.signal,
      sleep: async () => undefined,
    });

    expect(result.status).toBe("transient-failure");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("retryDelayMs", () => {
  it("doubles per attempt and caps the exponent", () => {
    expect([1, 2, 3, 5, 9].map((attempt) => retryDelayMs(attempt, 500))).toEqual([
      500, 1000, 2000, 8000, 8000,
    ]);
  });
});
