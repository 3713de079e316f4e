import { describe, expect, it, vi } from "vitest";
import { RejectedByVenueError, TransientGatewayError } from "../src/utils/errors";
import { RetryExhaustedError, backoffDelay, rootCause, withRetry, withTimeout } from "../src/utils/retry";

describe("backoffDelay", () => {
  it("doubles from the base delay up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n, 500, 4000))).toEqual([500, 1000, 2000, 4000, 4000]);
  });
});

describe("withRetry", () => {
  it("retries transient errors with backoff", async () => {
    const waits: number[] = [];
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TransientGatewayError("Timeout", "slow"))
      .mockRejectedValueOnce(new TransientGatewayError("RateLimited", "busy"))
      .mockResolvedValue("ok");

    const outcome = await withRetry(fn, {
      attempts: 3,
      baseDelayMs: 500,
      maxDelayMs: 4000,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    expect(outcome).toEqual({ value: "ok", attempts: 3 });
    expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    expect(waits).toEqual([500, 1000]);
  });

  it("rethrows a non-retryable error without retrying", async () => {
    const rejection = new RejectedByVenueError("Rejected", "no");
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(rejection);

    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 })).rejects.toBe(rejection);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("wraps the last error once the attempts run out", async () => {
    const onRetry = vi.fn();
    let n = 0;
    const error = await withRetry(
      async () => {
        n += 1;
        throw new TransientGatewayError("Timeout", `slow ${n}`);
      },
      { attempts: 3, baseDelayMs: 0, maxDelayMs: 0, onRetry, sleep: async () => undefined }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.attempts).toBe(3);
    expect(error.message).toBe("Gave up after 3 attempts");
    expect(rootCause(error)).toMatchObject({ kind: "Timeout", message: "slow 3" });
    expect(onRetry).toHaveBeenCalledTimes(2);
  });
});

describe("withTimeout", () => {
  it("returns the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(7), 1000)).resolves.toBe(7);
  });

  it("gives up with undefined after the deadline", async () => {
    await expect(withTimeout(new Promise<number>(() => undefined), 5)).resolves.toBeUndefined();
  });
});
