import { describe, expect, it, vi } from "vitest";

import { RetryState, retryOperation } from "../retry";

function createVirtualWait(
  delays: number[],
): (delayMs: number, nextAttempt: number) => Promise<void> {
  return (delayMs) => {
    delays.push(delayMs);
    return new Promise((resolve) => {
      setTimeout(resolve, delayMs);
    });
  };
}

describe("retryOperation", () => {
  it("does not perform retries when retries is set to 0", async () => {
    const error = new Error("boom");
    const operation = vi.fn<(attempt: number) => Promise<never>>().mockRejectedValue(error);
    const waitCalls: number[] = [];

    await expect(
      retryOperation(operation, {
        retries: 0,
        backoff: { initialDelayMs: 200, jitterRatio: 0 },
        wait: createVirtualWait(waitCalls),
      }),
    ).rejects.toBe(error);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(waitCalls).toHaveLength(0);
  });

  it("performs the configured number of retries with exponential backoff", async () => {
    vi.useFakeTimers();

    try {
      const error = new Error("persistent failure");
      const operation = vi.fn<(attempt: number) => Promise<never>>().mockRejectedValue(error);
      const scheduledDelays: number[] = [];

      const promise = retryOperation(operation, {
        retries: 3,
        backoff: { initialDelayMs: 200, jitterRatio: 0 },
        wait: createVirtualWait(scheduledDelays),
      });
      const guarded = promise.catch(() => {});

      expect(operation).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(200);
      expect(operation).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(400);
      expect(operation).toHaveBeenCalledTimes(3);

      await vi.advanceTimersByTimeAsync(800);
      await expect(promise).rejects.toBe(error);
      await guarded;
      expect(operation).toHaveBeenCalledTimes(4);
      expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3, 4]);

      expect(scheduledDelays).toEqual([200, 400, 800]);
    } finally {
      vi.useRealTimers();
    }
  });

  it("retries immediately when no backoff is configured", async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("transient"))
      .mockResolvedValue("ok");
    const waits: number[] = [];

    await expect(
      retryOperation(operation, {
        retries: 2,
        wait: async (delayMs) => {
          waits.push(delayMs);
        },
      }),
    ).resolves.toBe("ok");

    expect(waits).toEqual([0]);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("stops when shouldRetry rejects the error", async () => {
    const permanent = new Error("permanent");
    const operation = vi.fn<(attempt: number) => Promise<never>>().mockRejectedValue(permanent);

    await expect(
      retryOperation(operation, {
        retries: 5,
        shouldRetry: (error) => error !== permanent,
        wait: async () => {},
      }),
    ).rejects.toBe(permanent);

    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops once the elapsed budget is spent, measured with the injected clock", async () => {
    let clock = 0;
    const operation = vi.fn(async () => {
      clock += 400;
      throw new Error("slow failure");
    });

    await expect(
      retryOperation(operation, {
        retries: 10,
        maxElapsedMs: 1_000,
        now: () => clock,
        wait: async () => {},
      }),
    ).rejects.toThrow("slow failure");

    // 400ms, 800ms, then 1200ms >= budget
    expect(operation).toHaveBeenCalledTimes(3);
  });
});

describe("RetryState", () => {
  it("reports why it gives up", () => {
    const state = new RetryState({ retries: 1 });

    state.begin();
    expect(state.next(false)).toEqual({ kind: "give-up", reason: "not-retryable" });
    expect(state.next(true)).toEqual({ kind: "retry", nextAttempt: 2, delayMs: 0 });

    state.begin();
    expect(state.attempt).toBe(2);
    expect(state.next(true)).toEqual({ kind: "give-up", reason: "attempts-exhausted" });
  });
});
