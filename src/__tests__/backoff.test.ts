import { describe, expect, it } from "vitest";

import { ExponentialBackoff } from "../backoff";

describe("ExponentialBackoff", () => {
  it("produces doubling delays without jitter when disabled", () => {
    const backoff = new ExponentialBackoff({ initialDelayMs: 200, jitterRatio: 0 });

    expect(backoff.nextDelay()).toBe(200);
    expect(backoff.nextDelay()).toBe(400);
    expect(backoff.nextDelay()).toBe(800);
    expect(backoff.attempts).toBe(3);

    backoff.reset();
    expect(backoff.nextDelay()).toBe(200);
  });

  it("caps delays at maxDelayMs", () => {
    const backoff = new ExponentialBackoff({
      initialDelayMs: 500,
      maxDelayMs: 1_500,
      jitterRatio: 0,
    });

    expect([backoff.nextDelay(), backoff.nextDelay(), backoff.nextDelay()]).toEqual([
      500, 1_000, 1_500,
    ]);
  });

  it("applies symmetric jitter around the exponential delay", () => {
    const values = [0, 1, 0.5];
    const backoff = new ExponentialBackoff({
      initialDelayMs: 1_000,
      jitterRatio: 0.2,
      random: () => values.shift() ?? 0.5,
    });

    expect(backoff.delayFor(1)).toBe(800);
    expect(backoff.delayFor(1)).toBe(1_200);
    expect(backoff.delayFor(2)).toBe(2_000);
  });

  it("rejects invalid options", () => {
    expect(() => new ExponentialBackoff({ initialDelayMs: 0 })).toThrow(TypeError);
    expect(() => new ExponentialBackoff({ initialDelayMs: 100, jitterRatio: 1 })).toThrow(
      TypeError,
    );
    expect(() => new ExponentialBackoff({ initialDelayMs: 100, maxDelayMs: 50 })).toThrow(
      TypeError,
    );
  });
});
