import { ExponentialBackoff, type ExponentialBackoffOptions } from "./backoff";

export interface RetryOptions {
  /**
   * Maximum number of retry attempts that should be performed after the initial attempt.
   */
  retries: number;
  /**
   * Backoff applied between attempts. When omitted, retries start immediately.
   */
  backoff?: ExponentialBackoffOptions;
  /**
   * Optional elapsed-time budget in milliseconds, measured with `now` from the first attempt.
   * No retry starts once the budget is spent, even if retries remain.
   */
  maxElapsedMs?: number;
  /**
   * Clock used for the elapsed budget. Defaults to performance.now.
   */
  now?: () => number;
  /**
   * Optional predicate that determines whether a particular error should be retried.
   * Receives the thrown error and the attempt number that just failed.
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /**
   * Optional custom wait strategy primarily used for tests. Receives the computed
   * delay and the next attempt number that will be executed once the promise resolves.
   */
  wait?: (delayMs: number, nextAttempt: number) => Promise<void>;
}

export type RetryableOperation<T> = (attempt: number) => Promise<T>;

export type RetryStep =
  | { kind: "retry"; nextAttempt: number; delayMs: number }
  | { kind: "give-up"; reason: "not-retryable" | "attempts-exhausted" | "budget-exhausted" };

function normalizeRetries(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError("retries must be a finite non-negative number");
  }

  return Math.floor(value);
}

async function defaultWait(delayMs: number): Promise<void> {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * Bounded retry state: attempt count plus elapsed budget. It never sleeps itself, so callers
 * (and tests) decide how waiting happens.
 */
export class RetryState {
  private readonly totalAttempts: number;
  private readonly backoff: ExponentialBackoff | null;
  private readonly maxElapsedMs?: number;
  private readonly now: () => number;
  private startedAt: number | null = null;
  private attemptCount = 0;

  constructor(options: Pick<RetryOptions, "retries" | "backoff" | "maxElapsedMs" | "now">) {
    this.totalAttempts = normalizeRetries(options.retries) + 1;
    this.backoff = options.backoff ? new ExponentialBackoff(options.backoff) : null;
    this.maxElapsedMs = options.maxElapsedMs;
    this.now = options.now ?? (() => performance.now());
  }

  get attempt(): number {
    return this.attemptCount;
  }

  begin(): number {
    if (this.startedAt === null) {
      this.startedAt = this.now();
    }

    this.attemptCount += 1;
    return this.attemptCount;
  }

  elapsedMs(): number {
    return this.startedAt === null ? 0 : Math.max(0, this.now() - this.startedAt);
  }

  next(retryable: boolean): RetryStep {
    if (!retryable) {
      return { kind: "give-up", reason: "not-retryable" };
    }

    if (this.attemptCount >= this.totalAttempts) {
      return { kind: "give-up", reason: "attempts-exhausted" };
    }

    const delayMs = this.backoff ? this.backoff.nextDelay() : 0;

    if (this.maxElapsedMs !== undefined && this.elapsedMs() + delayMs >= this.maxElapsedMs) {
      return { kind: "give-up", reason: "budget-exhausted" };
    }

    return { kind: "retry", nextAttempt: this.attemptCount + 1, delayMs };
  }
}

export async function retryOperation<T>(
  operation: RetryableOperation<T>,
  options: RetryOptions,
): Promise<T> {
  const state = new RetryState(options);
  const shouldRetry = options.shouldRetry ?? (() => true);
  const wait = options.wait ?? ((delay) => defaultWait(delay));

  for (;;) {
    const attempt = state.begin();

    try {
      return await operation(attempt);
    } catch (error) {
      const step = state.next(shouldRetry(error, attempt));

      if (step.kind === "give-up") {
        throw error instanceof Error ? error : new Error(String(error));
      }

      await wait(step.delayMs, step.nextAttempt);
    }
  }
}
