import type { CheckResult, TargetConfig } from "../domain";
import type { ProbeRunner } from "../executor/types";
import { RequestError, type TimedRequestFunction, type TimedResponse } from "../http/request";

export function createTarget(overrides: Partial<TargetConfig> = {}): TargetConfig {
  return {
    id: "api",
    url: "https://api.example.test/health",
    intervalMs: 5_000,
    method: "GET",
    active: true,
    ...overrides,
  } satisfies TargetConfig;
}

export function createCheckResult(overrides: Partial<CheckResult> = {}): CheckResult {
  return {
    targetId: "api",
    url: "https://api.example.test/health",
    checkedAt: new Date("2026-03-01T10:15:00.000Z"),
    timings: { totalMs: 120, connectMs: 10, serverProcessingMs: 90, transferMs: 20 },
    contentSizeBytes: 512,
    httpStatus: 200,
    success: true,
    patternMatched: null,
    failure: null,
    details: { attempts: 1, retries: 0 },
    ...overrides,
  } satisfies CheckResult;
}

export function createFailedResult(overrides: Partial<CheckResult> = {}): CheckResult {
  return createCheckResult({
    timings: { totalMs: 1_000 },
    contentSizeBytes: undefined,
    httpStatus: undefined,
    success: false,
    failure: { reason: "timeout", message: "Request timed out after 1000ms" },
    details: { attempts: 3, retries: 2 },
    ...overrides,
  });
}

interface PendingRun {
  resolve(result: CheckResult): void;
  reject(error: unknown): void;
  signal: AbortSignal;
}

export interface ControllableRunner {
  run: ProbeRunner;
  /** Runs that started and have not settled yet, keyed by target id. */
  readonly pending: Map<string, PendingRun>;
  /** Number of runs started per target id. */
  readonly started: Map<string, number>;
  complete(targetId: string, overrides?: Partial<CheckResult>): void;
  fail(targetId: string, error: unknown): void;
}

/**
 * Probe runner whose runs only settle when the test says so. Aborting a run rejects it with
 * the signal's reason.
 */
export function createControllableRunner(): ControllableRunner {
  const pending = new Map<string, PendingRun>();
  const started = new Map<string, number>();

  const run: ProbeRunner = (task, signal) =>
    new Promise<CheckResult>((resolve, reject) => {
      const targetId = task.target.id;
      started.set(targetId, (started.get(targetId) ?? 0) + 1);
      pending.set(targetId, { resolve, reject, signal });
      signal.addEventListener(
        "abort",
        () => {
          pending.delete(targetId);
          reject(signal.reason);
        },
        { once: true },
      );
    });

  const take = (targetId: string): PendingRun => {
    const entry = pending.get(targetId);
    if (!entry) {
      throw new Error(`No pending run for ${targetId}`);
    }
    pending.delete(targetId);
    return entry;
  };

  return {
    run,
    pending,
    started,
    complete(targetId, overrides = {}) {
      take(targetId).resolve(createCheckResult({ targetId, ...overrides }));
    },
    fail(targetId, error) {
      take(targetId).reject(error);
    },
  };
}

/** Lets pending promise callbacks and p-limit hand-offs run. */
export async function flushAsync(): Promise<void> {
  await new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
}

export function createTimedResponse(overrides: Partial<TimedResponse> = {}): TimedResponse {
  return {
    statusCode: 200,
    headers: { "content-type": "text/plain" },
    body: Buffer.from("ok"),
    contentSizeBytes: 2,
    bodyTruncated: false,
    timings: { totalMs: 12, connectMs: 2, serverProcessingMs: 8, transferMs: 2 },
    ...overrides,
  };
}

export interface GatedRequest {
  request: TimedRequestFunction;
  /** Number of requests started so far. */
  readonly calls: number;
  /** Lets every waiting request answer with the stub response. */
  release(): void;
}

/**
 * Request function that holds every call until release(). An aborted call rejects the way
 * timedRequest does on cancellation.
 */
export function createGatedRequest(response: TimedResponse = createTimedResponse()): GatedRequest {
  let calls = 0;
  let open = false;
  const waiting: Array<() => void> = [];

  const request: TimedRequestFunction = (options) =>
    new Promise<TimedResponse>((resolve, reject) => {
      calls += 1;

      if (open) {
        resolve(response);
        return;
      }

      waiting.push(() => {
        resolve(response);
      });
      options.signal?.addEventListener(
        "abort",
        () => {
          reject(
            new RequestError("unknown", "Request was cancelled", {}, { timings: { totalMs: 0 } }),
          );
        },
        { once: true },
      );
    });

  return {
    request,
    get calls() {
      return calls;
    },
    release() {
      open = true;
      for (const resume of waiting.splice(0, waiting.length)) {
        resume();
      }
    },
  };
}
