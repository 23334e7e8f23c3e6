import { setTimeout as delay } from "node:timers/promises";

import {
  isTransientFailureReason,
  type CheckDetails,
  type CheckResult,
  type PatternMatchDetails,
  type PhaseTimings,
  type ProbeFailure,
  type TargetConfig,
} from "./domain";
import { PatternMismatchError } from "./errors/probe";
import {
  DEFAULT_MAX_BODY_BYTES,
  RequestError,
  timedRequest,
  type TimedRequestFunction,
  type TimedResponse,
} from "./http/request";
import { silentLogger, type Logger } from "./logging";
import { redactHeaders } from "./redaction";
import { retryOperation } from "./retry";

const MATCHED_TEXT_LIMIT = 100;

export interface ProberOptions {
  /** Budget of one attempt, body included. */
  timeoutMs: number;
  /** Total number of attempts, at least 1. */
  retryLimit: number;
  /** Initial delay of the exponential backoff between attempts. No delay when omitted. */
  retryDelayMs?: number;
  /** No retry starts once this much time has elapsed since the first attempt. */
  retryBudgetMs?: number;
  maxBodyBytes?: number;
  request?: TimedRequestFunction;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  /** Wall clock used for CheckResult.checkedAt. */
  clock?: () => Date;
  wait?: (delayMs: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export interface ProbeCheckOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  retryLimit?: number;
}

interface AttemptDetails {
  headers?: Record<string, string>;
  patternMatch?: PatternMatchDetails;
  errorName?: string;
  errorCode?: string;
  remoteAddress?: string;
  bodyTruncated?: boolean;
}

interface AttemptOutcome {
  timings: PhaseTimings;
  httpStatus?: number;
  contentSizeBytes?: number;
  patternMatched: boolean | null;
  failure: ProbeFailure | null;
  details: AttemptDetails;
}

class TransientAttemptError extends Error {
  readonly outcome: AttemptOutcome;

  constructor(outcome: AttemptOutcome) {
    super(outcome.failure?.message ?? "Transient probe failure");
    this.name = "TransientAttemptError";
    this.outcome = outcome;
  }
}

function normalizeAttempts(value: number): number {
  if (!Number.isFinite(value) || value < 1) {
    return 1;
  }

  return Math.floor(value);
}

async function defaultWait(delayMs: number, signal?: AbortSignal): Promise<void> {
  if (delayMs <= 0) {
    return;
  }

  await delay(delayMs, undefined, { signal });
}

export function evaluatePattern(
  pattern: string,
  body: string,
): { matched: true; match: PatternMatchDetails } | { matched: false } {
  const match = new RegExp(pattern, "s").exec(body);

  if (!match) {
    return { matched: false };
  }

  return {
    matched: true,
    match: { index: match.index, matchedText: match[0].slice(0, MATCHED_TEXT_LIMIT) },
  };
}

/**
 * Judges a received response: status first, then the optional body pattern.
 */
export function evaluateResponse(target: TargetConfig, response: TimedResponse): AttemptOutcome {
  const details: AttemptDetails = {
    headers: redactHeaders(response.headers),
    remoteAddress: response.remoteAddress,
  };

  if (response.bodyTruncated) {
    details.bodyTruncated = true;
  }

  const base = {
    timings: response.timings,
    httpStatus: response.statusCode,
    contentSizeBytes: response.contentSizeBytes,
    details,
  };

  if (response.statusCode >= 400) {
    return {
      ...base,
      patternMatched: null,
      failure: { reason: "http_error", message: `HTTP ${response.statusCode}` },
    };
  }

  if (target.pattern === undefined) {
    return { ...base, patternMatched: null, failure: null };
  }

  const evaluation = evaluatePattern(target.pattern, response.body.toString("utf8"));

  if (evaluation.matched) {
    details.patternMatch = evaluation.match;
    return { ...base, patternMatched: true, failure: null };
  }

  const mismatch = new PatternMismatchError(target.pattern, { targetId: target.id });
  return {
    ...base,
    patternMatched: false,
    failure: { reason: mismatch.reason, message: mismatch.summary },
  };
}

function outcomeFromError(error: unknown, totalMs: number): AttemptOutcome {
  if (error instanceof RequestError) {
    const cause = error.cause;
    return {
      timings: error.timings,
      patternMatched: null,
      failure: { reason: error.reason, message: error.summary },
      details: {
        errorName: cause instanceof Error ? cause.name : error.name,
        errorCode: error.code,
      },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    timings: { totalMs },
    patternMatched: null,
    failure: { reason: "unknown", message },
    details: { errorName: error instanceof Error ? error.name : undefined },
  };
}

function cancelledOutcome(): AttemptOutcome {
  return {
    timings: { totalMs: 0 },
    patternMatched: null,
    failure: { reason: "unknown", message: "Probe was cancelled" },
    details: {},
  };
}

export class Prober {
  private readonly options: ProberOptions;
  private readonly request: TimedRequestFunction;
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly wait: (delayMs: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: ProberOptions) {
    this.options = options;
    this.request = options.request ?? timedRequest;
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
    this.wait = options.wait ?? defaultWait;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Probes the target, retrying timeouts and connection errors. Never rejects: every failure
   * becomes a failed CheckResult.
   */
  async check(target: TargetConfig, options: ProbeCheckOptions = {}): Promise<CheckResult> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const totalAttempts = normalizeAttempts(options.retryLimit ?? this.options.retryLimit);
    const checkedAt = this.clock();

    let attempts = 0;
    let lastOutcome: AttemptOutcome | null = null;

    const runAttempt = async (attempt: number): Promise<AttemptOutcome> => {
      if (signal?.aborted) {
        throw signal.reason;
      }

      attempts = attempt;
      const outcome = await this.attempt(target, attempt, timeoutMs, signal);
      lastOutcome = outcome;

      if (outcome.failure && isTransientFailureReason(outcome.failure.reason)) {
        throw new TransientAttemptError(outcome);
      }

      return outcome;
    };

    let outcome: AttemptOutcome;

    try {
      outcome = await retryOperation(runAttempt, {
        retries: totalAttempts - 1,
        backoff:
          this.options.retryDelayMs !== undefined && this.options.retryDelayMs > 0
            ? { initialDelayMs: this.options.retryDelayMs, random: this.options.random }
            : undefined,
        maxElapsedMs: this.options.retryBudgetMs,
        now: this.now,
        shouldRetry: (error) => error instanceof TransientAttemptError && !signal?.aborted,
        wait: async (delayMs, nextAttempt) => {
          this.logger.debug("retrying probe", {
            targetId: target.id,
            attempt: nextAttempt,
            delayMs,
          });
          await this.wait(delayMs, signal);
        },
      });
    } catch (error) {
      if (error instanceof TransientAttemptError) {
        outcome = error.outcome;
      } else {
        outcome = lastOutcome ?? cancelledOutcome();
      }
    }

    const details: CheckDetails = {
      attempts,
      retries: Math.max(0, attempts - 1),
      ...outcome.details,
    };

    return {
      targetId: target.id,
      url: target.url,
      checkedAt,
      timings: outcome.timings,
      contentSizeBytes: outcome.contentSizeBytes,
      httpStatus: outcome.httpStatus,
      success: outcome.failure === null,
      patternMatched: outcome.patternMatched,
      failure: outcome.failure,
      details,
    };
  }

  private async attempt(
    target: TargetConfig,
    attempt: number,
    timeoutMs: number,
    signal: AbortSignal | undefined,
  ): Promise<AttemptOutcome> {
    const startedAt = this.now();

    try {
      const response = await this.request({
        url: target.url,
        method: target.method,
        headers: target.headers,
        timeoutMs,
        signal,
        maxBodyBytes: this.options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES,
        now: this.now,
        context: { targetId: target.id, attempt },
      });
      return evaluateResponse(target, response);
    } catch (error) {
      const outcome = outcomeFromError(error, Math.max(0, Math.round(this.now() - startedAt)));
      this.logger.debug("probe attempt failed", {
        targetId: target.id,
        attempt,
        reason: outcome.failure?.reason,
        error,
      });
      return outcome;
    }
  }
}
