import type { FailureReason } from "../domain";
import { EXIT_CODE_RUNTIME_FAILURE } from "../exit-codes";
import { SitePulseError, type ErrorContext } from "./base";

export interface ProbeErrorContext {
  targetId?: string;
  attempt?: number;
  url?: string | URL;
}

function normalizeProbeContext(context: ProbeErrorContext): ErrorContext {
  const normalized: ErrorContext = {};

  if (typeof context.targetId === "string") {
    normalized.targetId = context.targetId;
  }

  if (typeof context.attempt === "number") {
    normalized.attempt = context.attempt;
  }

  if (context.url !== undefined) {
    normalized.url = context.url.toString();
  }

  return normalized;
}

export interface ProbeErrorOptions {
  cause?: unknown;
}

/**
 * Failure of a single probe attempt, tagged with its failure category.
 */
export class ProbeError extends SitePulseError {
  readonly reason: FailureReason;
  readonly targetId?: string;
  readonly attempt?: number;
  /** Message without the appended context, as stored in CheckResult.failure. */
  readonly summary: string;

  constructor(
    reason: FailureReason,
    message: string,
    context: ProbeErrorContext,
    options: ProbeErrorOptions = {},
  ) {
    super(message, {
      exitCode: EXIT_CODE_RUNTIME_FAILURE,
      context: normalizeProbeContext(context),
      cause: options.cause,
      name: "ProbeError",
    });

    this.reason = reason;
    this.targetId = context.targetId;
    this.attempt = context.attempt;
    this.summary = message;
  }
}

export class PatternMismatchError extends ProbeError {
  readonly pattern: string;

  constructor(pattern: string, context: ProbeErrorContext) {
    super("pattern_mismatch", `Pattern /${pattern}/ not found in response body`, context);
    this.name = "PatternMismatchError";
    this.pattern = pattern;
  }
}
