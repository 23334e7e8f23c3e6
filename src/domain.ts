export type HttpMethod = "GET" | "HEAD";

export interface TargetConfig {
  /** Unique identifier of the target, also the storage key. */
  readonly id: string;
  /** Endpoint that should be probed. */
  readonly url: string;
  /** Delay between two scheduled probes in milliseconds. */
  readonly intervalMs: number;
  /** Regular expression that must be found in the response body. */
  readonly pattern?: string;
  readonly method: HttpMethod;
  /** Per-target HTTP headers attached to the probe request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Inactive targets stay in configuration but are never scheduled. */
  readonly active: boolean;
}

export const FAILURE_REASONS = [
  "timeout",
  "connection_error",
  "http_error",
  "pattern_mismatch",
  "unknown",
] as const;

export type FailureReason = (typeof FAILURE_REASONS)[number];

export type TransientFailureReason = Extract<FailureReason, "timeout" | "connection_error">;

export function isTransientFailureReason(reason: FailureReason): reason is TransientFailureReason {
  return reason === "timeout" || reason === "connection_error";
}

export interface ProbeFailure {
  reason: FailureReason;
  message: string;
}

/**
 * Sequential, non-overlapping phases of one HTTP exchange. A phase is only present when it
 * completed; every phase starts where the previous completed one ended.
 */
export interface PhaseTimings {
  totalMs: number;
  dnsMs?: number;
  connectMs?: number;
  tlsMs?: number;
  serverProcessingMs?: number;
  transferMs?: number;
}

export interface PatternMatchDetails {
  index: number;
  matchedText: string;
}

export interface CheckDetails {
  attempts: number;
  retries: number;
  headers?: Record<string, string>;
  patternMatch?: PatternMatchDetails;
  errorName?: string;
  errorCode?: string;
  remoteAddress?: string;
  bodyTruncated?: boolean;
  [key: string]: unknown;
}

export interface CheckResult {
  readonly targetId: string;
  readonly url: string;
  /** Wall-clock start of the probe; with targetId forms the persistence key. */
  readonly checkedAt: Date;
  readonly timings: PhaseTimings;
  readonly contentSizeBytes?: number;
  /** Absent when no response was received. */
  readonly httpStatus?: number;
  readonly success: boolean;
  /** null when no pattern is configured or no body was obtained. */
  readonly patternMatched: boolean | null;
  readonly failure: ProbeFailure | null;
  readonly details: CheckDetails;
}

/**
 * Response time used for aggregation: the total time of probes that received a response.
 */
export function responseTimeOf(result: Pick<CheckResult, "httpStatus" | "timings">): number | null {
  return result.httpStatus === undefined ? null : result.timings.totalMs;
}

export interface DailyStat {
  readonly targetId: string;
  /** UTC day formatted as YYYY-MM-DD. */
  readonly day: string;
  readonly totalChecks: number;
  readonly successfulChecks: number;
  readonly failureCount: number;
  /** Number of checks that contributed a response time to min/avg/max. */
  readonly responseTimeSamples: number;
  readonly minResponseTimeMs: number | null;
  readonly avgResponseTimeMs: number | null;
  readonly maxResponseTimeMs: number | null;
}

export interface RollupCycle {
  /** Exclusive upper bound of the summarized window; unique per cycle. */
  readonly cutoff: Date;
  /** Inclusive lower bound of the summarized window. */
  readonly lowerBound: Date;
  readonly rowsSummarized: number;
  readonly statsUpserted: number;
  readonly summarizedAt: Date;
  readonly rowsPurged: number | null;
  readonly purgedAt: Date | null;
}

export interface TargetSummary {
  targetId: string;
  url: string;
  totalChecks: number;
  successfulChecks: number;
  failureCount: number;
  avgResponseTimeMs: number | null;
  lastCheckAt: Date | null;
  lastFailureAt: Date | null;
}
