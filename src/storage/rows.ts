import {
  FAILURE_REASONS,
  type CheckDetails,
  type CheckResult,
  type DailyStat,
  type FailureReason,
  type PhaseTimings,
  type RollupCycle,
  type TargetSummary,
} from "../domain";

export interface CheckResultRow {
  target_id: string;
  url: string;
  checked_at: Date;
  total_ms: number;
  dns_ms: number | null;
  connect_ms: number | null;
  tls_ms: number | null;
  server_processing_ms: number | null;
  transfer_ms: number | null;
  content_size_bytes: number | null;
  http_status: number | null;
  success: boolean;
  pattern_matched: boolean | null;
  failure_reason: string | null;
  failure_message: string | null;
  details: unknown;
}

export interface DailyStatRow {
  target_id: string;
  day: string;
  total_checks: number;
  successful_checks: number;
  failure_count: number;
  response_time_samples: number;
  min_response_time_ms: number | null;
  avg_response_time_ms: number | null;
  max_response_time_ms: number | null;
}

export interface RollupCycleRow {
  cutoff: Date;
  lower_bound: Date;
  rows_summarized: number;
  stats_upserted: number;
  summarized_at: Date;
  rows_purged: number | null;
  purged_at: Date | null;
}

export interface TargetSummaryRow {
  target_id: string;
  url: string;
  total_checks: number;
  successful_checks: number;
  failure_count: number;
  avg_response_time_ms: number | null;
  last_check_at: Date | null;
  last_failure_at: Date | null;
}

function isFailureReason(value: unknown): value is FailureReason {
  return FAILURE_REASONS.some((reason) => reason === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseDetails(value: unknown): CheckDetails {
  const parsed: unknown = typeof value === "string" ? JSON.parse(value) : value;
  const record = isRecord(parsed) ? parsed : {};
  const attempts = typeof record.attempts === "number" ? record.attempts : 0;
  const retries = typeof record.retries === "number" ? record.retries : Math.max(0, attempts - 1);

  return { ...record, attempts, retries };
}

/** Column values of one check_results row, in insert order. */
export function toCheckResultRow(result: CheckResult): CheckResultRow {
  const { timings } = result;
  return {
    target_id: result.targetId,
    url: result.url,
    checked_at: result.checkedAt,
    total_ms: timings.totalMs,
    dns_ms: timings.dnsMs ?? null,
    connect_ms: timings.connectMs ?? null,
    tls_ms: timings.tlsMs ?? null,
    server_processing_ms: timings.serverProcessingMs ?? null,
    transfer_ms: timings.transferMs ?? null,
    content_size_bytes: result.contentSizeBytes ?? null,
    http_status: result.httpStatus ?? null,
    success: result.success,
    pattern_matched: result.patternMatched,
    failure_reason: result.failure?.reason ?? null,
    failure_message: result.failure?.message ?? null,
    details: result.details,
  };
}

export function fromCheckResultRow(row: CheckResultRow): CheckResult {
  const timings: PhaseTimings = { totalMs: row.total_ms };
  if (row.dns_ms !== null) {
    timings.dnsMs = row.dns_ms;
  }
  if (row.connect_ms !== null) {
    timings.connectMs = row.connect_ms;
  }
  if (row.tls_ms !== null) {
    timings.tlsMs = row.tls_ms;
  }
  if (row.server_processing_ms !== null) {
    timings.serverProcessingMs = row.server_processing_ms;
  }
  if (row.transfer_ms !== null) {
    timings.transferMs = row.transfer_ms;
  }

  const reason = row.failure_reason;

  return {
    targetId: row.target_id,
    url: row.url,
    checkedAt: row.checked_at,
    timings,
    ...(row.content_size_bytes !== null ? { contentSizeBytes: row.content_size_bytes } : {}),
    ...(row.http_status !== null ? { httpStatus: row.http_status } : {}),
    success: row.success,
    patternMatched: row.pattern_matched,
    failure:
      reason === null
        ? null
        : {
            reason: isFailureReason(reason) ? reason : "unknown",
            message: row.failure_message ?? "",
          },
    details: parseDetails(row.details),
  };
}

export function fromDailyStatRow(row: DailyStatRow): DailyStat {
  return {
    targetId: row.target_id,
    day: row.day,
    totalChecks: row.total_checks,
    successfulChecks: row.successful_checks,
    failureCount: row.failure_count,
    responseTimeSamples: row.response_time_samples,
    minResponseTimeMs: row.min_response_time_ms,
    avgResponseTimeMs: row.avg_response_time_ms,
    maxResponseTimeMs: row.max_response_time_ms,
  };
}

export function fromRollupCycleRow(row: RollupCycleRow): RollupCycle {
  return {
    cutoff: row.cutoff,
    lowerBound: row.lower_bound,
    rowsSummarized: row.rows_summarized,
    statsUpserted: row.stats_upserted,
    summarizedAt: row.summarized_at,
    rowsPurged: row.rows_purged,
    purgedAt: row.purged_at,
  };
}

export function fromTargetSummaryRow(row: TargetSummaryRow): TargetSummary {
  return {
    targetId: row.target_id,
    url: row.url,
    totalChecks: row.total_checks,
    successfulChecks: row.successful_checks,
    failureCount: row.failure_count,
    avgResponseTimeMs: row.avg_response_time_ms,
    lastCheckAt: row.last_check_at,
    lastFailureAt: row.last_failure_at,
  };
}
