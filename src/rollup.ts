import { responseTimeOf, type CheckResult, type DailyStat } from "./domain";
import { MILLISECONDS_PER_DAY } from "./duration";

/** UTC calendar day of the timestamp as YYYY-MM-DD. */
export function utcDayOf(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MILLISECONDS_PER_DAY) * MILLISECONDS_PER_DAY);
}

/**
 * Exclusive upper bound of the raw results a cycle may fold: midnight UTC of the current day,
 * moved back by the retention window. Only whole days are ever summarized.
 */
export function rollupCutoff(now: Date, retentionDays: number): Date {
  return new Date(startOfUtcDay(now).getTime() - retentionDays * MILLISECONDS_PER_DAY);
}

interface Accumulator {
  targetId: string;
  day: string;
  totalChecks: number;
  successfulChecks: number;
  samples: number;
  sum: number;
  min: number | null;
  max: number | null;
}

/**
 * Groups raw results by (target, UTC day) into additive deltas, ordered by target then day.
 */
export function summarizeResults(results: readonly CheckResult[]): DailyStat[] {
  const groups = new Map<string, Accumulator>();

  for (const result of results) {
    const day = utcDayOf(result.checkedAt);
    const key = `${result.targetId}\u0000${day}`;
    let group = groups.get(key);

    if (!group) {
      group = {
        targetId: result.targetId,
        day,
        totalChecks: 0,
        successfulChecks: 0,
        samples: 0,
        sum: 0,
        min: null,
        max: null,
      };
      groups.set(key, group);
    }

    group.totalChecks += 1;
    if (result.success) {
      group.successfulChecks += 1;
    }

    const responseTime = responseTimeOf(result);
    if (responseTime !== null) {
      group.samples += 1;
      group.sum += responseTime;
      group.min = group.min === null ? responseTime : Math.min(group.min, responseTime);
      group.max = group.max === null ? responseTime : Math.max(group.max, responseTime);
    }
  }

  return [...groups.values()]
    .sort((a, b) =>
      a.targetId === b.targetId ? a.day.localeCompare(b.day) : a.targetId.localeCompare(b.targetId),
    )
    .map((group) => ({
      targetId: group.targetId,
      day: group.day,
      totalChecks: group.totalChecks,
      successfulChecks: group.successfulChecks,
      failureCount: group.totalChecks - group.successfulChecks,
      responseTimeSamples: group.samples,
      minResponseTimeMs: group.min,
      avgResponseTimeMs: group.samples === 0 ? null : group.sum / group.samples,
      maxResponseTimeMs: group.max,
    }));
}

function combineExtreme(
  a: number | null,
  b: number | null,
  pick: (x: number, y: number) => number,
): number | null {
  if (a === null) {
    return b;
  }
  return b === null ? a : pick(a, b);
}

/**
 * Additive merge of a delta into an existing row. Averages are recombined as a mean weighted
 * by the number of response time samples on each side.
 */
export function mergeDailyStats(existing: DailyStat | undefined, delta: DailyStat): DailyStat {
  if (!existing) {
    return { ...delta };
  }

  const samples = existing.responseTimeSamples + delta.responseTimeSamples;
  const weightedSum =
    (existing.avgResponseTimeMs ?? 0) * existing.responseTimeSamples +
    (delta.avgResponseTimeMs ?? 0) * delta.responseTimeSamples;

  return {
    targetId: existing.targetId,
    day: existing.day,
    totalChecks: existing.totalChecks + delta.totalChecks,
    successfulChecks: existing.successfulChecks + delta.successfulChecks,
    failureCount: existing.failureCount + delta.failureCount,
    responseTimeSamples: samples,
    minResponseTimeMs: combineExtreme(existing.minResponseTimeMs, delta.minResponseTimeMs, Math.min),
    avgResponseTimeMs: samples === 0 ? null : weightedSum / samples,
    maxResponseTimeMs: combineExtreme(existing.maxResponseTimeMs, delta.maxResponseTimeMs, Math.max),
  };
}
