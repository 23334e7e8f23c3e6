import type { CheckResult, DailyStat, RollupCycle, TargetConfig, TargetSummary } from "../domain";

/**
 * Operations the rollup may run inside one storage transaction.
 */
export interface RollupTransaction {
  /** Results with lowerBound <= checkedAt < end, ordered by checkedAt. */
  selectResultsInRange(start: Date, end: Date): Promise<CheckResult[]>;
  /** Merges the delta into the (target, day) row, creating it when missing. */
  upsertDailyStat(delta: DailyStat): Promise<void>;
  recordRollupCycle(cycle: RollupCycle): Promise<void>;
  latestRollupCycle(): Promise<RollupCycle | null>;
}

export interface MonitorStore extends RollupTransaction {
  /** Idempotent on (targetId, checkedAt): false when the key already existed. */
  insertResult(result: CheckResult): Promise<boolean>;
  /** Deletes raw results older than the cutoff and returns how many were removed. */
  deleteResultsBefore(cutoff: Date): Promise<number>;
  /** Upserts the configured targets and marks every other stored target inactive. */
  syncTargets(targets: readonly TargetConfig[]): Promise<void>;
  /** Takes the named lease when it is free or expired. */
  acquireLease(name: string, now: Date, leaseMs: number): Promise<boolean>;
  /** Gives up a lease this store holds. */
  releaseLease(name: string): Promise<void>;
  /** Runs fn atomically; a rejection rolls back every write made through the transaction. */
  transaction<T>(fn: (tx: RollupTransaction) => Promise<T>): Promise<T>;
  markRollupPurged(cutoff: Date, rowsPurged: number, purgedAt: Date): Promise<void>;
  /** Per-target totals over the 24 hours before now. */
  recentSummary(now: Date): Promise<TargetSummary[]>;
  dailyStats(targetId?: string): Promise<DailyStat[]>;
  close(): Promise<void>;
}
