import type { RollupCycle } from "./domain";
import { silentLogger, type Logger } from "./logging";
import { PipelineMetrics } from "./metrics";
import { rollupCutoff, summarizeResults } from "./rollup";
import type { MonitorStore } from "./storage/types";

export const ROLLUP_LEASE_NAME = "rollup";

export interface RetentionAggregatorOptions {
  store: MonitorStore;
  /** Whole days of raw results kept before they are folded into daily stats. */
  retentionDays: number;
  /** Delay between two scheduled cycles. */
  cadenceMs: number;
  /** TTL of the storage lease; a crashed holder blocks cycles for at most this long. */
  lockLeaseMs: number;
  clock?: () => Date;
  metrics?: PipelineMetrics;
  logger?: Logger;
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

export interface RollupCycleReport {
  cutoff: Date;
  lowerBound: Date;
  /** False when an earlier cycle already summarized up to this cutoff. */
  summarized: boolean;
  rowsSummarized: number;
  statsUpserted: number;
  rowsPurged: number;
  startedAt: Date;
  completedAt: Date;
}

interface SummarizePhase {
  summarized: boolean;
  cycle: RollupCycle;
}

/**
 * Folds raw results older than the retention window into daily stats, then deletes them.
 *
 * Summarize runs in one transaction together with the cycle marker; purge only runs once that
 * transaction has committed. A purge that fails leaves the marker in place, so the next cycle
 * skips summarize and only retries the purge.
 */
export class RetentionAggregator {
  private readonly options: RetentionAggregatorOptions;
  private readonly clock: () => Date;
  private readonly metrics: PipelineMetrics;
  private readonly logger: Logger;
  private readonly setTimeoutFn: (
    callback: () => void,
    delay: number,
  ) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;

  private cycleRunning = false;
  private current: Promise<unknown> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private started = false;

  constructor(options: RetentionAggregatorOptions) {
    if (!Number.isInteger(options.retentionDays) || options.retentionDays < 1) {
      throw new TypeError("retentionDays must be an integer greater than or equal to 1");
    }

    if (!Number.isFinite(options.cadenceMs) || options.cadenceMs <= 0) {
      throw new TypeError("cadenceMs must be greater than 0");
    }

    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.metrics = options.metrics ?? new PipelineMetrics();
    this.logger = options.logger ?? silentLogger;
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
  }

  /**
   * Runs one cycle. Resolves with null when a cycle is already running in this process or
   * another process holds the lease.
   */
  async runCycle(): Promise<RollupCycleReport | null> {
    if (this.cycleRunning) {
      this.logger.info("rollup skipped, a cycle is already running");
      return null;
    }

    this.cycleRunning = true;

    try {
      const { store, lockLeaseMs } = this.options;
      const startedAt = this.clock();

      if (!(await store.acquireLease(ROLLUP_LEASE_NAME, startedAt, lockLeaseMs))) {
        this.logger.info("rollup skipped, lease is held elsewhere");
        return null;
      }

      try {
        return await this.summarizeAndPurge(startedAt);
      } finally {
        await store.releaseLease(ROLLUP_LEASE_NAME);
      }
    } finally {
      this.cycleRunning = false;
    }
  }

  /** Runs a cycle now and then every cadenceMs until stop(). */
  start(): void {
    if (this.started) {
      return;
    }

    this.started = true;
    this.runScheduled();
  }

  /** Cancels future cycles and waits for a running one. */
  async stop(): Promise<void> {
    this.started = false;

    if (this.timer !== null) {
      this.clearTimeoutFn(this.timer);
      this.timer = null;
    }

    await this.current;
  }

  private runScheduled(): void {
    const cycle = this.runCycle()
      .catch((error: unknown) => {
        this.logger.error("rollup cycle failed", { error });
      })
      .finally(() => {
        this.current = null;
        if (this.started) {
          this.timer = this.setTimeoutFn(() => {
            this.timer = null;
            this.runScheduled();
          }, this.options.cadenceMs);
        }
      });

    this.current = cycle;
  }

  private async summarizeAndPurge(startedAt: Date): Promise<RollupCycleReport> {
    const { store, retentionDays } = this.options;
    const cutoff = rollupCutoff(startedAt, retentionDays);

    const phase = await store.transaction(async (tx): Promise<SummarizePhase> => {
      const latest = await tx.latestRollupCycle();

      if (latest && latest.cutoff.getTime() >= cutoff.getTime()) {
        return { summarized: false, cycle: latest };
      }

      const lowerBound = latest?.cutoff ?? new Date(0);
      const results = await tx.selectResultsInRange(lowerBound, cutoff);
      const deltas = summarizeResults(results);

      for (const delta of deltas) {
        await tx.upsertDailyStat(delta);
      }

      const cycle: RollupCycle = {
        cutoff,
        lowerBound,
        rowsSummarized: results.length,
        statsUpserted: deltas.length,
        summarizedAt: this.clock(),
        rowsPurged: null,
        purgedAt: null,
      };
      await tx.recordRollupCycle(cycle);

      return { summarized: true, cycle };
    });

    const purgeCutoff = phase.cycle.cutoff;
    const rowsPurged = await store.deleteResultsBefore(purgeCutoff);
    const completedAt = this.clock();
    await store.markRollupPurged(purgeCutoff, rowsPurged, completedAt);

    const report: RollupCycleReport = {
      cutoff: purgeCutoff,
      lowerBound: phase.cycle.lowerBound,
      summarized: phase.summarized,
      rowsSummarized: phase.summarized ? phase.cycle.rowsSummarized : 0,
      statsUpserted: phase.summarized ? phase.cycle.statsUpserted : 0,
      rowsPurged,
      startedAt,
      completedAt,
    };

    this.metrics.increment("rollup_cycles");
    this.metrics.increment("rollup_rows_summarized", report.rowsSummarized);
    this.metrics.increment("rollup_rows_purged", rowsPurged);
    this.logger.info("rollup cycle completed", { ...report });

    return report;
  }
}
