import {
  responseTimeOf,
  type CheckResult,
  type DailyStat,
  type RollupCycle,
  type TargetConfig,
  type TargetSummary,
} from "../domain";
import { StorageError } from "../errors/base";
import { mergeDailyStats } from "../rollup";
import type { MonitorStore, RollupTransaction } from "./types";

const SUMMARY_WINDOW_MS = 24 * 60 * 60 * 1000;

interface StoredTarget {
  target: TargetConfig;
  active: boolean;
}

function resultKey(targetId: string, checkedAt: Date): string {
  return `${targetId}\u0000${checkedAt.getTime()}`;
}

function statKey(targetId: string, day: string): string {
  return `${targetId}\u0000${day}`;
}

function byTargetThenDay(a: DailyStat, b: DailyStat): number {
  return a.targetId === b.targetId ? a.day.localeCompare(b.day) : a.targetId.localeCompare(b.targetId);
}

/**
 * MonitorStore kept in process memory. Transactions snapshot the rollup tables and restore
 * them when the callback rejects; raw results are never written inside a transaction.
 */
export class MemoryStore implements MonitorStore {
  private readonly results = new Map<string, CheckResult>();
  private readonly targets = new Map<string, StoredTarget>();
  private stats = new Map<string, DailyStat>();
  private cycles = new Map<number, RollupCycle>();
  private readonly leases = new Map<string, number>();
  private transactionTail: Promise<unknown> = Promise.resolve();
  private closed = false;

  async insertResult(result: CheckResult): Promise<boolean> {
    this.assertOpen();
    const key = resultKey(result.targetId, result.checkedAt);

    if (this.results.has(key)) {
      return false;
    }

    this.results.set(key, result);
    return true;
  }

  async selectResultsInRange(start: Date, end: Date): Promise<CheckResult[]> {
    this.assertOpen();
    const from = start.getTime();
    const to = end.getTime();

    return [...this.results.values()]
      .filter((result) => {
        const at = result.checkedAt.getTime();
        return at >= from && at < to;
      })
      .sort((a, b) => a.checkedAt.getTime() - b.checkedAt.getTime());
  }

  async deleteResultsBefore(cutoff: Date): Promise<number> {
    this.assertOpen();
    let deleted = 0;

    for (const [key, result] of this.results) {
      if (result.checkedAt.getTime() < cutoff.getTime()) {
        this.results.delete(key);
        deleted += 1;
      }
    }

    return deleted;
  }

  async upsertDailyStat(delta: DailyStat): Promise<void> {
    this.assertOpen();
    const key = statKey(delta.targetId, delta.day);
    this.stats.set(key, mergeDailyStats(this.stats.get(key), delta));
  }

  async dailyStats(targetId?: string): Promise<DailyStat[]> {
    this.assertOpen();
    return [...this.stats.values()]
      .filter((stat) => targetId === undefined || stat.targetId === targetId)
      .sort(byTargetThenDay);
  }

  async syncTargets(targets: readonly TargetConfig[]): Promise<void> {
    this.assertOpen();
    const configured = new Set(targets.map((target) => target.id));

    for (const stored of this.targets.values()) {
      if (!configured.has(stored.target.id)) {
        stored.active = false;
      }
    }

    for (const target of targets) {
      this.targets.set(target.id, { target, active: target.active });
    }
  }

  async acquireLease(name: string, now: Date, leaseMs: number): Promise<boolean> {
    this.assertOpen();
    const expiresAt = this.leases.get(name);

    if (expiresAt !== undefined && expiresAt > now.getTime()) {
      return false;
    }

    this.leases.set(name, now.getTime() + leaseMs);
    return true;
  }

  async releaseLease(name: string): Promise<void> {
    this.leases.delete(name);
  }

  async recordRollupCycle(cycle: RollupCycle): Promise<void> {
    this.assertOpen();
    this.cycles.set(cycle.cutoff.getTime(), { ...cycle });
  }

  async latestRollupCycle(): Promise<RollupCycle | null> {
    this.assertOpen();
    let latest: RollupCycle | null = null;

    for (const cycle of this.cycles.values()) {
      if (!latest || cycle.cutoff.getTime() > latest.cutoff.getTime()) {
        latest = cycle;
      }
    }

    return latest ? { ...latest } : null;
  }

  async markRollupPurged(cutoff: Date, rowsPurged: number, purgedAt: Date): Promise<void> {
    this.assertOpen();
    const cycle = this.cycles.get(cutoff.getTime());

    if (!cycle) {
      throw new StorageError(`No rollup cycle recorded for cutoff ${cutoff.toISOString()}`);
    }

    this.cycles.set(cutoff.getTime(), { ...cycle, rowsPurged, purgedAt });
  }

  transaction<T>(fn: (tx: RollupTransaction) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.assertOpen();
      const stats = new Map(this.stats);
      const cycles = new Map(this.cycles);

      try {
        return await fn(this);
      } catch (error) {
        this.stats = stats;
        this.cycles = cycles;
        throw error;
      }
    };

    const next = this.transactionTail.then(run, run);
    this.transactionTail = next.catch(() => undefined);
    return next;
  }

  async recentSummary(now: Date): Promise<TargetSummary[]> {
    this.assertOpen();
    const since = now.getTime() - SUMMARY_WINDOW_MS;
    const summaries = new Map<string, TargetSummary & { samples: number; sum: number }>();

    for (const result of this.results.values()) {
      const at = result.checkedAt.getTime();
      if (at <= since || at > now.getTime()) {
        continue;
      }

      let summary = summaries.get(result.targetId);
      if (!summary) {
        summary = {
          targetId: result.targetId,
          url: this.targets.get(result.targetId)?.target.url ?? result.url,
          totalChecks: 0,
          successfulChecks: 0,
          failureCount: 0,
          avgResponseTimeMs: null,
          lastCheckAt: null,
          lastFailureAt: null,
          samples: 0,
          sum: 0,
        };
        summaries.set(result.targetId, summary);
      }

      summary.totalChecks += 1;
      if (result.success) {
        summary.successfulChecks += 1;
      } else {
        summary.failureCount += 1;
        if (!summary.lastFailureAt || at > summary.lastFailureAt.getTime()) {
          summary.lastFailureAt = result.checkedAt;
        }
      }

      if (!summary.lastCheckAt || at > summary.lastCheckAt.getTime()) {
        summary.lastCheckAt = result.checkedAt;
      }

      const responseTime = responseTimeOf(result);
      if (responseTime !== null) {
        summary.samples += 1;
        summary.sum += responseTime;
      }
    }

    return [...summaries.values()]
      .map(({ samples, sum, ...summary }) => ({
        ...summary,
        avgResponseTimeMs: samples === 0 ? null : Math.round((sum / samples) * 100) / 100,
      }))
      .sort(
        (a, b) =>
          b.failureCount - a.failureCount ||
          (b.avgResponseTimeMs ?? -1) - (a.avgResponseTimeMs ?? -1) ||
          a.targetId.localeCompare(b.targetId),
      );
  }

  /** Stored targets and whether they are still active. */
  listTargets(): Array<{ id: string; url: string; active: boolean }> {
    return [...this.targets.values()].map(({ target, active }) => ({
      id: target.id,
      url: target.url,
      active,
    }));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageError("Store is closed");
    }
  }
}
