export const COUNTER_DEFINITIONS = [
  { name: "dispatched", help: "probe tasks handed to the executor" },
  { name: "deferred", help: "due probes deferred because the executor was full" },
  { name: "skipped_slots", help: "schedule slots skipped to stay on the interval grid" },
  { name: "completed", help: "probe tasks that settled" },
  { name: "executor_failures", help: "accepted probe tasks the executor failed to run" },
  { name: "results_recorded", help: "check results written to storage" },
  { name: "results_duplicate", help: "check results already present in storage" },
  { name: "results_dropped", help: "check results dropped after write retries" },
  { name: "rollup_cycles", help: "completed rollup cycles" },
  { name: "rollup_rows_summarized", help: "raw results folded into daily stats" },
  { name: "rollup_rows_purged", help: "raw results deleted by retention" },
] as const;

export const GAUGE_DEFINITIONS = [
  { name: "in_flight", help: "targets with a probe in flight" },
  { name: "executor_active", help: "tasks running in the executor" },
  { name: "executor_queued", help: "tasks waiting for an executor slot" },
  { name: "targets", help: "active targets in the schedule" },
] as const;

export type CounterName = (typeof COUNTER_DEFINITIONS)[number]["name"];
export type GaugeName = (typeof GAUGE_DEFINITIONS)[number]["name"];

export interface TargetStatus {
  up: boolean;
  /** Absent when the last probe got no response. */
  responseTimeMs?: number;
}

export interface MetricsSnapshot {
  counters: ReadonlyMap<CounterName, number>;
  gauges: ReadonlyMap<GaugeName, number>;
  targets: ReadonlyMap<string, TargetStatus>;
}

/**
 * Process-local counters and gauges of the monitoring pipeline. Components share one instance;
 * the textfile writer serializes snapshots of it.
 */
export class PipelineMetrics {
  private readonly counters = new Map<CounterName, number>();
  private readonly gauges = new Map<GaugeName, number>();
  private readonly targets = new Map<string, TargetStatus>();

  increment(name: CounterName, by = 1): void {
    this.counters.set(name, this.counter(name) + by);
  }

  setGauge(name: GaugeName, value: number): void {
    this.gauges.set(name, value);
  }

  counter(name: CounterName): number {
    return this.counters.get(name) ?? 0;
  }

  gauge(name: GaugeName): number {
    return this.gauges.get(name) ?? 0;
  }

  recordTargetStatus(targetId: string, status: TargetStatus): void {
    this.targets.set(targetId, { ...status });
  }

  /** Forgets targets that left the schedule. */
  retainTargets(targetIds: Iterable<string>): void {
    const keep = new Set(targetIds);
    for (const targetId of this.targets.keys()) {
      if (!keep.has(targetId)) {
        this.targets.delete(targetId);
      }
    }
  }

  snapshot(): MetricsSnapshot {
    return {
      counters: new Map(this.counters),
      gauges: new Map(this.gauges),
      targets: new Map(this.targets),
    };
  }
}
