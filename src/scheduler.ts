import { responseTimeOf, type CheckResult, type TargetConfig } from "./domain";
import { ExecutorClosedError, WorkerBusyError } from "./errors/executor";
import type { Executor } from "./executor/types";
import { silentLogger, type Logger } from "./logging";
import { PipelineMetrics } from "./metrics";
import type { ResultRecorder } from "./sink";

export interface SchedulerOptions {
  executor: Executor;
  sink: ResultRecorder;
  /** Delay between two ticks in milliseconds. */
  tickMs: number;
  metrics?: PipelineMetrics;
  logger?: Logger;
  /** Monotonic clock in milliseconds; due times live on it. */
  now?: () => number;
  /** Wall clock stamped on dispatched tasks. */
  clock?: () => Date;
  /**
   * Optional overrides for scheduling functions (mainly for tests).
   */
  setTimeoutFn?: (callback: () => void, delay: number) => ReturnType<typeof setTimeout>;
  clearTimeoutFn?: (handle: ReturnType<typeof setTimeout>) => void;
}

export interface SchedulerStopOptions {
  /** How long in-flight probes and pending writes may take before the executor is forced. */
  graceMs?: number;
}

export interface SchedulerStopReport {
  /** In-flight probes that finished during the grace period. */
  drained: number;
  /** Probes still in flight when the executor was force-closed. */
  abandoned: number;
}

export interface TargetScheduleState {
  id: string;
  nextDueAt: number;
  inFlight: boolean;
}

interface TargetState {
  target: TargetConfig;
  nextDueAt: number;
}

/**
 * Dispatches due targets to the executor on a fixed tick. Each target has at most one probe in
 * flight, and due times advance on the interval grid anchored at the first due time, so late
 * probes never shift later ones.
 */
export class Scheduler {
  private readonly executor: Executor;
  private readonly sink: ResultRecorder;
  private readonly tickMs: number;
  private readonly metrics: PipelineMetrics;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly clock: () => Date;
  private readonly setTimeoutFn: (
    callback: () => void,
    delay: number,
  ) => ReturnType<typeof setTimeout>;
  private readonly clearTimeoutFn: (handle: ReturnType<typeof setTimeout>) => void;
  private readonly inFlight = new Set<string>();
  private readonly pending = new Set<Promise<void>>();

  private states = new Map<string, TargetState>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private stopping = false;
  /** Set once the grace period has ended; completions after that are not recorded. */
  private abandoning = false;

  constructor(options: SchedulerOptions) {
    if (!Number.isFinite(options.tickMs) || options.tickMs <= 0) {
      throw new TypeError("tickMs must be greater than 0");
    }

    this.executor = options.executor;
    this.sink = options.sink;
    this.tickMs = options.tickMs;
    this.metrics = options.metrics ?? new PipelineMetrics();
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
    this.setTimeoutFn = options.setTimeoutFn ?? ((cb, delay) => setTimeout(cb, delay));
    this.clearTimeoutFn = options.clearTimeoutFn ?? ((handle) => clearTimeout(handle));
  }

  /**
   * Swaps the whole target set in one step. Known targets keep their due time and in-flight
   * flag; new targets are due immediately; inactive targets are left out.
   */
  replaceTargets(targets: readonly TargetConfig[]): void {
    const now = this.now();
    const next = new Map<string, TargetState>();

    for (const target of targets) {
      if (!target.active || next.has(target.id)) {
        continue;
      }

      const existing = this.states.get(target.id);
      next.set(target.id, { target, nextDueAt: existing ? existing.nextDueAt : now });
    }

    this.states = next;
    this.metrics.retainTargets(next.keys());
    this.updateGauges();
  }

  targetStates(): TargetScheduleState[] {
    return [...this.states.values()].map((state) => ({
      id: state.target.id,
      nextDueAt: state.nextDueAt,
      inFlight: this.inFlight.has(state.target.id),
    }));
  }

  /**
   * Starts the tick loop; the first tick runs right away. Subsequent calls are ignored until
   * stop() is invoked.
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    this.stopping = false;
    this.abandoning = false;
    this.scheduleTick(0);
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Visits targets in insertion order and submits every due target that is not in flight. A
   * full executor defers the target and ends dispatch for this tick.
   */
  tick(): void {
    const now = this.now();

    for (const state of this.states.values()) {
      const { target } = state;

      if (this.inFlight.has(target.id) || state.nextDueAt > now) {
        continue;
      }

      const scheduledAt = this.clock();
      const outcome = this.executor.submit({ target, scheduledAt });

      if (!outcome.accepted) {
        this.metrics.increment("deferred");
        this.logger.debug("dispatch deferred", { targetId: target.id, reason: outcome.reason });
        break;
      }

      const dueAt = state.nextDueAt;
      this.inFlight.add(target.id);
      this.advance(state, now);
      this.metrics.increment("dispatched");
      this.track(target, scheduledAt, dueAt, outcome.completion);
    }

    this.updateGauges();
  }

  /**
   * Stops dispatching, waits up to the grace period for in-flight probes and pending writes,
   * then force-closes the executor.
   */
  async stop(options: SchedulerStopOptions = {}): Promise<SchedulerStopReport> {
    this.running = false;
    this.stopping = true;

    if (this.timer !== null) {
      this.clearTimeoutFn(this.timer);
      this.timer = null;
    }

    const inFlightAtStop = this.inFlight.size;
    await this.waitForPending(options.graceMs ?? 0);
    const abandoned = this.inFlight.size;
    this.abandoning = true;

    await this.executor.close({ force: true });
    this.updateGauges();

    if (abandoned > 0) {
      this.logger.warn("abandoned in-flight probes at shutdown", { abandoned });
    }

    return { drained: inFlightAtStop - abandoned, abandoned };
  }

  private scheduleTick(delay: number): void {
    this.timer = this.setTimeoutFn(() => {
      this.timer = null;

      if (!this.running) {
        return;
      }

      try {
        this.tick();
      } catch (error) {
        this.logger.error("scheduler tick failed", { error });
      }

      if (this.running) {
        this.scheduleTick(this.tickMs);
      }
    }, delay);
  }

  private advance(state: TargetState, now: number): void {
    const interval = state.target.intervalMs;
    const next = state.nextDueAt + interval;

    if (next > now) {
      state.nextDueAt = next;
      return;
    }

    const missed = Math.floor((now - next) / interval) + 1;
    state.nextDueAt = next + missed * interval;
    this.metrics.increment("skipped_slots", missed);
    this.logger.debug("skipped missed slots", { targetId: state.target.id, missed });
  }

  private track(
    target: TargetConfig,
    scheduledAt: Date,
    dueAt: number,
    completion: Promise<CheckResult>,
  ): void {
    const settled = completion
      .then(
        (result): CheckResult | null => result,
        (error: unknown): CheckResult | null => {
          if (this.abandoning || (this.stopping && error instanceof ExecutorClosedError)) {
            return null;
          }

          if (error instanceof WorkerBusyError) {
            this.restoreDueAt(target, dueAt);
            this.metrics.increment("deferred");
            this.logger.debug("dispatch deferred", { targetId: target.id, reason: "workers_busy" });
            return null;
          }

          this.metrics.increment("executor_failures");
          this.logger.warn("probe task failed in the executor", { targetId: target.id, error });
          return executorFailureResult(target, scheduledAt, error);
        },
      )
      .then(async (result) => {
        this.inFlight.delete(target.id);
        this.metrics.increment("completed");
        this.updateGauges();

        if (result === null || this.abandoning) {
          return;
        }

        this.metrics.recordTargetStatus(target.id, {
          up: result.success,
          responseTimeMs: responseTimeOf(result) ?? undefined,
        });
        await this.sink.record(result);
      })
      .catch((error: unknown) => {
        this.logger.error("result handling failed", { targetId: target.id, error });
      })
      .finally(() => {
        this.pending.delete(settled);
      });

    this.pending.add(settled);
  }

  /** The task never ran, so its slot becomes due again on the next tick. */
  private restoreDueAt(target: TargetConfig, dueAt: number): void {
    const state = this.states.get(target.id);

    if (state && dueAt < state.nextDueAt) {
      state.nextDueAt = dueAt;
    }
  }

  private waitForPending(graceMs: number): Promise<void> {
    if (this.pending.size === 0) {
      return Promise.resolve();
    }

    const all = Promise.allSettled([...this.pending]);

    return new Promise((resolve) => {
      const timer = this.setTimeoutFn(() => resolve(), Math.max(0, graceMs));
      void all.then(() => {
        this.clearTimeoutFn(timer);
        resolve();
      });
    });
  }

  private updateGauges(): void {
    const stats = this.executor.stats();
    this.metrics.setGauge("in_flight", this.inFlight.size);
    this.metrics.setGauge("executor_active", stats.active);
    this.metrics.setGauge("executor_queued", stats.queued);
    this.metrics.setGauge("targets", this.states.size);
  }
}

function executorFailureResult(
  target: TargetConfig,
  scheduledAt: Date,
  error: unknown,
): CheckResult {
  return {
    targetId: target.id,
    url: target.url,
    checkedAt: scheduledAt,
    timings: { totalMs: 0 },
    success: false,
    patternMatched: null,
    failure: {
      reason: "unknown",
      message: error instanceof Error ? error.message : String(error),
    },
    details: {
      attempts: 0,
      retries: 0,
      errorName: error instanceof Error ? error.name : undefined,
    },
  };
}
