import type { CheckResult, TargetConfig } from "../domain";

export interface ProbeTask {
  target: TargetConfig;
  /** Wall-clock time the scheduler dispatched the task. */
  scheduledAt: Date;
}

export type SubmitRejectionReason = "capacity_exceeded" | "closed";

export type SubmitOutcome =
  | { accepted: true; completion: Promise<CheckResult> }
  | { accepted: false; reason: SubmitRejectionReason };

export interface ExecutorStats {
  /** Tasks currently running. */
  active: number;
  /** Accepted tasks waiting for a free slot. */
  queued: number;
  /** Largest number of outstanding tasks accepted at once. */
  capacity: number;
}

export interface ExecutorCloseOptions {
  /** Abort running tasks and reject queued ones instead of draining them. */
  force?: boolean;
}

/**
 * Runs probe tasks with bounded concurrency. `submit` never blocks: a full executor answers
 * with a rejection the caller can defer on.
 */
export interface Executor {
  readonly maxConcurrency: number;
  submit(task: ProbeTask): SubmitOutcome;
  stats(): ExecutorStats;
  close(options?: ExecutorCloseOptions): Promise<void>;
}

export type ProbeRunner = (task: ProbeTask, signal: AbortSignal) => Promise<CheckResult>;
