import pLimit, { type LimitFunction } from "p-limit";

import type { CheckResult } from "../domain";
import { ExecutorClosedError } from "../errors/executor";
import type {
  Executor,
  ExecutorCloseOptions,
  ExecutorStats,
  ProbeRunner,
  ProbeTask,
  SubmitOutcome,
} from "./types";

export interface LocalExecutorOptions {
  /** Number of probes running at the same time. */
  concurrency: number;
  /** Accepted tasks that may wait for a slot. */
  queueDepth: number;
  run: ProbeRunner;
}

function validateNonNegativeInteger(name: string, value: number, minimum: number): void {
  if (!Number.isInteger(value) || value < minimum) {
    throw new TypeError(`${name} must be an integer greater than or equal to ${minimum}`);
  }
}

/**
 * In-process worker pool backed by p-limit.
 */
export class LocalExecutor implements Executor {
  readonly maxConcurrency: number;

  private readonly queueDepth: number;
  private readonly limit: LimitFunction;
  private readonly run: ProbeRunner;
  private readonly running = new Set<AbortController>();
  private readonly idleWaiters: Array<() => void> = [];

  private outstanding = 0;
  private closed = false;
  private forced = false;

  constructor(options: LocalExecutorOptions) {
    validateNonNegativeInteger("concurrency", options.concurrency, 1);
    validateNonNegativeInteger("queueDepth", options.queueDepth, 0);

    this.maxConcurrency = options.concurrency;
    this.queueDepth = options.queueDepth;
    this.limit = pLimit(options.concurrency);
    this.run = options.run;
  }

  submit(task: ProbeTask): SubmitOutcome {
    if (this.closed) {
      return { accepted: false, reason: "closed" };
    }

    if (this.outstanding >= this.maxConcurrency + this.queueDepth) {
      return { accepted: false, reason: "capacity_exceeded" };
    }

    this.outstanding += 1;

    const completion = this.limit(() => this.execute(task)).finally(() => {
      this.outstanding -= 1;
      if (this.outstanding === 0) {
        for (const resolve of this.idleWaiters.splice(0, this.idleWaiters.length)) {
          resolve();
        }
      }
    });

    return { accepted: true, completion };
  }

  stats(): ExecutorStats {
    const active = this.limit.activeCount;
    return {
      active,
      queued: Math.max(0, this.outstanding - active),
      capacity: this.maxConcurrency + this.queueDepth,
    };
  }

  /**
   * Stops accepting tasks. A graceful close waits for accepted tasks; a forced close aborts
   * running probes and rejects queued tasks with ExecutorClosedError.
   */
  async close(options: ExecutorCloseOptions = {}): Promise<void> {
    this.closed = true;

    if (options.force) {
      this.forced = true;
      for (const controller of this.running) {
        controller.abort(new ExecutorClosedError("Executor was force-closed"));
      }
      return;
    }

    await this.onIdle();
  }

  onIdle(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async execute(task: ProbeTask): Promise<CheckResult> {
    if (this.forced) {
      throw new ExecutorClosedError("Executor closed before the task started");
    }

    const controller = new AbortController();
    this.running.add(controller);

    try {
      const result = await this.run(task, controller.signal);
      // Runners that settle with a cancelled result still count as abandoned.
      if (this.forced && controller.signal.aborted) {
        throw new ExecutorClosedError("Task was aborted by a forced close");
      }
      return result;
    } finally {
      this.running.delete(controller);
    }
  }
}
