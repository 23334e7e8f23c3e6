import pLimit, { type LimitFunction } from "p-limit";
import { request, type Dispatcher } from "undici";

import type { CheckResult } from "../domain";
import { ExecutorClosedError, WorkerBusyError, WorkerLostError } from "../errors/executor";
import { createKeepAliveAgent, type KeepAliveAgent } from "../http/keep-alive";
import { silentLogger, type Logger } from "../logging";
import { redactUrlCredentials } from "../redaction";
import type {
  Executor,
  ExecutorCloseOptions,
  ExecutorStats,
  ProbeTask,
  SubmitOutcome,
} from "./types";
import { decodeCheckResult, encodeTask } from "./wire";

export interface RemoteExecutorOptions {
  /** Base URLs of the worker nodes, e.g. http://10.0.0.5:7400 or http://lb.internal/sitepulse. */
  workers: readonly string[];
  workerConcurrency: number;
  queueDepth: number;
  /** Upper bound for one dispatch, probe included. */
  dispatchTimeoutMs: number;
  /** How long a worker is skipped after it failed a dispatch. */
  cooldownMs: number;
  /** Defaults to a keep-alive agent owned by the executor. */
  dispatcher?: Dispatcher;
  now?: () => number;
  logger?: Logger;
}

interface WorkerState {
  readonly url: string;
  readonly tasksUrl: URL;
  active: number;
  cooldownUntil: number;
}

export interface WorkerSnapshot {
  url: string;
  active: number;
  coolingDown: boolean;
}

/** Resolves `tasks` below the base URL, keeping any path prefix such as a proxy mount. */
function tasksUrlOf(base: string): URL {
  return new URL("tasks", base.endsWith("/") ? base : `${base}/`);
}

/**
 * Dispatches probe tasks to remote worker nodes over HTTP. A worker that answers 503 did not run
 * the task, so the task moves on to the next worker; when all of them are busy it rejects with
 * WorkerBusyError. Any other failed dispatch rejects with WorkerLostError and benches the worker
 * for the cooldown.
 */
export class RemoteExecutor implements Executor {
  readonly maxConcurrency: number;

  private readonly options: RemoteExecutorOptions;
  private readonly workers: WorkerState[];
  private readonly limit: LimitFunction;
  private readonly keepAlive: KeepAliveAgent | null;
  private readonly dispatcher: Dispatcher;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly running = new Set<AbortController>();
  private readonly idleWaiters: Array<() => void> = [];

  private outstanding = 0;
  private closed = false;
  private forced = false;

  constructor(options: RemoteExecutorOptions) {
    if (options.workers.length === 0) {
      throw new TypeError("RemoteExecutor requires at least one worker");
    }

    if (!Number.isInteger(options.workerConcurrency) || options.workerConcurrency < 1) {
      throw new TypeError("workerConcurrency must be an integer greater than or equal to 1");
    }

    this.options = options;
    this.workers = options.workers.map((url) => ({
      url,
      tasksUrl: tasksUrlOf(url),
      active: 0,
      cooldownUntil: 0,
    }));
    this.maxConcurrency = options.workers.length * options.workerConcurrency;
    this.limit = pLimit(this.maxConcurrency);

    if (options.dispatcher) {
      this.keepAlive = null;
      this.dispatcher = options.dispatcher;
    } else {
      const keepAlive = createKeepAliveAgent({ connections: options.workerConcurrency });
      this.keepAlive = keepAlive;
      this.dispatcher = keepAlive.agent;
    }

    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;
  }

  submit(task: ProbeTask): SubmitOutcome {
    if (this.closed) {
      return { accepted: false, reason: "closed" };
    }

    if (this.outstanding >= this.maxConcurrency + this.options.queueDepth) {
      return { accepted: false, reason: "capacity_exceeded" };
    }

    this.outstanding += 1;

    const completion = this.limit(() => this.dispatch(task)).finally(() => {
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
      capacity: this.maxConcurrency + this.options.queueDepth,
    };
  }

  workerSnapshot(): WorkerSnapshot[] {
    const now = this.now();
    return this.workers.map((worker) => ({
      url: worker.url,
      active: worker.active,
      coolingDown: worker.cooldownUntil > now,
    }));
  }

  async close(options: ExecutorCloseOptions = {}): Promise<void> {
    this.closed = true;

    if (options.force) {
      this.forced = true;
      for (const controller of this.running) {
        controller.abort(new ExecutorClosedError("Executor was force-closed"));
      }
      await this.keepAlive?.destroy();
      return;
    }

    await this.onIdle();
    await this.keepAlive?.close();
  }

  onIdle(): Promise<void> {
    if (this.outstanding === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pickWorker(skip: ReadonlySet<WorkerState>): WorkerState | null {
    const now = this.now();
    let chosen: WorkerState | null = null;

    for (const worker of this.workers) {
      if (
        skip.has(worker) ||
        worker.cooldownUntil > now ||
        worker.active >= this.options.workerConcurrency
      ) {
        continue;
      }

      if (!chosen || worker.active < chosen.active) {
        chosen = worker;
      }
    }

    return chosen;
  }

  private async dispatch(task: ProbeTask): Promise<CheckResult> {
    const busy = new Set<WorkerState>();

    for (;;) {
      if (this.forced) {
        throw new ExecutorClosedError("Executor closed before the task started");
      }

      const worker = this.pickWorker(busy);

      if (!worker) {
        if (busy.size > 0) {
          throw new WorkerBusyError(`All ${busy.size} tried worker(s) are busy`, task.target.id);
        }
        throw new WorkerLostError("No worker available", { targetId: task.target.id });
      }

      const result = await this.send(worker, task);

      if (result !== null) {
        return result;
      }

      busy.add(worker);
      this.logger.debug("worker busy, trying the next one", {
        workerUrl: redactUrlCredentials(worker.url),
        targetId: task.target.id,
      });
    }
  }

  /** Resolves with null when the worker answered 503 without running the task. */
  private async send(worker: WorkerState, task: ProbeTask): Promise<CheckResult | null> {
    const controller = new AbortController();
    this.running.add(controller);
    worker.active += 1;

    try {
      const response = await request(worker.tasksUrl, {
        method: "POST",
        dispatcher: this.dispatcher,
        headers: { "content-type": "application/json" },
        body: JSON.stringify(encodeTask(task)),
        signal: controller.signal,
        headersTimeout: this.options.dispatchTimeoutMs,
        bodyTimeout: this.options.dispatchTimeoutMs,
      });

      if (response.statusCode === 503) {
        await response.body.dump();
        return null;
      }

      if (response.statusCode !== 200) {
        await response.body.dump();
        throw new WorkerLostError(`Worker answered with HTTP ${response.statusCode}`, {
          worker: worker.url,
          targetId: task.target.id,
        });
      }

      const payload = await response.body.json();
      return decodeCheckResult(payload);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new ExecutorClosedError("Executor was force-closed");
      }

      this.coolDown(worker, error);

      if (error instanceof WorkerLostError) {
        throw error;
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new WorkerLostError(`Dispatch to worker failed: ${message}`, {
        worker: worker.url,
        targetId: task.target.id,
        cause: error,
      });
    } finally {
      worker.active -= 1;
      this.running.delete(controller);
    }
  }

  private coolDown(worker: WorkerState, error: unknown): void {
    worker.cooldownUntil = this.now() + this.options.cooldownMs;
    this.logger.warn("worker dispatch failed, cooling down", {
      workerUrl: redactUrlCredentials(worker.url),
      cooldownMs: this.options.cooldownMs,
      error,
    });
  }
}
