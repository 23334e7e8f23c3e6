import type { BackendSettings } from "../config/settings";
import type { Logger } from "../logging";
import { LocalExecutor } from "./local";
import { RemoteExecutor } from "./remote";
import type { Executor, ProbeRunner } from "./types";

export interface CreateExecutorOptions {
  concurrency: number;
  queueDepth: number;
  /** Runs a probe in-process; only the local backend uses it. */
  run: ProbeRunner;
  logger?: Logger;
}

export function createExecutor(backend: BackendSettings, options: CreateExecutorOptions): Executor {
  switch (backend.kind) {
    case "local":
      return new LocalExecutor({
        concurrency: options.concurrency,
        queueDepth: options.queueDepth,
        run: options.run,
      });
    case "distributed":
      return new RemoteExecutor({
        workers: backend.workers,
        workerConcurrency: backend.workerConcurrency,
        queueDepth: options.queueDepth,
        dispatchTimeoutMs: backend.dispatchTimeoutMs,
        cooldownMs: backend.cooldownMs,
        logger: options.logger,
      });
    default: {
      const exhaustiveCheck: never = backend;
      return exhaustiveCheck;
    }
  }
}

export { LocalExecutor } from "./local";
export type { LocalExecutorOptions } from "./local";
export { RemoteExecutor } from "./remote";
export type { RemoteExecutorOptions, WorkerSnapshot } from "./remote";
export type {
  Executor,
  ExecutorCloseOptions,
  ExecutorStats,
  ProbeRunner,
  ProbeTask,
  SubmitOutcome,
  SubmitRejectionReason,
} from "./types";
export { decodeCheckResult, decodeTask, encodeCheckResult, encodeTask } from "./wire";
export type { CheckResultWire, ProbeTaskWire } from "./wire";
