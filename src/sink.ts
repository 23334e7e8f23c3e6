import type { CheckResult } from "./domain";
import { silentLogger, type Logger } from "./logging";
import type { PipelineMetrics } from "./metrics";
import { retryOperation } from "./retry";
import type { MonitorStore } from "./storage/types";

export type RecordOutcome = "recorded" | "duplicate" | "dropped";

export interface ResultRecorder {
  /** Never rejects. */
  record(result: CheckResult): Promise<RecordOutcome>;
}

export interface ResultSinkOptions {
  store: Pick<MonitorStore, "insertResult">;
  /** Retries after the first failed write. */
  writeRetries: number;
  /** Initial backoff between write attempts; 0 retries immediately. */
  writeBackoffMs: number;
  metrics?: PipelineMetrics;
  logger?: Logger;
  wait?: (delayMs: number) => Promise<void>;
  random?: () => number;
}

/**
 * Persists check results. Writes are idempotent per (targetId, checkedAt); failed writes are
 * retried with backoff and then dropped and counted.
 */
export class ResultSink implements ResultRecorder {
  private readonly options: ResultSinkOptions;
  private readonly logger: Logger;

  constructor(options: ResultSinkOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  async record(result: CheckResult): Promise<RecordOutcome> {
    const { store, writeRetries, writeBackoffMs, metrics, wait } = this.options;

    try {
      const inserted = await retryOperation(() => store.insertResult(result), {
        retries: writeRetries,
        backoff:
          writeBackoffMs > 0
            ? { initialDelayMs: writeBackoffMs, random: this.options.random }
            : undefined,
        wait: wait ? (delayMs) => wait(delayMs) : undefined,
      });

      if (inserted) {
        metrics?.increment("results_recorded");
        return "recorded";
      }

      metrics?.increment("results_duplicate");
      this.logger.debug("duplicate check result ignored", {
        targetId: result.targetId,
        checkedAt: result.checkedAt,
      });
      return "duplicate";
    } catch (error) {
      metrics?.increment("results_dropped");
      this.logger.warn("dropping check result after write retries", {
        targetId: result.targetId,
        checkedAt: result.checkedAt,
        attempts: writeRetries + 1,
        error,
      });
      return "dropped";
    }
  }
}
