import type { EventEmitter } from "node:events";

import { RetentionAggregator } from "./aggregator";
import type { MonitorSettings, StorageSettings } from "./config/settings";
import { createExecutor } from "./executor";
import type { TimedRequestFunction } from "./http/request";
import { silentLogger, type Logger } from "./logging";
import { PipelineMetrics } from "./metrics";
import { MetricsTextfileWriter } from "./metrics-writer";
import { Prober } from "./probe";
import { Scheduler, type SchedulerStopReport } from "./scheduler";
import { ResultSink } from "./sink";
import { openStore } from "./storage";
import type { MonitorStore } from "./storage/types";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export interface MonitorServiceOptions {
  settings: MonitorSettings;
  /** Reads the configuration again; reload() is a no-op without it. */
  reloadSettings?: () => Promise<MonitorSettings>;
  openStore?: (settings: StorageSettings, logger: Logger) => Promise<MonitorStore>;
  /** Request function handed to the in-process prober. */
  request?: TimedRequestFunction;
  clock?: () => Date;
  logger?: Logger;
}

type ServiceState = "idle" | "starting" | "running" | "stopping" | "stopped";

interface RunningPipeline {
  store: MonitorStore;
  scheduler: Scheduler;
  aggregator: RetentionAggregator;
  writer: MetricsTextfileWriter | null;
}

/**
 * Wires storage, the executor backend, the scheduler, the retention aggregator and the metrics
 * writer together and owns their lifecycle.
 */
export class MonitorService {
  readonly metrics = new PipelineMetrics();

  private readonly options: MonitorServiceOptions;
  private readonly logger: Logger;
  private settings: MonitorSettings;
  private pipeline: RunningPipeline | null = null;
  private state: ServiceState = "idle";
  private shutdownPromise: Promise<SchedulerStopReport> | null = null;
  private reloading: Promise<boolean> | null = null;

  constructor(options: MonitorServiceOptions) {
    this.options = options;
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
  }

  get currentSettings(): MonitorSettings {
    return this.settings;
  }

  async start(): Promise<void> {
    if (this.state !== "idle") {
      throw new Error(`Monitor cannot start while ${this.state}`);
    }

    this.state = "starting";
    const settings = this.settings;
    const open = this.options.openStore ?? openStore;
    const store = await open(settings.storage, this.logger.child({ component: "storage" }));

    try {
      await store.syncTargets(settings.targets);
    } catch (error) {
      await store.close();
      this.state = "idle";
      throw error;
    }

    const prober = new Prober({
      ...settings.probe,
      request: this.options.request,
      clock: this.options.clock,
      logger: this.logger.child({ component: "probe" }),
    });

    const executor = createExecutor(settings.backend, {
      concurrency: settings.concurrency,
      queueDepth: settings.queueDepth,
      run: (task, signal) => prober.check(task.target, { signal }),
      logger: this.logger.child({ component: "executor" }),
    });

    const sink = new ResultSink({
      store,
      writeRetries: settings.storage.writeRetries,
      writeBackoffMs: settings.storage.writeBackoffMs,
      metrics: this.metrics,
      logger: this.logger.child({ component: "sink" }),
    });

    const scheduler = new Scheduler({
      executor,
      sink,
      tickMs: settings.tickMs,
      metrics: this.metrics,
      clock: this.options.clock,
      logger: this.logger.child({ component: "scheduler" }),
    });

    const aggregator = new RetentionAggregator({
      store,
      ...settings.retention,
      clock: this.options.clock,
      metrics: this.metrics,
      logger: this.logger.child({ component: "aggregator" }),
    });

    const writer =
      settings.metrics.textfile === undefined
        ? null
        : new MetricsTextfileWriter({
            path: settings.metrics.textfile,
            intervalMs: settings.metrics.intervalMs,
            metrics: this.metrics,
            clock: this.options.clock,
            logger: this.logger.child({ component: "metrics" }),
          });

    scheduler.replaceTargets(settings.targets);
    scheduler.start();
    aggregator.start();
    writer?.start();

    this.pipeline = { store, scheduler, aggregator, writer };
    this.state = "running";
    this.logger.info("monitor started", {
      backend: settings.backend.kind,
      targets: scheduler.targetStates().length,
      storageUrl: settings.storage.url,
    });
  }

  /**
   * Re-reads the configuration and swaps the target set. Never rejects: a configuration that
   * fails to load leaves the current targets in place. Only targets are reloaded; other
   * settings need a restart.
   */
  reload(): Promise<boolean> {
    if (this.reloading) {
      return this.reloading;
    }

    this.reloading = this.reloadTargets().finally(() => {
      this.reloading = null;
    });
    return this.reloading;
  }

  /**
   * Stops dispatching, drains or abandons in-flight probes after the grace period, then stops
   * the aggregator and the metrics writer and closes storage. Safe to call more than once.
   */
  shutdown(): Promise<SchedulerStopReport> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stopPipeline();
    }

    return this.shutdownPromise;
  }

  private async reloadTargets(): Promise<boolean> {
    const { reloadSettings } = this.options;
    const pipeline = this.pipeline;

    if (!reloadSettings || !pipeline || this.state !== "running") {
      return false;
    }

    let next: MonitorSettings;
    try {
      next = await reloadSettings();
    } catch (error) {
      this.logger.error("configuration reload failed, keeping current targets", { error });
      return false;
    }

    if (this.state !== "running") {
      return false;
    }

    try {
      await pipeline.store.syncTargets(next.targets);
    } catch (error) {
      this.logger.error("target sync failed, keeping current targets", { error });
      return false;
    }

    pipeline.scheduler.replaceTargets(next.targets);
    this.settings = { ...this.settings, targets: next.targets };
    this.logger.info("configuration reloaded", {
      targets: pipeline.scheduler.targetStates().length,
    });
    return true;
  }

  private async stopPipeline(): Promise<SchedulerStopReport> {
    const pipeline = this.pipeline;
    this.state = "stopping";

    if (!pipeline) {
      this.state = "stopped";
      return { drained: 0, abandoned: 0 };
    }

    this.logger.info("monitor stopping", { graceMs: this.settings.shutdownGraceMs });

    try {
      const report = await pipeline.scheduler.stop({ graceMs: this.settings.shutdownGraceMs });
      await pipeline.aggregator.stop();
      await pipeline.writer?.stop();
      this.logger.info("monitor stopped", { ...report });
      return report;
    } finally {
      await pipeline.store.close();
      this.pipeline = null;
      this.state = "stopped";
    }
  }
}

export type SignalSource = Pick<EventEmitter, "on" | "removeListener">;

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ["SIGINT", "SIGTERM"];

/** Resolves with the first SIGINT or SIGTERM and removes its listeners again. */
export function waitForShutdownSignal(signals: SignalSource = process): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const listeners = new Map<ShutdownSignal, () => void>();

    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = () => {
        for (const [name, registered] of listeners) {
          signals.removeListener(name, registered);
        }
        resolve(signal);
      };
      listeners.set(signal, listener);
      signals.on(signal, listener);
    }
  });
}

/**
 * Runs the service until SIGINT or SIGTERM, reloading targets on SIGHUP. Resolves with the
 * shutdown report once everything is closed.
 */
export async function runUntilSignal(
  service: MonitorService,
  signals: SignalSource = process,
): Promise<SchedulerStopReport & { signal: ShutdownSignal }> {
  await service.start();

  const onHangup = () => {
    void service.reload();
  };
  signals.on("SIGHUP", onHangup);

  try {
    const signal = await waitForShutdownSignal(signals);
    const report = await service.shutdown();
    return { ...report, signal };
  } finally {
    signals.removeListener("SIGHUP", onHangup);
  }
}
