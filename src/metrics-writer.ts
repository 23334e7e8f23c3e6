import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { silentLogger, type Logger } from "./logging";
import type { PipelineMetrics } from "./metrics";
import { serializeMetricsToPrometheusTextfile } from "./prometheus-textfile";

export interface MetricsTextfileWriterOptions {
  path: string;
  metrics: PipelineMetrics;
  intervalMs: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Periodically writes the pipeline metrics to a Prometheus textfile. Each write goes to a
 * temporary file beside the target that is then renamed over it, so collectors never read a
 * partial file.
 */
export class MetricsTextfileWriter {
  private readonly options: MetricsTextfileWriterOptions;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(options: MetricsTextfileWriterOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new TypeError("intervalMs must be greater than 0");
    }

    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async writeOnce(): Promise<void> {
    const { path, metrics } = this.options;
    const contents = serializeMetricsToPrometheusTextfile(metrics.snapshot(), this.clock());
    const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);

    try {
      await writeFile(tempPath, contents, "utf8");
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }

    this.tick();
    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
  }

  /** Stops the interval and writes a final snapshot. A failed final write is logged. */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }

    await this.inFlight;

    try {
      await this.writeOnce();
    } catch (error) {
      this.logger.warn("final metrics textfile write failed", { path: this.options.path, error });
    }
  }

  private tick(): void {
    if (this.inFlight) {
      return;
    }

    this.inFlight = this.writeOnce()
      .catch((error: unknown) => {
        this.logger.warn("metrics textfile write failed", { path: this.options.path, error });
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
