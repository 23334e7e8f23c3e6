import type { TargetConfig } from "../domain";
import { MILLISECONDS_PER_DAY, parseDurationToMilliseconds } from "../duration";
import type { LogLevel } from "../logging";
import { redactHeaders, redactUrlCredentials } from "../redaction";
import { ConfigValidationError } from "./errors";
import type { DurationString, RawMonitorFile, RawTargetConfig } from "./types";

export const DEFAULT_SETTINGS = {
  concurrency: 50,
  queueDepth: 1_000,
  timeout: "10s",
  retryLimit: 3,
  tick: "250ms",
  shutdownGrace: "10s",
  intervalMin: "5s",
  intervalMax: "300s",
  workerConcurrency: 10,
  dispatchTimeout: "60s",
  workerCooldown: "30s",
  workerListen: "0.0.0.0:7400",
  storageUrl: "memory://",
  maxConnections: 10,
  writeRetries: 3,
  writeBackoff: "200ms",
  retentionKeep: "7d",
  retentionCadence: "1d",
  lockLease: "10m",
  logLevel: "info",
  metricsInterval: "15s",
} as const;

export type BackendSettings =
  | { kind: "local" }
  | {
      kind: "distributed";
      workers: string[];
      workerConcurrency: number;
      dispatchTimeoutMs: number;
      cooldownMs: number;
    };

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ProbeSettings {
  timeoutMs: number;
  retryLimit: number;
  retryDelayMs?: number;
  retryBudgetMs?: number;
}

export interface StorageSettings {
  url: string;
  maxConnections: number;
  writeRetries: number;
  writeBackoffMs: number;
}

export interface RetentionSettings {
  retentionDays: number;
  cadenceMs: number;
  lockLeaseMs: number;
}

export interface MetricsSettings {
  textfile?: string;
  intervalMs: number;
}

export interface MonitorSettings {
  concurrency: number;
  queueDepth: number;
  probe: ProbeSettings;
  tickMs: number;
  shutdownGraceMs: number;
  intervalBounds: { minMs: number; maxMs: number };
  backend: BackendSettings;
  worker: { listen: ListenAddress };
  storage: StorageSettings;
  retention: RetentionSettings;
  logLevel: LogLevel;
  metrics: MetricsSettings;
  targets: TargetConfig[];
}

const LISTEN_PATTERN = /^(?:\[(?<ipv6>[^\]]+)\]|(?<host>[^:]+)):(?<port>\d{1,5})$/;

/**
 * Parses `host:port` or `[ipv6]:port`. Returns null for anything else.
 */
export function parseListenAddress(value: string): ListenAddress | null {
  const match = LISTEN_PATTERN.exec(value.trim());
  const groups = match?.groups;

  if (!groups) {
    return null;
  }

  const port = Number.parseInt(groups.port, 10);
  const host = groups.ipv6 ?? groups.host;

  if (!host || port > 65_535) {
    return null;
  }

  return { host, port };
}

class IssueCollector {
  readonly issues: string[] = [];

  duration(path: string, value: DurationString): number {
    try {
      return parseDurationToMilliseconds(value);
    } catch (error) {
      this.issues.push(`${path}: ${error instanceof Error ? error.message : String(error)}`);
      return 0;
    }
  }

  optionalDuration(path: string, value: DurationString | undefined): number | undefined {
    return value === undefined ? undefined : this.duration(path, value);
  }

  add(message: string): void {
    this.issues.push(message);
  }
}

function resolveTarget(
  raw: RawTargetConfig,
  index: number,
  bounds: { minMs: number; maxMs: number },
  collector: IssueCollector,
): TargetConfig {
  const path = `config.targets[${index}]`;
  const intervalMs = collector.duration(`${path}.interval`, raw.interval);
  const method = raw.method ?? "GET";

  if (intervalMs < bounds.minMs || intervalMs > bounds.maxMs) {
    collector.add(
      `${path}.interval: ${raw.interval} for target "${raw.id}" is outside the allowed range ${bounds.minMs}ms to ${bounds.maxMs}ms`,
    );
  }

  if (raw.pattern !== undefined) {
    try {
      new RegExp(raw.pattern, "s");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      collector.add(`${path}.pattern: pattern for target "${raw.id}" does not compile: ${message}`);
    }

    if (method !== "GET") {
      collector.add(`${path}.method: target "${raw.id}" has a pattern and must use GET`);
    }
  }

  return {
    id: raw.id,
    url: raw.url,
    intervalMs,
    method,
    active: raw.active ?? true,
    ...(raw.pattern !== undefined ? { pattern: raw.pattern } : {}),
    ...(raw.headers !== undefined ? { headers: { ...raw.headers } } : {}),
  };
}

/**
 * Applies defaults and the checks a schema cannot express. Every violation is reported in one
 * ConfigValidationError.
 */
export function resolveSettings(raw: RawMonitorFile): MonitorSettings {
  const collector = new IssueCollector();

  const minMs = collector.duration(
    "config.interval_bounds.min",
    raw.interval_bounds?.min ?? DEFAULT_SETTINGS.intervalMin,
  );
  const maxMs = collector.duration(
    "config.interval_bounds.max",
    raw.interval_bounds?.max ?? DEFAULT_SETTINGS.intervalMax,
  );

  if (minMs > maxMs) {
    collector.add("config.interval_bounds: min must not be greater than max");
  }

  const bounds = { minMs, maxMs };
  const targets = raw.targets.map((target, index) =>
    resolveTarget(target, index, bounds, collector),
  );

  let backend: BackendSettings = { kind: "local" };

  if (raw.backend?.type === "distributed") {
    const workers = raw.backend.workers ?? [];
    if (workers.length === 0) {
      collector.add("config.backend.workers: the distributed backend requires at least one worker");
    }
    backend = {
      kind: "distributed",
      workers: [...workers],
      workerConcurrency: raw.backend.worker_concurrency ?? DEFAULT_SETTINGS.workerConcurrency,
      dispatchTimeoutMs: collector.duration(
        "config.backend.dispatch_timeout",
        raw.backend.dispatch_timeout ?? DEFAULT_SETTINGS.dispatchTimeout,
      ),
      cooldownMs: collector.duration(
        "config.backend.worker_cooldown",
        raw.backend.worker_cooldown ?? DEFAULT_SETTINGS.workerCooldown,
      ),
    };
  }

  const listenValue = raw.worker?.listen ?? DEFAULT_SETTINGS.workerListen;
  const listen = parseListenAddress(listenValue);
  if (!listen) {
    collector.add(`config.worker.listen: "${listenValue}" is not a host:port address`);
  }

  const keepMs = collector.duration(
    "config.retention.keep",
    raw.retention?.keep ?? DEFAULT_SETTINGS.retentionKeep,
  );
  if (keepMs <= 0 || keepMs % MILLISECONDS_PER_DAY !== 0) {
    collector.add("config.retention.keep: retention must be a positive whole number of days");
  }

  const timeoutMs = collector.duration("config.timeout", raw.timeout ?? DEFAULT_SETTINGS.timeout);
  if (timeoutMs <= 0) {
    collector.add("config.timeout: timeout must be greater than 0");
  }

  const tickMs = collector.duration("config.tick", raw.tick ?? DEFAULT_SETTINGS.tick);
  if (tickMs <= 0) {
    collector.add("config.tick: tick must be greater than 0");
  }

  const settings: MonitorSettings = {
    concurrency: raw.concurrency ?? DEFAULT_SETTINGS.concurrency,
    queueDepth: raw.queue_depth ?? DEFAULT_SETTINGS.queueDepth,
    probe: {
      timeoutMs,
      retryLimit: raw.retry_limit ?? DEFAULT_SETTINGS.retryLimit,
      retryDelayMs: collector.optionalDuration("config.retry_delay", raw.retry_delay),
      retryBudgetMs: collector.optionalDuration("config.retry_budget", raw.retry_budget),
    },
    tickMs,
    shutdownGraceMs: collector.duration(
      "config.shutdown_grace",
      raw.shutdown_grace ?? DEFAULT_SETTINGS.shutdownGrace,
    ),
    intervalBounds: bounds,
    backend,
    worker: { listen: listen ?? { host: "0.0.0.0", port: 7400 } },
    storage: {
      url: raw.storage?.url ?? DEFAULT_SETTINGS.storageUrl,
      maxConnections: raw.storage?.max_connections ?? DEFAULT_SETTINGS.maxConnections,
      writeRetries: raw.storage?.write_retries ?? DEFAULT_SETTINGS.writeRetries,
      writeBackoffMs: collector.duration(
        "config.storage.write_backoff",
        raw.storage?.write_backoff ?? DEFAULT_SETTINGS.writeBackoff,
      ),
    },
    retention: {
      retentionDays: Math.max(1, Math.floor(keepMs / MILLISECONDS_PER_DAY)),
      cadenceMs: collector.duration(
        "config.retention.cadence",
        raw.retention?.cadence ?? DEFAULT_SETTINGS.retentionCadence,
      ),
      lockLeaseMs: collector.duration(
        "config.retention.lock_lease",
        raw.retention?.lock_lease ?? DEFAULT_SETTINGS.lockLease,
      ),
    },
    logLevel: raw.log_level ?? DEFAULT_SETTINGS.logLevel,
    metrics: {
      textfile: raw.metrics?.textfile,
      intervalMs: collector.duration(
        "config.metrics.interval",
        raw.metrics?.interval ?? DEFAULT_SETTINGS.metricsInterval,
      ),
    },
    targets,
  };

  if (collector.issues.length > 0) {
    throw new ConfigValidationError(collector.issues.join("\n"), collector.issues);
  }

  return settings;
}

/**
 * Copy of the settings that is safe to print: storage credentials and sensitive target
 * headers are masked.
 */
export function redactSettings(settings: MonitorSettings): MonitorSettings {
  return {
    ...settings,
    storage: { ...settings.storage, url: redactUrlCredentials(settings.storage.url) },
    backend:
      settings.backend.kind === "distributed"
        ? {
            ...settings.backend,
            workers: settings.backend.workers.map((worker) => redactUrlCredentials(worker)),
          }
        : settings.backend,
    targets: settings.targets.map((target) => ({
      ...target,
      url: redactUrlCredentials(target.url),
      ...(target.headers ? { headers: redactHeaders(target.headers) } : {}),
    })),
  };
}
