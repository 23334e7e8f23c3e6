import type { HttpMethod } from "../domain";
import type { LogLevel } from "../logging";

export type DurationString = string;

export interface RawTargetConfig {
  id: string;
  url: string;
  interval: DurationString;
  pattern?: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  active?: boolean;
}

export interface RawBackendConfig {
  type?: "local" | "distributed";
  workers?: string[];
  worker_concurrency?: number;
  dispatch_timeout?: DurationString;
  worker_cooldown?: DurationString;
}

export interface RawStorageConfig {
  url: string;
  max_connections?: number;
  write_retries?: number;
  write_backoff?: DurationString;
}

export interface RawMonitorFile {
  concurrency?: number;
  queue_depth?: number;
  timeout?: DurationString;
  retry_limit?: number;
  retry_delay?: DurationString;
  retry_budget?: DurationString;
  tick?: DurationString;
  shutdown_grace?: DurationString;
  interval_bounds?: { min?: DurationString; max?: DurationString };
  backend?: RawBackendConfig;
  worker?: { listen?: string };
  storage?: RawStorageConfig;
  retention?: { keep?: DurationString; cadence?: DurationString; lock_lease?: DurationString };
  log_level?: LogLevel;
  metrics?: { textfile?: string; interval?: DurationString };
  targets: RawTargetConfig[];
}
