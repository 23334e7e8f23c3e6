export { ConfigError, ConfigValidationError, MissingEnvironmentVariableError } from "./errors";
export { DEFAULT_CONFIG_PATH, loadMonitorConfig, loadSettings, parseMonitorConfig } from "./loader";
export type { LoadConfigOptions } from "./loader";
export { resolvePlaceholders } from "./placeholders";
export { monitorConfigSchema } from "./schema";
export {
  DEFAULT_SETTINGS,
  parseListenAddress,
  redactSettings,
  resolveSettings,
} from "./settings";
export type {
  BackendSettings,
  ListenAddress,
  MetricsSettings,
  MonitorSettings,
  ProbeSettings,
  RetentionSettings,
  StorageSettings,
} from "./settings";
export type { RawMonitorFile, RawTargetConfig } from "./types";
export { validateMonitorConfig } from "./validator";
