import { promises as fs } from "node:fs";
import { parse } from "yaml";

import { ConfigError } from "./errors";
import { resolvePlaceholders } from "./placeholders";
import { resolveSettings, type MonitorSettings } from "./settings";
import type { RawMonitorFile } from "./types";
import { validateMonitorConfig } from "./validator";

export const DEFAULT_CONFIG_PATH = "./sitepulse.yaml";

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

export function parseMonitorConfig(content: string, options: LoadConfigOptions = {}): RawMonitorFile {
  let parsed: unknown;

  try {
    parsed = parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown parse error";
    throw new ConfigError(`Unable to parse monitor configuration: ${message}`, { cause: error });
  }

  const env = options.env ?? process.env;
  const withEnv = resolvePlaceholders(parsed, env, "config");

  validateMonitorConfig(withEnv);

  return withEnv;
}

export async function loadMonitorConfig(
  path: string,
  options: LoadConfigOptions = {},
): Promise<RawMonitorFile> {
  let raw: string;

  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown read error";
    throw new ConfigError(`Unable to read monitor configuration at ${path}: ${message}`, {
      cause: error,
    });
  }

  return parseMonitorConfig(raw, options);
}

/**
 * Reads, validates and resolves the configuration file into typed settings.
 */
export async function loadSettings(
  path: string,
  options: LoadConfigOptions = {},
): Promise<MonitorSettings> {
  return resolveSettings(await loadMonitorConfig(path, options));
}
