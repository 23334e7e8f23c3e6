import { DEFAULT_CONFIG_PATH } from "../config/loader";
import { parseListenAddress, type ListenAddress } from "../config/settings";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging";
import { CliFlagError } from "./errors";

export const CONFIG_PATH_ENV = "SITEPULSE_CONFIG";

export interface CliParameters {
  configPath: string;
  /** Overrides `log_level` from the configuration file. */
  logLevel?: LogLevel;
  /** Overrides `worker.listen` for the worker command. */
  listen?: ListenAddress;
}

export interface ParseCliFlagsOptions {
  env?: NodeJS.ProcessEnv;
}

function expectValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];

  if (value === undefined || value.startsWith("--")) {
    throw new CliFlagError(`Flag ${flag} requires a value`);
  }

  return value;
}

function configPathFromEnv(env: NodeJS.ProcessEnv): string | undefined {
  const value = env[CONFIG_PATH_ENV];
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Parses the flags that follow the command. `--config` falls back to $SITEPULSE_CONFIG and
 * then to ./sitepulse.yaml.
 */
export function parseCliFlags(
  argv: readonly string[],
  options: ParseCliFlagsOptions = {},
): CliParameters {
  const env = options.env ?? process.env;
  let configPath: string | undefined;
  let logLevel: LogLevel | undefined;
  let listen: ListenAddress | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    switch (token) {
      case "--config": {
        configPath = expectValue(argv, index, token);
        index += 1;
        break;
      }

      case "--log-level": {
        const value = expectValue(argv, index, token);
        if (!isLogLevel(value)) {
          throw new CliFlagError(`--log-level must be one of: ${LOG_LEVELS.join(", ")}`);
        }
        logLevel = value;
        index += 1;
        break;
      }

      case "--listen": {
        const value = expectValue(argv, index, token);
        const address = parseListenAddress(value);
        if (!address) {
          throw new CliFlagError(`--listen expects host:port, got "${value}"`);
        }
        listen = address;
        index += 1;
        break;
      }

      default: {
        throw new CliFlagError(
          token.startsWith("-") ? `Unknown flag: ${token}` : `Unexpected argument: ${token}`,
        );
      }
    }
  }

  return {
    configPath: configPath ?? configPathFromEnv(env) ?? DEFAULT_CONFIG_PATH,
    ...(logLevel !== undefined ? { logLevel } : {}),
    ...(listen !== undefined ? { listen } : {}),
  };
}
