import { redactUrlCredentials } from "./redaction";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export interface LogEntry extends LogFields {
  time: string;
  level: LogLevel;
  message: string;
}

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Returns a logger that adds the given fields to every entry. */
  child(bindings: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (entry: LogEntry) => void;
  now?: () => Date;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_WRITE = (entry: LogEntry) => {
  process.stderr.write(`${JSON.stringify(entry)}\n`);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function normalizeFieldValue(key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const code = "code" in value ? value.code : undefined;
    return {
      name: value.name,
      message: value.message,
      ...(typeof code === "string" ? { code } : {}),
    };
  }

  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? value.toISOString() : null;
  }

  if (typeof value === "string" && /url$/i.test(key)) {
    return redactUrlCredentials(value);
  }

  return value;
}

function normalizeFields(fields: LogFields): LogFields {
  const normalized: LogFields = {};

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      normalized[key] = normalizeFieldValue(key, value);
    }
  }

  return normalized;
}

class JsonLogger implements Logger {
  constructor(
    private readonly threshold: number,
    private readonly write: (entry: LogEntry) => void,
    private readonly now: () => Date,
    private readonly bindings: LogFields,
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.log("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.log("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.log("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.log("error", message, fields);
  }

  child(bindings: LogFields): Logger {
    return new JsonLogger(this.threshold, this.write, this.now, {
      ...this.bindings,
      ...bindings,
    });
  }

  private log(level: LogLevel, message: string, fields: LogFields | undefined): void {
    if (LEVEL_WEIGHT[level] < this.threshold) {
      return;
    }

    this.write({
      ...normalizeFields({ ...this.bindings, ...fields }),
      time: this.now().toISOString(),
      level,
      message,
    });
  }
}

/**
 * Creates a logger that emits one JSON object per line (NDJSON) on stderr.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  return new JsonLogger(
    LEVEL_WEIGHT[level],
    options.write ?? DEFAULT_WRITE,
    options.now ?? (() => new Date()),
    {},
  );
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
