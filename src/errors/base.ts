import { EXIT_CODE_CONFIG_ERROR, EXIT_CODE_INTERNAL_ERROR, type ExitCode } from "../exit-codes";
import { redactUrlCredentials } from "../redaction";

export interface ErrorContext {
  targetId?: string;
  attempt?: number;
  url?: string;
  component?: string;
}

export interface SitePulseErrorOptions {
  exitCode: ExitCode;
  context?: ErrorContext;
  cause?: unknown;
  name?: string;
}

function isFiniteInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function sanitizeUrl(value: unknown): string | undefined {
  if (typeof value === "string") {
    return redactUrlCredentials(value);
  }

  if (value instanceof URL) {
    return redactUrlCredentials(value.toString());
  }

  return undefined;
}

export function formatErrorMessageWithContext(message: string, context?: ErrorContext): string {
  if (!context) {
    return message;
  }

  const details: string[] = [];

  if (typeof context.component === "string" && context.component.length > 0) {
    details.push(`component=${context.component}`);
  }

  if (typeof context.targetId === "string" && context.targetId.length > 0) {
    details.push(`target=${context.targetId}`);
  }

  if (isFiniteInteger(context.attempt)) {
    details.push(`attempt=${context.attempt}`);
  }

  const url = sanitizeUrl(context.url);
  if (url) {
    details.push(`url=${url}`);
  }

  if (details.length === 0) {
    return message;
  }

  return `${message} (${details.join(", ")})`;
}

export class SitePulseError extends Error {
  readonly exitCode: ExitCode;
  readonly context?: ErrorContext;

  constructor(message: string, options: SitePulseErrorOptions) {
    const formatted = formatErrorMessageWithContext(message, options.context);
    super(formatted, options.cause !== undefined ? { cause: options.cause } : undefined);

    this.exitCode = options.exitCode;
    this.context = options.context;
    this.name = options.name ?? new.target.name;
  }
}

export interface UsageErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class UsageError extends SitePulseError {
  constructor(message: string, options: UsageErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_CONFIG_ERROR,
      context: options.context,
      cause: options.cause,
      name: "UsageError",
    });
  }
}

export interface InternalErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export class InternalError extends SitePulseError {
  constructor(message: string, options: InternalErrorOptions = {}) {
    super(message, {
      exitCode: EXIT_CODE_INTERNAL_ERROR,
      context: options.context,
      cause: options.cause,
      name: "InternalError",
    });
  }
}

export class StorageError extends InternalError {
  constructor(message: string, options: InternalErrorOptions = {}) {
    super(message, { ...options, context: { component: "storage", ...options.context } });
    this.name = "StorageError";
  }
}
