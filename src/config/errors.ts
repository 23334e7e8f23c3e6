import { UsageError } from "../errors/base";

export class ConfigError extends UsageError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class ConfigValidationError extends ConfigError {
  /** One entry per violated rule. */
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [message]) {
    super(message);
    this.name = "ConfigValidationError";
    this.issues = issues;
  }
}

export class MissingEnvironmentVariableError extends ConfigError {
  constructor(variableName: string, context: string) {
    super(`Environment variable ${variableName} referenced in ${context} is not defined`);
    this.name = "MissingEnvironmentVariableError";
  }
}
