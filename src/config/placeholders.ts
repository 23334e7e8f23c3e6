import { MissingEnvironmentVariableError } from "./errors";

/** `${NAME}` or `${NAME:-fallback}`. */
const PLACEHOLDER_PATTERN = /\$\{([A-Z0-9_]+)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object") {
    return false;
  }

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function substitute(value: string, env: NodeJS.ProcessEnv, path: string): string {
  return value.replace(
    PLACEHOLDER_PATTERN,
    (_match, variableName: string, fallback: string | undefined) => {
      const replacement = env[variableName];

      if (typeof replacement === "string" && replacement.length > 0) {
        return replacement;
      }

      if (fallback !== undefined) {
        return fallback;
      }

      if (typeof replacement === "string") {
        return replacement;
      }

      throw new MissingEnvironmentVariableError(variableName, path);
    },
  );
}

/**
 * Replaces environment placeholders in every string of a parsed YAML document. `path` names
 * the location for error messages, e.g. `config.storage.url`.
 */
export function resolvePlaceholders(
  value: unknown,
  env: NodeJS.ProcessEnv,
  path: string,
): unknown {
  if (typeof value === "string") {
    return substitute(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => resolvePlaceholders(item, env, `${path}[${index}]`));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [
      key,
      resolvePlaceholders(nested, env, `${path}.${key}`),
    ]),
  );
}
