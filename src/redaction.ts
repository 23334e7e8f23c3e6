export const REDACTED_PLACEHOLDER = "[redacted]" as const;

const SENSITIVE_HEADER_PATTERN = /^(authorization|proxy-authorization|cookie|set-cookie)$|token|secret|api[-_]?key/i;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

export function isSensitiveHeaderName(name: string): boolean {
  return SENSITIVE_HEADER_PATTERN.test(name);
}

/**
 * Returns a copy of the headers where values of credential-bearing headers are masked.
 * Other header values are kept so they stay useful in diagnostics.
 */
export function redactHeaders(
  headers: Readonly<Record<string, string>> | undefined,
): Record<string, string> | undefined {
  if (!headers) {
    return undefined;
  }

  const result: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    result[name] = isSensitiveHeaderName(name) && isNonEmptyString(value) ? REDACTED_PLACEHOLDER : value;
  }

  return result;
}

/**
 * Masks the password part of credentials embedded in a URL string, e.g. a storage
 * connection string, while preserving the remainder for diagnostics.
 */
export function redactUrlCredentials(url: string): string {
  if (!isNonEmptyString(url)) {
    return url;
  }

  return url.replace(/\/\/([^@/?#]*):([^@/?#]*)@/g, (_match, username: string) => {
    return `//${username}:${REDACTED_PLACEHOLDER}@`;
  });
}
