import Ajv, { type ErrorObject } from "ajv";
import ajvErrors from "ajv-errors";
import addFormats from "ajv-formats";
import addKeywords from "ajv-keywords";

export interface CreateAjvOptions {
  coerceTypes?: boolean;
}

export function createAjv(options: CreateAjvOptions = {}): Ajv {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
    messages: true,
    coerceTypes: options.coerceTypes ?? false,
  });

  addFormats(ajv);
  addKeywords(ajv, ["uniqueItemProperties"]);
  ajvErrors(ajv, { singleError: false });

  return ajv;
}

function toPointer(instancePath: string, root: string): string {
  if (!instancePath) {
    return root;
  }

  const segments = instancePath
    .split("/")
    .filter(Boolean)
    .map((segment) => segment.replaceAll("~1", "/").replaceAll("~0", "~"));

  return `${root}${segments
    .map((segment) => (Number.isNaN(Number(segment)) ? `.${segment}` : `[${segment}]`))
    .join("")}`;
}

/**
 * Renders ajv errors as one `path: message` line each, e.g. `config.targets[0].url: ...`.
 */
export function formatAjvErrors(errors: readonly ErrorObject[], root: string): string {
  return errors
    .map((error) => {
      const pointer = toPointer(error.instancePath, root);
      const message = error.message ?? "is invalid";
      return `${pointer}: ${message}`;
    })
    .join("\n");
}
