import { createAjv, formatAjvErrors } from "../validation";
import { ConfigValidationError } from "./errors";
import { monitorConfigSchema } from "./schema";
import type { RawMonitorFile } from "./types";

const ajv = createAjv({ coerceTypes: true });

const validateFn = ajv.compile<RawMonitorFile>(monitorConfigSchema);

export function validateMonitorConfig(payload: unknown): asserts payload is RawMonitorFile {
  if (!validateFn(payload)) {
    const { errors } = validateFn;
    throw new ConfigValidationError(formatAjvErrors(errors ?? [], "config"));
  }
}
