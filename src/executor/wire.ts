import type { Schema } from "ajv";

import { FAILURE_REASONS, type CheckResult, type TargetConfig } from "../domain";
import { WireFormatError } from "../errors/executor";
import { createAjv, formatAjvErrors } from "../validation";
import type { ProbeTask } from "./types";

export interface ProbeTaskWire {
  target: TargetConfig;
  scheduledAt: string;
}

export type CheckResultWire = Omit<CheckResult, "checkedAt"> & { checkedAt: string };

const headersSchema = {
  type: "object",
  additionalProperties: { type: "string" },
} as const satisfies Schema;

export const probeTaskWireSchema = {
  type: "object",
  additionalProperties: false,
  required: ["target", "scheduledAt"],
  properties: {
    scheduledAt: { type: "string", format: "date-time" },
    target: {
      type: "object",
      additionalProperties: false,
      required: ["id", "url", "intervalMs", "method", "active"],
      properties: {
        id: { type: "string", minLength: 1 },
        url: { type: "string", format: "uri", pattern: "^https?://" },
        intervalMs: { type: "integer", minimum: 1 },
        pattern: { type: "string" },
        method: { type: "string", enum: ["GET", "HEAD"] },
        headers: headersSchema,
        active: { type: "boolean" },
      },
    },
  },
} as const satisfies Schema;

const durationSchema = { type: "number", minimum: 0 } as const satisfies Schema;

export const checkResultWireSchema = {
  type: "object",
  additionalProperties: false,
  required: [
    "targetId",
    "url",
    "checkedAt",
    "timings",
    "success",
    "patternMatched",
    "failure",
    "details",
  ],
  properties: {
    targetId: { type: "string", minLength: 1 },
    url: { type: "string" },
    checkedAt: { type: "string", format: "date-time" },
    timings: {
      type: "object",
      additionalProperties: false,
      required: ["totalMs"],
      properties: {
        totalMs: durationSchema,
        dnsMs: durationSchema,
        connectMs: durationSchema,
        tlsMs: durationSchema,
        serverProcessingMs: durationSchema,
        transferMs: durationSchema,
      },
    },
    contentSizeBytes: { type: "integer", minimum: 0 },
    httpStatus: { type: "integer", minimum: 100, maximum: 599 },
    success: { type: "boolean" },
    patternMatched: { type: ["boolean", "null"] },
    failure: {
      anyOf: [
        { type: "null" },
        {
          type: "object",
          additionalProperties: false,
          required: ["reason", "message"],
          properties: {
            reason: { type: "string", enum: [...FAILURE_REASONS] },
            message: { type: "string" },
          },
        },
      ],
    },
    details: {
      type: "object",
      required: ["attempts", "retries"],
      properties: {
        attempts: { type: "integer", minimum: 0 },
        retries: { type: "integer", minimum: 0 },
      },
    },
  },
} as const satisfies Schema;

const ajv = createAjv();
const validateTaskWire = ajv.compile<ProbeTaskWire>(probeTaskWireSchema);
const validateResultWire = ajv.compile<CheckResultWire>(checkResultWireSchema);

export function encodeTask(task: ProbeTask): ProbeTaskWire {
  return { target: task.target, scheduledAt: task.scheduledAt.toISOString() };
}

export function decodeTask(payload: unknown): ProbeTask {
  if (!validateTaskWire(payload)) {
    throw new WireFormatError(
      `Invalid probe task:\n${formatAjvErrors(validateTaskWire.errors ?? [], "task")}`,
    );
  }

  return { target: payload.target, scheduledAt: new Date(payload.scheduledAt) };
}

/**
 * JSON form of a result. Optional fields that are undefined are left out.
 */
export function encodeCheckResult(result: CheckResult): CheckResultWire {
  return {
    targetId: result.targetId,
    url: result.url,
    checkedAt: result.checkedAt.toISOString(),
    timings: result.timings,
    ...(result.contentSizeBytes !== undefined ? { contentSizeBytes: result.contentSizeBytes } : {}),
    ...(result.httpStatus !== undefined ? { httpStatus: result.httpStatus } : {}),
    success: result.success,
    patternMatched: result.patternMatched,
    failure: result.failure,
    details: result.details,
  };
}

export function decodeCheckResult(payload: unknown): CheckResult {
  if (!validateResultWire(payload)) {
    throw new WireFormatError(
      `Invalid check result:\n${formatAjvErrors(validateResultWire.errors ?? [], "result")}`,
    );
  }

  return { ...payload, checkedAt: new Date(payload.checkedAt) };
}
