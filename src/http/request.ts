import { Agent, request, type Dispatcher } from "undici";

import type { FailureReason, HttpMethod, PhaseTimings } from "../domain";
import { ProbeError, type ProbeErrorContext } from "../errors/probe";
import { computePhaseTimings, createTimingConnector, type PhaseMarks } from "./timing";

export const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;

export interface RequestErrorOptions {
  timings: PhaseTimings;
  code?: string;
  cause?: unknown;
}

/**
 * Transport-level failure of one request attempt. Carries the phases that completed before
 * the failure.
 */
export class RequestError extends ProbeError {
  readonly timings: PhaseTimings;
  readonly code?: string;

  constructor(
    reason: FailureReason,
    message: string,
    context: ProbeErrorContext,
    options: RequestErrorOptions,
  ) {
    super(reason, message, context, { cause: options.cause });
    this.name = "RequestError";
    this.timings = options.timings;
    this.code = options.code;
  }
}

export class RequestTimeoutError extends RequestError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: ProbeErrorContext, timings: PhaseTimings) {
    super("timeout", `Request timed out after ${timeoutMs}ms`, context, { timings });
    this.name = "RequestTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface TimedRequestOptions {
  url: string | URL;
  method?: HttpMethod;
  headers?: Readonly<Record<string, string>>;
  /** Budget for the whole attempt, body included. */
  timeoutMs?: number;
  signal?: AbortSignal;
  maxBodyBytes?: number;
  /** Monotonic clock used for the phase marks. */
  now?: () => number;
  /** Identifies the probe in error messages. */
  context?: Pick<ProbeErrorContext, "targetId" | "attempt">;
}

export interface TimedResponse {
  statusCode: number;
  headers: Record<string, string>;
  /** Body bytes up to maxBodyBytes. */
  body: Buffer;
  contentSizeBytes: number;
  bodyTruncated: boolean;
  timings: PhaseTimings;
  remoteAddress?: string;
}

export type TimedRequestFunction = (options: TimedRequestOptions) => Promise<TimedResponse>;

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

function readErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }

  return undefined;
}

function isTlsErrorCode(code: string): boolean {
  return code.includes("CERT") || code.startsWith("ERR_TLS") || code.startsWith("ERR_SSL");
}

/**
 * Finds the first error code along the cause chain.
 */
export function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current !== undefined && current !== null; depth += 1) {
    const code = readErrorCode(current);
    if (code) {
      return code;
    }

    current = current instanceof Error ? current.cause : undefined;
  }

  return undefined;
}

export function classifyRequestFailure(error: unknown): FailureReason {
  if (error instanceof RequestTimeoutError) {
    return "timeout";
  }

  const code = findErrorCode(error);

  if (!code) {
    return "unknown";
  }

  if (TIMEOUT_CODES.has(code)) {
    return "timeout";
  }

  if (CONNECTION_CODES.has(code) || isTlsErrorCode(code)) {
    return "connection_error";
  }

  return "unknown";
}

function ensureUrlInstance(value: string | URL): URL {
  if (value instanceof URL) {
    return value;
  }

  return new URL(value);
}

function isFinitePositive(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function forwardAbortSignal(source: AbortSignal, controller: AbortController): () => void {
  if (source.aborted) {
    controller.abort(source.reason);
    return () => {};
  }

  const listener = () => {
    controller.abort(source.reason);
  };

  source.addEventListener("abort", listener, { once: true });

  return () => {
    source.removeEventListener("abort", listener);
  };
}

function normalizeResponseHeaders(headers: Dispatcher.ResponseData["headers"]): Record<string, string> {
  const normalized: Record<string, string> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === "string") {
      normalized[name] = value;
    } else if (Array.isArray(value)) {
      normalized[name] = value.join(", ");
    }
  }

  return normalized;
}

function chunkToBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }

  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }

  return Buffer.from(String(chunk));
}

interface CollectedBody {
  body: Buffer;
  totalBytes: number;
  truncated: boolean;
}

/**
 * Drains the stream completely, keeping at most maxBytes for pattern matching.
 */
export async function collectBody(
  stream: AsyncIterable<unknown>,
  maxBytes: number,
): Promise<CollectedBody> {
  const kept: Buffer[] = [];
  let keptBytes = 0;
  let totalBytes = 0;
  let truncated = false;

  for await (const chunk of stream) {
    const buffer = chunkToBuffer(chunk);
    totalBytes += buffer.length;

    if (keptBytes < maxBytes) {
      const room = maxBytes - keptBytes;
      const slice = buffer.length > room ? buffer.subarray(0, room) : buffer;
      kept.push(slice);
      keptBytes += slice.length;
      truncated = truncated || slice.length < buffer.length;
    } else if (buffer.length > 0) {
      truncated = true;
    }
  }

  return { body: Buffer.concat(kept), totalBytes, truncated };
}

/**
 * Performs one request over a fresh connection and measures every phase of it.
 */
export async function timedRequest(options: TimedRequestOptions): Promise<TimedResponse> {
  const now = options.now ?? (() => performance.now());
  const targetUrl = ensureUrlInstance(options.url);
  const protocol = targetUrl.protocol;
  const context: ProbeErrorContext = { ...options.context, url: targetUrl };

  if (protocol !== "http:" && protocol !== "https:") {
    throw new RequestError("unknown", `Unsupported protocol for request: ${protocol}`, context, {
      timings: { totalMs: 0 },
    });
  }

  const marks: PhaseMarks = { startedAt: now() };
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  const timeoutMs = options.timeoutMs;
  let abortedByInternalTimeout = false;

  if (isFinitePositive(timeoutMs)) {
    const timer = setTimeout(() => {
      if (!controller.signal.aborted) {
        abortedByInternalTimeout = true;
        controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
      }
    }, timeoutMs);
    cleanups.push(() => {
      clearTimeout(timer);
    });
  }

  if (options.signal) {
    cleanups.push(forwardAbortSignal(options.signal, controller));
  }

  const agent = new Agent({
    connect: createTimingConnector({ marks, now, signal: controller.signal }),
    connections: 1,
    pipelining: 0,
  });

  try {
    const response = await request(targetUrl, {
      dispatcher: agent,
      method: options.method ?? "GET",
      headers: options.headers ? { ...options.headers } : undefined,
      signal: controller.signal,
    });
    marks.headersReceivedAt = now();

    const collected = await collectBody(response.body, options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
    marks.bodyCompletedAt = now();

    return {
      statusCode: response.statusCode,
      headers: normalizeResponseHeaders(response.headers),
      body: collected.body,
      contentSizeBytes: collected.totalBytes,
      bodyTruncated: collected.truncated,
      timings: computePhaseTimings(marks, marks.bodyCompletedAt),
      remoteAddress: marks.remoteAddress,
    };
  } catch (error) {
    const timings = computePhaseTimings(marks, now());

    if (abortedByInternalTimeout && isFinitePositive(timeoutMs)) {
      throw new RequestTimeoutError(timeoutMs, context, timings);
    }

    if (controller.signal.aborted) {
      throw new RequestError("unknown", "Request was cancelled", context, {
        timings,
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new RequestError(classifyRequestFailure(error), message, context, {
      timings,
      code: findErrorCode(error),
      cause: error,
    });
  } finally {
    for (const cleanup of cleanups.splice(0, cleanups.length)) {
      cleanup();
    }
    await agent.destroy();
  }
}
