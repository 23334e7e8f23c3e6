import net from "node:net";
import tls from "node:tls";

import type { buildConnector } from "undici";

import type { PhaseTimings } from "../domain";

/**
 * Monotonic time marks of one request attempt, filled in while the exchange progresses.
 */
export interface PhaseMarks {
  startedAt: number;
  connectStartedAt?: number;
  dnsResolvedAt?: number;
  tcpConnectedAt?: number;
  tlsConnectedAt?: number;
  headersReceivedAt?: number;
  bodyCompletedAt?: number;
  remoteAddress?: string;
}

function phase(end: number | undefined, start: number | undefined): number | undefined {
  if (end === undefined || start === undefined) {
    return undefined;
  }

  return Math.max(0, Math.round(end - start));
}

/**
 * Turns raw marks into sequential phases. Each phase starts where the previous completed
 * phase ended, so the phases never overlap.
 */
export function computePhaseTimings(marks: PhaseMarks, endedAt: number): PhaseTimings {
  const connectBase = marks.connectStartedAt ?? marks.startedAt;
  const timings: PhaseTimings = {
    totalMs: Math.max(0, Math.round(endedAt - marks.startedAt)),
  };

  const dnsMs = phase(marks.dnsResolvedAt, connectBase);
  if (dnsMs !== undefined) {
    timings.dnsMs = dnsMs;
  }

  const connectMs = phase(marks.tcpConnectedAt, marks.dnsResolvedAt ?? connectBase);
  if (connectMs !== undefined) {
    timings.connectMs = connectMs;
  }

  const tlsMs = phase(marks.tlsConnectedAt, marks.tcpConnectedAt);
  if (tlsMs !== undefined) {
    timings.tlsMs = tlsMs;
  }

  const handshakeEnd =
    marks.tcpConnectedAt === undefined
      ? marks.startedAt
      : (marks.tlsConnectedAt ?? marks.tcpConnectedAt);
  const serverProcessingMs = phase(marks.headersReceivedAt, handshakeEnd);
  if (serverProcessingMs !== undefined) {
    timings.serverProcessingMs = serverProcessingMs;
  }

  const transferMs = phase(marks.bodyCompletedAt, marks.headersReceivedAt);
  if (transferMs !== undefined) {
    timings.transferMs = transferMs;
  }

  return timings;
}

export interface TimingConnectorOptions {
  marks: PhaseMarks;
  now: () => number;
  /** Destroys a pending connection once aborted. */
  signal?: AbortSignal;
}

function stripIpv6Brackets(hostname: string): string {
  if (hostname.startsWith("[") && hostname.endsWith("]")) {
    return hostname.slice(1, -1);
  }

  return hostname;
}

function resolvePort(port: string, protocol: string): number {
  const parsed = Number.parseInt(port, 10);

  if (Number.isInteger(parsed) && parsed > 0) {
    return parsed;
  }

  return protocol === "https:" ? 443 : 80;
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error("Connection aborted");
}

/**
 * undici connector that opens a fresh socket and records DNS, TCP and TLS marks from the
 * socket's own events.
 */
export function createTimingConnector(options: TimingConnectorOptions): buildConnector.connector {
  const { marks, now, signal } = options;

  return (connectOptions, callback) => {
    if (signal?.aborted) {
      callback(abortReason(signal), null);
      return;
    }

    marks.connectStartedAt = now();

    const host = stripIpv6Brackets(connectOptions.hostname);
    const port = resolvePort(connectOptions.port, connectOptions.protocol);
    const secure = connectOptions.protocol === "https:";

    const socket: net.Socket = secure
      ? tls.connect({
          host,
          port,
          servername: net.isIP(host) === 0 ? (connectOptions.servername ?? host) : undefined,
          ALPNProtocols: ["http/1.1"],
        })
      : net.connect({ host, port });

    let settled = false;

    const onAbort = () => {
      if (signal) {
        socket.destroy(abortReason(signal));
      }
    };

    const settle = (error: Error | null) => {
      if (settled) {
        return;
      }

      settled = true;
      socket.removeListener("error", onError);
      signal?.removeEventListener("abort", onAbort);

      if (error) {
        callback(error, null);
      } else {
        callback(null, socket);
      }
    };

    const onError = (error: Error) => {
      settle(error);
    };

    socket.once("lookup", (error: Error | null) => {
      if (!error) {
        marks.dnsResolvedAt = now();
      }
    });

    socket.once("connect", () => {
      marks.tcpConnectedAt = now();
      marks.remoteAddress = socket.remoteAddress;

      if (!secure) {
        settle(null);
      }
    });

    if (secure) {
      socket.once("secureConnect", () => {
        marks.tlsConnectedAt = now();
        settle(null);
      });
    }

    socket.on("error", onError);
    signal?.addEventListener("abort", onAbort, { once: true });
  };
}
