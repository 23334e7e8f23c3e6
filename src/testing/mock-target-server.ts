import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { setTimeout as delay } from "node:timers/promises";

export interface MockTargetServerOptions {
  /**
   * Delay in milliseconds applied by the `/slow` endpoint before responding. Defaults to 150ms.
   */
  slowDelayMs?: number;
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: IncomingMessage["headers"];
}

export interface MockTargetServer {
  readonly host: string;
  readonly port: number;
  readonly baseUrl: string;
  readonly slowDelayMs: number;
  /** Requests received so far, in arrival order. */
  readonly requests: readonly RecordedRequest[];
  /**
   * Constructs an absolute URL using the server's base URL.
   */
  url(pathname?: string): string;
  close(): Promise<void>;
}

export const HEALTHY_BODY = "<html><body>service healthy: status=ok</body></html>";

function send(res: ServerResponse, status: number, body: string, contentType = "text/html"): void {
  res.writeHead(status, {
    "content-type": `${contentType}; charset=utf-8`,
    "content-length": String(Buffer.byteLength(body)),
  });
  res.end(body);
}

async function handle(
  req: IncomingMessage,
  res: ServerResponse,
  slowDelayMs: number,
): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  const statusMatch = /^\/status\/(\d{3})$/.exec(url.pathname);

  if (statusMatch) {
    send(res, Number(statusMatch[1]), `status ${statusMatch[1]}`);
    return;
  }

  switch (url.pathname) {
    case "/ok":
      send(res, 200, HEALTHY_BODY);
      return;
    case "/slow":
      await delay(slowDelayMs);
      send(res, 200, HEALTHY_BODY);
      return;
    case "/hang":
      // Never answers; the socket is closed when the server shuts down.
      return;
    case "/stall-body":
      res.writeHead(200, { "content-type": "text/plain" });
      res.write("partial");
      return;
    case "/large": {
      const bytes = Number(url.searchParams.get("bytes") ?? "1024");
      send(res, 200, "a".repeat(bytes), "text/plain");
      return;
    }
    case "/drop":
      res.writeHead(200, { "content-type": "text/plain" });
      res.write("partial");
      res.destroy();
      return;
    case "/headers":
      send(res, 200, JSON.stringify(req.headers), "application/json");
      return;
    default:
      send(res, 404, "not found");
  }
}

export async function startMockTargetServer(
  options: MockTargetServerOptions = {},
): Promise<MockTargetServer> {
  const slowDelayMs = options.slowDelayMs ?? 150;
  const host = "127.0.0.1";
  const requests: RecordedRequest[] = [];

  const server: Server = createServer((req, res) => {
    requests.push({ method: req.method ?? "GET", path: req.url ?? "/", headers: req.headers });
    handle(req, res, slowDelayMs).catch((error: unknown) => {
      res.destroy(error instanceof Error ? error : new Error(String(error)));
    });
  });

  const port = await new Promise<number>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, host, () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Failed to determine port for mock target server"));
        return;
      }
      resolve(address.port);
    });
  });

  const baseUrl = `http://${host}:${port}`;

  return {
    host,
    port,
    baseUrl,
    slowDelayMs,
    requests,
    url(pathname = "/") {
      return new URL(pathname, baseUrl).toString();
    },
    async close() {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

/**
 * Returns a port on 127.0.0.1 that had a listener a moment ago and now refuses connections.
 */
export async function reserveClosedPort(): Promise<number> {
  const server = createServer();
  const address = await new Promise<AddressInfo | string | null>((resolve) => {
    server.listen(0, "127.0.0.1", () => {
      resolve(server.address());
    });
  });

  await new Promise<void>((resolve) => {
    server.close(() => {
      resolve();
    });
  });

  if (address === null || typeof address === "string") {
    throw new Error("Failed to reserve a port");
  }

  return address.port;
}
