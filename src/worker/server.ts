import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import { ExecutorClosedError, WireFormatError } from "../errors/executor";
import { LocalExecutor } from "../executor/local";
import type { ExecutorStats, ProbeTask } from "../executor/types";
import { decodeTask, encodeCheckResult } from "../executor/wire";
import { collectBody } from "../http/request";
import { silentLogger, type Logger } from "../logging";
import type { Prober } from "../probe";

const MAX_TASK_BYTES = 1024 * 1024;

export interface WorkerServerOptions {
  host: string;
  /** 0 picks a free port. */
  port: number;
  prober: Prober;
  /** Probes this node runs at the same time. */
  concurrency: number;
  logger?: Logger;
}

export interface WorkerServer {
  readonly host: string;
  readonly port: number;
  readonly url: string;
  stats(): ExecutorStats;
  close(options?: { force?: boolean }): Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": String(Buffer.byteLength(json)),
  });
  res.end(json);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
}

function formatHost(host: string): string {
  return host.includes(":") ? `[${host}]` : host;
}

/**
 * Starts a worker node that runs probe tasks posted by a RemoteExecutor.
 *
 * - `POST /tasks` runs one task and answers with the check result.
 * - `GET /healthz` reports the node's load.
 */
export async function startWorkerServer(options: WorkerServerOptions): Promise<WorkerServer> {
  const logger = options.logger ?? silentLogger;
  const executor = new LocalExecutor({
    concurrency: options.concurrency,
    queueDepth: 0,
    run: (task, signal) => options.prober.check(task.target, { signal }),
  });

  const handleTask = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const collected = await collectBody(req, MAX_TASK_BYTES);

    if (collected.truncated) {
      sendJson(res, 413, { error: "Task payload too large" });
      return;
    }

    const parsed = parseJson(collected.body.toString("utf8"));

    if (!parsed.ok) {
      sendJson(res, 400, { error: `Invalid JSON: ${parsed.message}` });
      return;
    }

    let task: ProbeTask;
    try {
      task = decodeTask(parsed.value);
    } catch (error) {
      if (error instanceof WireFormatError) {
        sendJson(res, 400, { error: error.message });
        return;
      }
      throw error;
    }

    const outcome = executor.submit(task);

    if (!outcome.accepted) {
      sendJson(res, 503, { error: outcome.reason });
      return;
    }

    logger.debug("running task", { targetId: task.target.id, url: task.target.url });
    const result = await outcome.completion;
    sendJson(res, 200, encodeCheckResult(result));
  };

  const server: Server = createServer((req, res) => {
    const path = new URL(req.url ?? "/", "http://worker").pathname;

    if (req.method === "GET" && path === "/healthz") {
      sendJson(res, 200, { status: "ok", ...executor.stats() });
      return;
    }

    if (req.method === "POST" && path === "/tasks") {
      handleTask(req, res).catch((error: unknown) => {
        const closed = error instanceof ExecutorClosedError;
        logger.error("task failed", { error });
        if (!res.headersSent) {
          sendJson(res, closed ? 503 : 500, {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      });
      return;
    }

    sendJson(res, 404, { error: "Not found" });
  });

  const port = await new Promise<number>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.removeListener("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Failed to determine worker server port"));
        return;
      }
      resolve(address.port);
    });
  });

  logger.info("worker listening", { host: options.host, port });

  return {
    host: options.host,
    port,
    url: `http://${formatHost(options.host)}:${port}`,
    stats: () => executor.stats(),
    async close(closeOptions = {}) {
      const closing = new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });

      await executor.close({ force: closeOptions.force });
      server.closeIdleConnections();
      if (closeOptions.force) {
        server.closeAllConnections();
      }
      await closing;
    },
  };
}
