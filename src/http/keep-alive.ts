import { Agent } from "undici";

export interface KeepAliveAgent {
  readonly agent: Agent;
  close(): Promise<void>;
  destroy(err?: Error): Promise<void>;
}

export interface KeepAliveAgentOptions {
  /** Maximum sockets per origin. */
  connections?: number;
  connectTimeoutMs?: number;
  keepAliveTimeoutMs?: number;
  overrides?: Agent.Options;
}

const DEFAULT_AGENT_OPTIONS: Agent.Options = {
  connections: 128,
  connectTimeout: 10_000,
  keepAliveTimeout: 30_000,
  keepAliveMaxTimeout: 600_000,
  keepAliveTimeoutThreshold: 1_000,
};

function buildAgentOptions(options: KeepAliveAgentOptions): Agent.Options {
  return {
    ...DEFAULT_AGENT_OPTIONS,
    ...(options.connections !== undefined ? { connections: options.connections } : {}),
    ...(options.connectTimeoutMs !== undefined ? { connectTimeout: options.connectTimeoutMs } : {}),
    ...(options.keepAliveTimeoutMs !== undefined
      ? { keepAliveTimeout: options.keepAliveTimeoutMs }
      : {}),
    ...options.overrides,
  };
}

/**
 * Pooled agent reused across requests to the same origins. close() and destroy() are
 * idempotent, and destroy() may cut a pending close() short.
 */
export function createKeepAliveAgent(options: KeepAliveAgentOptions = {}): KeepAliveAgent {
  const agent = new Agent(buildAgentOptions(options));

  let closePromise: Promise<void> | null = null;
  let destroyPromise: Promise<void> | null = null;

  const close = async () => {
    if (closePromise) {
      return closePromise;
    }

    if (destroyPromise) {
      return destroyPromise;
    }

    closePromise = agent.close();
    return closePromise;
  };

  const destroy = async (err?: Error) => {
    if (destroyPromise) {
      return destroyPromise;
    }

    destroyPromise = agent.destroy(err ?? null);
    return destroyPromise;
  };

  return { agent, close, destroy };
}
