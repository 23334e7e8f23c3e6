import { describe, expect, it } from "vitest";

import { createControllableRunner } from "../../testing/fixtures";
import { createExecutor, LocalExecutor, RemoteExecutor } from "../index";

describe("createExecutor", () => {
  it("builds an in-process pool for the local backend", async () => {
    const executor = createExecutor(
      { kind: "local" },
      { concurrency: 4, queueDepth: 10, run: createControllableRunner().run },
    );

    expect(executor).toBeInstanceOf(LocalExecutor);
    expect(executor.stats()).toEqual({ active: 0, queued: 0, capacity: 14 });
    await executor.close();
  });

  it("sizes the distributed backend by its workers", async () => {
    const executor = createExecutor(
      {
        kind: "distributed",
        workers: ["http://10.0.0.5:7400", "http://10.0.0.6:7400"],
        workerConcurrency: 3,
        dispatchTimeoutMs: 60_000,
        cooldownMs: 30_000,
      },
      { concurrency: 50, queueDepth: 4, run: createControllableRunner().run },
    );

    expect(executor).toBeInstanceOf(RemoteExecutor);
    expect(executor.maxConcurrency).toBe(6);
    expect(executor.stats()).toEqual({ active: 0, queued: 0, capacity: 10 });
    await executor.close();
  });
});
