import { describe, expect, it } from "vitest";

import { ExecutorClosedError } from "../../errors/executor";
import {
  createCheckResult,
  createControllableRunner,
  createTarget,
  flushAsync,
} from "../../testing/fixtures";
import { LocalExecutor } from "../local";
import type { ProbeTask } from "../types";

function task(id: string): ProbeTask {
  return { target: createTarget({ id }), scheduledAt: new Date("2026-03-01T10:00:00.000Z") };
}

describe("LocalExecutor", () => {
  it("bounds running and queued tasks", async () => {
    const runner = createControllableRunner();
    const executor = new LocalExecutor({ concurrency: 2, queueDepth: 1, run: runner.run });

    const outcomes = ["a", "b", "c", "d"].map((id) => executor.submit(task(id)));
    await flushAsync();

    expect(outcomes.map((outcome) => outcome.accepted)).toEqual([true, true, true, false]);
    expect(outcomes[3]).toEqual({ accepted: false, reason: "capacity_exceeded" });
    expect(executor.stats()).toEqual({ active: 2, queued: 1, capacity: 3 });
    expect([...runner.pending.keys()]).toEqual(["a", "b"]);

    runner.complete("a");
    await flushAsync();

    expect([...runner.pending.keys()]).toEqual(["b", "c"]);
    expect(executor.submit(task("e")).accepted).toBe(true);
  });

  it("resolves completions with the runner's result", async () => {
    const runner = createControllableRunner();
    const executor = new LocalExecutor({ concurrency: 1, queueDepth: 0, run: runner.run });

    const outcome = executor.submit(task("a"));
    await flushAsync();
    runner.complete("a", { httpStatus: 204 });

    if (!outcome.accepted) {
      throw new Error("expected the task to be accepted");
    }
    await expect(outcome.completion).resolves.toMatchObject({ targetId: "a", httpStatus: 204 });
  });

  it("drains accepted tasks on a graceful close and refuses new ones", async () => {
    const runner = createControllableRunner();
    const executor = new LocalExecutor({ concurrency: 1, queueDepth: 1, run: runner.run });

    executor.submit(task("a"));
    executor.submit(task("b"));
    await flushAsync();

    let closed = false;
    const closing = executor.close().then(() => {
      closed = true;
    });

    expect(executor.submit(task("c"))).toEqual({ accepted: false, reason: "closed" });

    runner.complete("a");
    await flushAsync();
    expect(closed).toBe(false);

    runner.complete("b");
    await closing;
    expect(closed).toBe(true);
    expect(runner.started.get("b")).toBe(1);
  });

  it("aborts running tasks and rejects queued ones on a forced close", async () => {
    const runner = createControllableRunner();
    const executor = new LocalExecutor({ concurrency: 1, queueDepth: 1, run: runner.run });

    const running = executor.submit(task("a"));
    const queued = executor.submit(task("b"));
    await flushAsync();

    if (!running.accepted || !queued.accepted) {
      throw new Error("expected both tasks to be accepted");
    }

    const runningFailure = running.completion.catch((error: unknown) => error);
    const queuedFailure = queued.completion.catch((error: unknown) => error);

    await executor.close({ force: true });

    expect(await runningFailure).toBeInstanceOf(ExecutorClosedError);
    const queuedError = await queuedFailure;
    expect(queuedError).toBeInstanceOf(ExecutorClosedError);
    expect(queuedError).toMatchObject({
      message: "Executor closed before the task started (component=executor)",
    });
    expect(runner.started.has("b")).toBe(false);
    await executor.onIdle();
  });

  it("rejects a task whose runner settles with a result after a forced abort", async () => {
    const executor = new LocalExecutor({
      concurrency: 1,
      queueDepth: 0,
      run: (probeTask, signal) =>
        new Promise((resolve) => {
          signal.addEventListener(
            "abort",
            () => {
              resolve(createCheckResult({ targetId: probeTask.target.id, success: false }));
            },
            { once: true },
          );
        }),
    });

    const outcome = executor.submit(task("a"));
    await flushAsync();

    if (!outcome.accepted) {
      throw new Error("expected the task to be accepted");
    }

    const failure = outcome.completion.catch((error: unknown) => error);
    await executor.close({ force: true });

    const error = await failure;
    expect(error).toBeInstanceOf(ExecutorClosedError);
    expect(error).toMatchObject({
      message: "Task was aborted by a forced close (component=executor)",
    });
  });

  it("rejects invalid sizing", () => {
    const runner = createControllableRunner();
    expect(() => new LocalExecutor({ concurrency: 0, queueDepth: 0, run: runner.run })).toThrow(
      "concurrency must be an integer greater than or equal to 1",
    );
  });
});
