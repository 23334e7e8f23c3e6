import { EventEmitter } from "node:events";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigValidationError } from "../config/errors";
import { resolveSettings, type MonitorSettings } from "../config/settings";
import type { RawMonitorFile } from "../config/types";
import { createLogger, type LogEntry } from "../logging";
import { MonitorService, runUntilSignal } from "../monitor";
import { MemoryStore } from "../storage/memory";
import { createTimedResponse } from "../testing/fixtures";

const NOW = new Date("2026-03-10T12:00:00.000Z");
const EVERYTHING = [new Date(0), new Date("2027-01-01T00:00:00.000Z")] as const;

function settingsFor(overrides: Partial<RawMonitorFile> = {}): MonitorSettings {
  return resolveSettings({
    tick: "10ms",
    shutdown_grace: "200ms",
    targets: [
      { id: "api", url: "https://api.example.test/health", interval: "5s" },
      { id: "web", url: "https://web.example.test/", interval: "10s" },
    ],
    ...overrides,
  });
}

function createService(
  store: MemoryStore,
  options: { settings?: MonitorSettings; reloadSettings?: () => Promise<MonitorSettings>; entries?: LogEntry[] } = {},
) {
  const entries = options.entries ?? [];
  return new MonitorService({
    settings: options.settings ?? settingsFor(),
    reloadSettings: options.reloadSettings,
    openStore: async () => store,
    request: async () => createTimedResponse(),
    clock: () => NOW,
    logger: createLogger({ level: "info", write: (entry) => entries.push(entry) }),
  });
}

describe("MonitorService", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  it("probes every active target, records the results and closes storage on shutdown", async () => {
    const store = new MemoryStore();
    const service = createService(store);

    await service.start();
    await vi.waitFor(() => {
      expect(service.metrics.counter("results_recorded")).toBe(2);
    });

    const stored = await store.selectResultsInRange(...EVERYTHING);
    expect(stored.map((result) => [result.targetId, result.httpStatus, result.checkedAt])).toEqual([
      ["api", 200, NOW],
      ["web", 200, NOW],
    ]);
    expect(store.listTargets().map((target) => target.id)).toEqual(["api", "web"]);

    await expect(service.shutdown()).resolves.toEqual({ drained: 0, abandoned: 0 });
    await expect(store.dailyStats()).rejects.toThrow("Store is closed");
  });

  it("writes the metrics textfile and flushes it on shutdown", async () => {
    const dir = await mkdtemp(join(tmpdir(), "sitepulse-monitor-"));
    tempDirs.push(dir);
    const path = join(dir, "sitepulse.prom");
    const store = new MemoryStore();
    const service = createService(store, {
      settings: settingsFor({ metrics: { textfile: path, interval: "1h" } }),
    });

    await service.start();
    await vi.waitFor(() => {
      expect(service.metrics.counter("results_recorded")).toBe(2);
    });
    await service.shutdown();

    const lines = (await readFile(path, "utf8")).split("\n");
    expect(lines).toContain("sitepulse_results_recorded_total 2");
    expect(lines).toContain("sitepulse_rollup_cycles_total 1");
  });

  it("swaps targets on reload and marks removed targets inactive", async () => {
    const store = new MemoryStore();
    const reloaded = settingsFor({
      targets: [{ id: "web", url: "https://web.example.test/", interval: "10s" }],
    });
    const service = createService(store, { reloadSettings: async () => reloaded });

    await service.start();
    await expect(service.reload()).resolves.toBe(true);

    expect(service.currentSettings.targets.map((target) => target.id)).toEqual(["web"]);
    expect(store.listTargets()).toEqual([
      { id: "api", url: "https://api.example.test/health", active: false },
      { id: "web", url: "https://web.example.test/", active: true },
    ]);

    await service.shutdown();
  });

  it("keeps the current targets when the reloaded configuration is invalid", async () => {
    const store = new MemoryStore();
    const entries: LogEntry[] = [];
    const service = createService(store, {
      entries,
      reloadSettings: async () => {
        throw new ConfigValidationError("config.targets[0].interval: out of range", [
          "config.targets[0].interval: out of range",
        ]);
      },
    });

    await service.start();
    await expect(service.reload()).resolves.toBe(false);

    expect(service.currentSettings.targets.map((target) => target.id)).toEqual(["api", "web"]);
    expect(entries.find((entry) => entry.level === "error")).toMatchObject({
      message: "configuration reload failed, keeping current targets",
      error: { name: "ConfigValidationError" },
    });

    await service.shutdown();
  });

  it("returns the same report when shutdown is requested twice", async () => {
    const service = createService(new MemoryStore());

    await service.start();
    const first = service.shutdown();

    expect(service.shutdown()).toBe(first);
    await first;
  });
});

describe("runUntilSignal", () => {
  it("reloads on SIGHUP and shuts down on SIGTERM", async () => {
    const store = new MemoryStore();
    const reloadSettings = vi.fn(async () => settingsFor());
    const service = createService(store, { reloadSettings });
    const signals = new EventEmitter();

    const running = runUntilSignal(service, signals);
    await vi.waitFor(() => {
      expect(signals.listenerCount("SIGTERM")).toBe(1);
    });

    signals.emit("SIGHUP");
    await vi.waitFor(() => {
      expect(reloadSettings).toHaveBeenCalledTimes(1);
    });

    signals.emit("SIGTERM");

    await expect(running).resolves.toEqual({ drained: 0, abandoned: 0, signal: "SIGTERM" });
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGHUP")).toBe(0);
  });
});
