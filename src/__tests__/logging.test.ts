import { describe, expect, it } from "vitest";

import { createLogger, isLogLevel, type LogEntry } from "../logging";

function createCollector(): { entries: LogEntry[]; write: (entry: LogEntry) => void } {
  const entries: LogEntry[] = [];
  return { entries, write: (entry) => entries.push(entry) };
}

const fixedNow = () => new Date("2025-03-01T12:00:00.000Z");

describe("createLogger", () => {
  it("drops entries below the configured level", () => {
    const { entries, write } = createCollector();
    const logger = createLogger({ level: "warn", write, now: fixedNow });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible", { targetId: "api" });

    expect(entries).toEqual([
      { time: "2025-03-01T12:00:00.000Z", level: "warn", message: "visible", targetId: "api" },
    ]);
  });

  it("merges child bindings and serializes errors and dates", () => {
    const { entries, write } = createCollector();
    const logger = createLogger({ level: "debug", write, now: fixedNow }).child({
      component: "sink",
    });
    const failure = Object.assign(new Error("connection refused"), { code: "ECONNREFUSED" });

    logger.error("write failed", {
      error: failure,
      checkedAt: new Date("2025-03-01T11:59:00.000Z"),
      skipped: undefined,
    });

    expect(entries[0]).toEqual({
      time: "2025-03-01T12:00:00.000Z",
      level: "error",
      message: "write failed",
      component: "sink",
      error: { name: "Error", message: "connection refused", code: "ECONNREFUSED" },
      checkedAt: "2025-03-01T11:59:00.000Z",
    });
  });

  it("keeps its own time, level and message when fields reuse those names", () => {
    const { entries, write } = createCollector();
    const logger = createLogger({ write, now: fixedNow }).child({ level: "debug" });

    logger.warn("slow response", { time: "yesterday", message: "body text", targetId: "api" });

    expect(entries).toEqual([
      { time: "2025-03-01T12:00:00.000Z", level: "warn", message: "slow response", targetId: "api" },
    ]);
  });

  it("redacts credentials in url fields", () => {
    const { entries, write } = createCollector();
    const logger = createLogger({ write, now: fixedNow });

    logger.info("connecting", { storageUrl: "postgres://monitor:test-secret@db:5432/sitepulse" });

    expect(entries[0]?.storageUrl).toBe("postgres://monitor:[redacted]@db:5432/sitepulse");
  });
});

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
