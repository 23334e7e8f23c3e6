import { afterAll, beforeAll, describe, expect, it } from "vitest";

import type { TargetConfig } from "../domain";
import { Prober } from "../probe";
import {
  HEALTHY_BODY,
  reserveClosedPort,
  startMockTargetServer,
  type MockTargetServer,
} from "../testing/mock-target-server";

function target(url: string, overrides: Partial<TargetConfig> = {}): TargetConfig {
  return { id: "local", url, intervalMs: 5_000, method: "GET", active: true, ...overrides };
}

describe("Prober against a live server", () => {
  let server: MockTargetServer;

  beforeAll(async () => {
    server = await startMockTargetServer({ slowDelayMs: 30 });
  });

  afterAll(async () => {
    await server.close();
  });

  it("measures a healthy endpoint and matches its body", async () => {
    const prober = new Prober({ timeoutMs: 2_000, retryLimit: 1 });
    const result = await prober.check(target(server.url("/slow"), { pattern: "status=ok" }));

    expect(result.success).toBe(true);
    expect(result.httpStatus).toBe(200);
    expect(result.patternMatched).toBe(true);
    expect(result.contentSizeBytes).toBe(Buffer.byteLength(HEALTHY_BODY));
    expect(result.details.patternMatch).toEqual({
      index: HEALTHY_BODY.indexOf("status=ok"),
      matchedText: "status=ok",
    });
    expect(result.timings.connectMs).toBeGreaterThanOrEqual(0);
    expect(result.timings.serverProcessingMs).toBeGreaterThanOrEqual(0);
    expect(result.timings.totalMs).toBeGreaterThanOrEqual(25);
  });

  it("reports server errors as http_error", async () => {
    const prober = new Prober({ timeoutMs: 2_000, retryLimit: 3 });
    const result = await prober.check(target(server.url("/status/500")));

    expect(result.success).toBe(false);
    expect(result.httpStatus).toBe(500);
    expect(result.failure).toEqual({ reason: "http_error", message: "HTTP 500" });
    expect(result.details.attempts).toBe(1);
  });

  it("retries a hanging endpoint until attempts run out", async () => {
    const before = server.requests.filter((request) => request.path === "/hang").length;
    const prober = new Prober({ timeoutMs: 50, retryLimit: 2 });
    const result = await prober.check(target(server.url("/hang")));
    const after = server.requests.filter((request) => request.path === "/hang").length;

    expect(after - before).toBe(2);
    expect(result.failure).toEqual({ reason: "timeout", message: "Request timed out after 50ms" });
    expect(result.httpStatus).toBeUndefined();
    expect(result.details).toMatchObject({ attempts: 2, retries: 1 });
  });

  it("reports refused connections as connection_error", async () => {
    const port = await reserveClosedPort();
    const prober = new Prober({ timeoutMs: 2_000, retryLimit: 2 });
    const result = await prober.check(target(`http://127.0.0.1:${port}/`));

    expect(result.failure?.reason).toBe("connection_error");
    expect(result.details).toMatchObject({ attempts: 2, errorCode: "ECONNREFUSED" });
  });
});
