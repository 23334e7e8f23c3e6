import { describe, expect, it } from "vitest";

import { PipelineMetrics } from "../metrics";
import { serializeMetricsToPrometheusTextfile } from "../prometheus-textfile";

const SCRAPED_AT = new Date("2026-03-01T10:15:00.000Z");

describe("prometheus textfile serialization", () => {
  it("renders counters, gauges, and the scrape timestamp with the sitepulse prefix", () => {
    const metrics = new PipelineMetrics();
    metrics.increment("dispatched", 4);
    metrics.increment("results_dropped");
    metrics.setGauge("in_flight", 2);

    const textfile = serializeMetricsToPrometheusTextfile(metrics.snapshot(), SCRAPED_AT);

    expect(textfile.startsWith("# HELP sitepulse_dispatched_total probe tasks handed to the executor\n")).toBe(true);
    expect(textfile.endsWith("\n")).toBe(true);
    expect(textfile).toContain("# TYPE sitepulse_dispatched_total counter\nsitepulse_dispatched_total 4\n");
    expect(textfile).toContain("\nsitepulse_results_dropped_total 1\n");
    expect(textfile).toContain("\nsitepulse_deferred_total 0\n");
    expect(textfile).toContain("# TYPE sitepulse_in_flight gauge\nsitepulse_in_flight 2\n");
    expect(textfile).toContain(
      `# HELP sitepulse_scrape_timestamp_ms unix epoch ms\n# TYPE sitepulse_scrape_timestamp_ms gauge\nsitepulse_scrape_timestamp_ms ${SCRAPED_AT.getTime()}\n`,
    );
    expect(textfile).not.toContain("sitepulse_target_up");
  });

  it("labels per-target gauges and skips missing response times", () => {
    const metrics = new PipelineMetrics();
    metrics.recordTargetStatus("web", { up: false });
    metrics.recordTargetStatus('api "v2"', { up: true, responseTimeMs: 42 });

    const textfile = serializeMetricsToPrometheusTextfile(metrics.snapshot(), SCRAPED_AT);

    expect(textfile).toContain(
      'sitepulse_target_up{target="api \\"v2\\""} 1\nsitepulse_target_up{target="web"} 0\n',
    );
    expect(textfile).toContain('sitepulse_target_response_time_ms{target="api \\"v2\\""} 42\n');
    expect(textfile).not.toContain('sitepulse_target_response_time_ms{target="web"}');
  });

  it("rejects invalid scrape timestamps", () => {
    expect(() =>
      serializeMetricsToPrometheusTextfile(new PipelineMetrics().snapshot(), new Date(Number.NaN)),
    ).toThrow("Invalid Date value provided for serialization");
  });
});
