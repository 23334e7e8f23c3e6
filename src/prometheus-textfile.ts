import {
  COUNTER_DEFINITIONS,
  GAUGE_DEFINITIONS,
  type MetricsSnapshot,
  type TargetStatus,
} from "./metrics";

export const METRIC_PREFIX = "sitepulse_";

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function formatLabels(labels: Record<string, string | undefined>): string {
  const entries = Object.entries(labels).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return "";
  }

  const rendered = entries
    .map(([key, value]) => `${key}="${escapeLabelValue(String(value))}"`)
    .join(",");

  return `{${rendered}}`;
}

function assertFiniteTimestamp(timestamp: number): number {
  if (!Number.isFinite(timestamp)) {
    throw new TypeError("Invalid Date value provided for serialization");
  }

  return timestamp;
}

function header(name: string, help: string, type: "counter" | "gauge"): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

function serializeTargetMetrics(targets: ReadonlyMap<string, TargetStatus>): string[] {
  const ids = [...targets.keys()].sort();
  const upName = `${METRIC_PREFIX}target_up`;
  const latencyName = `${METRIC_PREFIX}target_response_time_ms`;
  const lines = ["", ...header(upName, "1 when the last probe succeeded, 0 otherwise", "gauge")];

  for (const id of ids) {
    const status = targets.get(id);
    if (status) {
      lines.push(`${upName}${formatLabels({ target: id })} ${status.up ? 1 : 0}`);
    }
  }

  lines.push("", ...header(latencyName, "response time of the last probe", "gauge"));

  for (const id of ids) {
    const responseTimeMs = targets.get(id)?.responseTimeMs;
    if (typeof responseTimeMs === "number" && Number.isFinite(responseTimeMs)) {
      lines.push(`${latencyName}${formatLabels({ target: id })} ${responseTimeMs}`);
    }
  }

  return lines;
}

/**
 * Renders a metrics snapshot in the Prometheus text exposition format used by the node
 * exporter's textfile collector.
 */
export function serializeMetricsToPrometheusTextfile(
  snapshot: MetricsSnapshot,
  scrapedAt: Date,
): string {
  const timestampMs = assertFiniteTimestamp(scrapedAt.getTime());
  const blocks: string[][] = [];

  for (const { name, help } of COUNTER_DEFINITIONS) {
    const metric = `${METRIC_PREFIX}${name}_total`;
    blocks.push([...header(metric, help, "counter"), `${metric} ${snapshot.counters.get(name) ?? 0}`]);
  }

  for (const { name, help } of GAUGE_DEFINITIONS) {
    const metric = `${METRIC_PREFIX}${name}`;
    blocks.push([...header(metric, help, "gauge"), `${metric} ${snapshot.gauges.get(name) ?? 0}`]);
  }

  const lines = blocks.flatMap((block, index) => (index === 0 ? block : ["", ...block]));

  if (snapshot.targets.size > 0) {
    lines.push(...serializeTargetMetrics(snapshot.targets));
  }

  const scrapeName = `${METRIC_PREFIX}scrape_timestamp_ms`;
  lines.push("", ...header(scrapeName, "unix epoch ms", "gauge"), `${scrapeName} ${timestampMs}`);

  return `${lines.join("\n")}\n`;
}
