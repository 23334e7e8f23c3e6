import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";

import postgres from "postgres";

import type {
  CheckResult,
  DailyStat,
  RollupCycle,
  TargetConfig,
  TargetSummary,
} from "../domain";
import { StorageError } from "../errors/base";
import { silentLogger, type Logger } from "../logging";
import {
  fromCheckResultRow,
  fromDailyStatRow,
  fromRollupCycleRow,
  fromTargetSummaryRow,
  toCheckResultRow,
  type CheckResultRow,
  type DailyStatRow,
  type RollupCycleRow,
  type TargetSummaryRow,
} from "./rows";
import type { MonitorStore, RollupTransaction } from "./types";

export const SCHEMA_FILE = fileURLToPath(new URL("../../sql/schema.sql", import.meta.url));

/** Rows removed per DELETE statement during a purge. */
export const DELETE_BATCH_SIZE = 5_000;

const SUMMARY_WINDOW_MS = 24 * 60 * 60 * 1000;

export interface PostgresStoreOptions {
  url: string;
  maxConnections: number;
  deleteBatchSize?: number;
  logger?: Logger;
}

function wrap(operation: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`${operation} failed: ${message}`, { cause: error });
}

/**
 * Rollup queries bound to one connection or transaction.
 */
class PostgresRollupQueries implements RollupTransaction {
  constructor(protected readonly sql: postgres.Sql) {}

  async selectResultsInRange(start: Date, end: Date): Promise<CheckResult[]> {
    const rows = await this.sql<CheckResultRow[]>`
      SELECT target_id, url, checked_at, total_ms, dns_ms, connect_ms, tls_ms,
             server_processing_ms, transfer_ms, content_size_bytes, http_status, success,
             pattern_matched, failure_reason, failure_message, details
      FROM check_results
      WHERE checked_at >= ${start} AND checked_at < ${end}
      ORDER BY checked_at
    `;
    return rows.map(fromCheckResultRow);
  }

  async upsertDailyStat(delta: DailyStat): Promise<void> {
    await this.sql`
      INSERT INTO daily_stats (
        target_id, day, total_checks, successful_checks, failure_count, response_time_samples,
        min_response_time_ms, avg_response_time_ms, max_response_time_ms
      ) VALUES (
        ${delta.targetId}, ${delta.day}::date, ${delta.totalChecks}, ${delta.successfulChecks},
        ${delta.failureCount}, ${delta.responseTimeSamples}, ${delta.minResponseTimeMs},
        ${delta.avgResponseTimeMs}, ${delta.maxResponseTimeMs}
      )
      ON CONFLICT (target_id, day) DO UPDATE SET
        total_checks = daily_stats.total_checks + EXCLUDED.total_checks,
        successful_checks = daily_stats.successful_checks + EXCLUDED.successful_checks,
        failure_count = daily_stats.failure_count + EXCLUDED.failure_count,
        response_time_samples = daily_stats.response_time_samples + EXCLUDED.response_time_samples,
        min_response_time_ms = LEAST(daily_stats.min_response_time_ms, EXCLUDED.min_response_time_ms),
        max_response_time_ms = GREATEST(daily_stats.max_response_time_ms, EXCLUDED.max_response_time_ms),
        avg_response_time_ms = CASE
          WHEN daily_stats.response_time_samples + EXCLUDED.response_time_samples = 0 THEN NULL
          ELSE (
            COALESCE(daily_stats.avg_response_time_ms, 0) * daily_stats.response_time_samples +
            COALESCE(EXCLUDED.avg_response_time_ms, 0) * EXCLUDED.response_time_samples
          ) / (daily_stats.response_time_samples + EXCLUDED.response_time_samples)
        END,
        updated_at = now()
    `;
  }

  async recordRollupCycle(cycle: RollupCycle): Promise<void> {
    await this.sql`
      INSERT INTO rollup_cycles (
        cutoff, lower_bound, rows_summarized, stats_upserted, summarized_at, rows_purged, purged_at
      ) VALUES (
        ${cycle.cutoff}, ${cycle.lowerBound}, ${cycle.rowsSummarized}, ${cycle.statsUpserted},
        ${cycle.summarizedAt}, ${cycle.rowsPurged}, ${cycle.purgedAt}
      )
      ON CONFLICT (cutoff) DO UPDATE SET
        lower_bound = EXCLUDED.lower_bound,
        rows_summarized = EXCLUDED.rows_summarized,
        stats_upserted = EXCLUDED.stats_upserted,
        summarized_at = EXCLUDED.summarized_at,
        rows_purged = EXCLUDED.rows_purged,
        purged_at = EXCLUDED.purged_at
    `;
  }

  async latestRollupCycle(): Promise<RollupCycle | null> {
    const rows = await this.sql<RollupCycleRow[]>`
      SELECT cutoff, lower_bound, rows_summarized, stats_upserted, summarized_at, rows_purged, purged_at
      FROM rollup_cycles
      ORDER BY cutoff DESC
      LIMIT 1
    `;
    const row = rows[0];
    return row ? fromRollupCycleRow(row) : null;
  }
}

/**
 * MonitorStore on PostgreSQL through the `postgres` client.
 */
export class PostgresStore extends PostgresRollupQueries implements MonitorStore {
  private readonly holder = randomUUID();
  private readonly deleteBatchSize: number;
  private readonly logger: Logger;

  constructor(options: PostgresStoreOptions) {
    super(
      postgres(options.url, {
        max: options.maxConnections,
        idle_timeout: 20,
        connect_timeout: 10,
        onnotice: () => undefined,
      }),
    );
    this.deleteBatchSize = options.deleteBatchSize ?? DELETE_BATCH_SIZE;
    this.logger = options.logger ?? silentLogger;
  }

  async ensureSchema(): Promise<void> {
    try {
      await this.sql.file(SCHEMA_FILE);
    } catch (error) {
      throw wrap("Applying the schema", error);
    }
  }

  async insertResult(result: CheckResult): Promise<boolean> {
    const row = toCheckResultRow(result);

    try {
      const inserted = await this.sql`
        INSERT INTO check_results (
          target_id, url, checked_at, total_ms, dns_ms, connect_ms, tls_ms, server_processing_ms,
          transfer_ms, content_size_bytes, http_status, success, pattern_matched, failure_reason,
          failure_message, details
        ) VALUES (
          ${row.target_id}, ${row.url}, ${row.checked_at}, ${row.total_ms}, ${row.dns_ms},
          ${row.connect_ms}, ${row.tls_ms}, ${row.server_processing_ms}, ${row.transfer_ms},
          ${row.content_size_bytes}, ${row.http_status}, ${row.success}, ${row.pattern_matched},
          ${row.failure_reason}, ${row.failure_message}, ${JSON.stringify(result.details)}::jsonb
        )
        ON CONFLICT (target_id, checked_at) DO NOTHING
        RETURNING id
      `;
      return inserted.length > 0;
    } catch (error) {
      throw wrap("Insert", error);
    }
  }

  async deleteResultsBefore(cutoff: Date): Promise<number> {
    let deleted = 0;

    for (;;) {
      const result = await this.sql`
        DELETE FROM check_results
        WHERE id IN (
          SELECT id FROM check_results
          WHERE checked_at < ${cutoff}
          ORDER BY checked_at
          LIMIT ${this.deleteBatchSize}
        )
      `;
      deleted += result.count;

      if (result.count < this.deleteBatchSize) {
        break;
      }
    }

    this.logger.debug("purged raw results", { cutoff, deleted });
    return deleted;
  }

  async dailyStats(targetId?: string): Promise<DailyStat[]> {
    const rows = await this.sql<DailyStatRow[]>`
      SELECT target_id, to_char(day, 'YYYY-MM-DD') AS day, total_checks, successful_checks,
             failure_count, response_time_samples, min_response_time_ms, avg_response_time_ms,
             max_response_time_ms
      FROM daily_stats
      WHERE ${targetId === undefined ? this.sql`TRUE` : this.sql`target_id = ${targetId}`}
      ORDER BY target_id, day
    `;
    return rows.map(fromDailyStatRow);
  }

  async syncTargets(targets: readonly TargetConfig[]): Promise<void> {
    await this.sql.begin(async (tx) => {
      for (const target of targets) {
        await tx`
          INSERT INTO targets (id, url, interval_ms, pattern, method, active, updated_at)
          VALUES (
            ${target.id}, ${target.url}, ${target.intervalMs}, ${target.pattern ?? null},
            ${target.method}, ${target.active}, now()
          )
          ON CONFLICT (id) DO UPDATE SET
            url = EXCLUDED.url,
            interval_ms = EXCLUDED.interval_ms,
            pattern = EXCLUDED.pattern,
            method = EXCLUDED.method,
            active = EXCLUDED.active,
            updated_at = now()
        `;
      }

      await tx`
        UPDATE targets SET active = FALSE, updated_at = now()
        WHERE active AND NOT (id = ANY(${tx.array(targets.map((target) => target.id))}))
      `;
    });
  }

  async acquireLease(name: string, now: Date, leaseMs: number): Promise<boolean> {
    const rows = await this.sql`
      INSERT INTO leases (name, holder, expires_at)
      VALUES (${name}, ${this.holder}, ${new Date(now.getTime() + leaseMs)})
      ON CONFLICT (name) DO UPDATE SET holder = EXCLUDED.holder, expires_at = EXCLUDED.expires_at
      WHERE leases.expires_at <= ${now}
      RETURNING name
    `;
    return rows.length > 0;
  }

  async releaseLease(name: string): Promise<void> {
    await this.sql`DELETE FROM leases WHERE name = ${name} AND holder = ${this.holder}`;
  }

  async transaction<T>(fn: (tx: RollupTransaction) => Promise<T>): Promise<T> {
    const box: { result: { value: T } | null } = { result: null };

    await this.sql.begin(async (tx) => {
      box.result = { value: await fn(new PostgresRollupQueries(tx)) };
    });

    if (box.result === null) {
      throw new StorageError("Transaction finished without a result");
    }

    return box.result.value;
  }

  async markRollupPurged(cutoff: Date, rowsPurged: number, purgedAt: Date): Promise<void> {
    const result = await this.sql`
      UPDATE rollup_cycles SET rows_purged = ${rowsPurged}, purged_at = ${purgedAt}
      WHERE cutoff = ${cutoff}
    `;

    if (result.count === 0) {
      throw new StorageError(`No rollup cycle recorded for cutoff ${cutoff.toISOString()}`);
    }
  }

  async recentSummary(now: Date): Promise<TargetSummary[]> {
    const since = new Date(now.getTime() - SUMMARY_WINDOW_MS);
    const rows = await this.sql<TargetSummaryRow[]>`
      SELECT
        t.id AS target_id,
        t.url,
        COUNT(*)::int AS total_checks,
        COUNT(*) FILTER (WHERE r.success)::int AS successful_checks,
        COUNT(*) FILTER (WHERE NOT r.success)::int AS failure_count,
        ROUND((AVG(r.total_ms) FILTER (WHERE r.http_status IS NOT NULL))::numeric, 2)::float8
          AS avg_response_time_ms,
        MAX(r.checked_at) AS last_check_at,
        MAX(r.checked_at) FILTER (WHERE NOT r.success) AS last_failure_at
      FROM targets t
      JOIN check_results r ON r.target_id = t.id
      WHERE r.checked_at > ${since} AND r.checked_at <= ${now}
      GROUP BY t.id, t.url
      ORDER BY failure_count DESC, avg_response_time_ms DESC NULLS LAST, t.id
    `;
    return rows.map(fromTargetSummaryRow);
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
  }
}
