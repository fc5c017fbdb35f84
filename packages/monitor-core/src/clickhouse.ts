/**
 * ClickHouse access for the monitoring layer
 *
 * Two tables are owned here and created on initialize():
 * - phase_completions: append-only completion records reported by processors
 * - pipeline_latency_metrics: one row per fully completed business date,
 *   ReplacingMergeTree so re-tracking a date overwrites instead of duplicating
 *
 * Everything else is read-only probing of pipeline tables named in the
 * monitoring config (freshness, row counts, coverage, schedule cross-checks).
 * Table and column names come from the validated config, never from requests.
 */

import { createClient, type ClickHouseClient } from '@clickhouse/client';
import type { CompletionRecord, CompletionStatus } from '@sentinel/shared-types';
import type { CoverageCheckConfig, MonitoringConfig } from './config';

export interface ClickHouseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface LatencyMetricsRow {
  businessDate: string;
  stageTimestamps: Record<string, string | null>;
  transitionSeconds: Record<string, number | null>;
  totalLatencySeconds: number;
  violationCount: number;
  computedAt: Date;
}

export interface LatencyStats {
  sampleCount: number;
  avgSeconds: number;
  minSeconds: number;
  maxSeconds: number;
  stddevSeconds: number;
  p50Seconds: number;
  p95Seconds: number;
  p99Seconds: number;
}

export interface MissingGames {
  scheduledGames: number;
  missingGameIds: string[];
}

interface CompletionRow {
  stage_key: string;
  business_date: string;
  processor_name: string;
  completed_at_ms: string | number;
  status: string;
  rows_processed: string | number;
}

interface CountRow {
  n: string | number;
}

interface LatestRow {
  latest_ms: string | number | null;
  n: string | number;
}

interface CoverageRow {
  expected: string | number;
  produced: string | number;
}

interface GameIdRow {
  game_id: string;
}

interface StatsRow {
  sample_count: string | number;
  avg_s: number | null;
  min_s: number | null;
  max_s: number | null;
  stddev_s: number | null;
  q: Array<number | null>;
}

const COMPLETION_STATUSES: readonly CompletionStatus[] = ['success', 'partial', 'failed'];

function toCompletionStatus(value: string): CompletionStatus {
  return COMPLETION_STATUSES.find((status) => status === value) ?? 'failed';
}

// DateTime64(3) for ClickHouse's best-effort parser: "YYYY-MM-DD hh:mm:ss.sss"
function toDateTime64(date: Date): string {
  return date.toISOString().replace('T', ' ').replace('Z', '');
}

export class WarehouseStorage {
  private client: ClickHouseClient;
  private database: string;

  constructor(config: ClickHouseConfig) {
    this.database = config.database;

    // HTTPS for managed ClickHouse on TLS ports
    const protocol = config.port === 443 || config.port === 8443 ? 'https' : 'http';

    const clientConfig: {
      url: string;
      username: string;
      database: string;
      password?: string;
    } = {
      url: `${protocol}://${config.host}:${config.port}`,
      username: config.user,
      database: this.database,
    };

    // The client rejects an empty-string password; omit the field instead
    const password = config.password.trim();
    if (password.length > 0) {
      clientConfig.password = password;
    }

    this.client = createClient(clientConfig);
  }

  /**
   * Idempotent: safe to call on every start
   */
  async initialize(): Promise<void> {
    await this.client.exec({ query: `CREATE DATABASE IF NOT EXISTS ${this.database}` });

    await this.client.exec({ query: `
      CREATE TABLE IF NOT EXISTS ${this.database}.phase_completions (
        stage_key LowCardinality(String),
        business_date Date,
        processor_name LowCardinality(String),
        completed_at DateTime64(3, 'UTC'),
        status LowCardinality(String),
        rows_processed UInt64
      )
      ENGINE = MergeTree
      ORDER BY (business_date, stage_key, processor_name, completed_at)
      PARTITION BY toYYYYMM(business_date)
    ` });

    await this.client.exec({ query: `
      CREATE TABLE IF NOT EXISTS ${this.database}.pipeline_latency_metrics (
        business_date Date,
        stage_timestamps String,
        transition_seconds String,
        total_latency_seconds Float64,
        violation_count UInt32,
        computed_at DateTime64(3, 'UTC')
      )
      ENGINE = ReplacingMergeTree(computed_at)
      ORDER BY (business_date)
    ` });
  }

  async recordCompletion(record: CompletionRecord): Promise<void> {
    await this.client.insert({
      table: `${this.database}.phase_completions`,
      values: [
        {
          stage_key: record.stageKey,
          business_date: record.businessDate,
          processor_name: record.processorName,
          completed_at: toDateTime64(record.completedAt),
          status: record.status,
          rows_processed: record.rowsProcessed,
        },
      ],
      format: 'JSONEachRow',
    });
  }

  /**
   * All completion records for a business date, optionally only those
   * reported after `since` (the completeness lookback window).
   */
  async getCompletions(businessDate: string, since?: Date): Promise<CompletionRecord[]> {
    const sinceClause = since ? 'AND completed_at >= fromUnixTimestamp64Milli({since:Int64})' : '';
    const result = await this.client.query({
      query: `
        SELECT
          stage_key,
          toString(business_date) AS business_date,
          processor_name,
          toUnixTimestamp64Milli(completed_at) AS completed_at_ms,
          status,
          rows_processed
        FROM ${this.database}.phase_completions
        WHERE business_date = {date:Date} ${sinceClause}
        ORDER BY completed_at ASC
      `,
      query_params: { date: businessDate, since: since ? since.getTime() : 0 },
      format: 'JSONEachRow',
    });

    const rows = await result.json<CompletionRow>();
    return rows.map((row) => ({
      stageKey: row.stage_key,
      businessDate: row.business_date,
      processorName: row.processor_name,
      completedAt: new Date(Number(row.completed_at_ms)),
      status: toCompletionStatus(row.status),
      rowsProcessed: Number(row.rows_processed),
    }));
  }

  async latestTimestamp(table: string, column: string): Promise<Date | null> {
    const result = await this.client.query({
      query: `
        SELECT
          toUnixTimestamp64Milli(toDateTime64(max(${column}), 3, 'UTC')) AS latest_ms,
          count() AS n
        FROM ${table}
      `,
      format: 'JSONEachRow',
    });

    const [row] = await result.json<LatestRow>();
    if (!row || Number(row.n) === 0 || row.latest_ms === null) {
      return null;
    }
    return new Date(Number(row.latest_ms));
  }

  async countRowsForDate(table: string, dateColumn: string, businessDate: string): Promise<number> {
    const result = await this.client.query({
      query: `SELECT count() AS n FROM ${table} WHERE ${dateColumn} = {date:Date}`,
      query_params: { date: businessDate },
      format: 'JSONEachRow',
    });

    const [row] = await result.json<CountRow>();
    return row ? Number(row.n) : 0;
  }

  async hasActivity(activity: MonitoringConfig['activity'], businessDate: string): Promise<boolean> {
    return (await this.countRowsForDate(activity.table, activity.dateColumn, businessDate)) > 0;
  }

  async coverageCounts(
    config: CoverageCheckConfig,
    businessDate: string
  ): Promise<{ expected: number; produced: number }> {
    const result = await this.client.query({
      query: `
        SELECT
          uniqExact(${config.expectedKeyColumn}) AS expected,
          uniqExactIf(
            ${config.expectedKeyColumn},
            ${config.expectedKeyColumn} IN (
              SELECT DISTINCT ${config.producedKeyColumn}
              FROM ${config.producedTable}
              WHERE ${config.producedDateColumn} = {date:Date}
            )
          ) AS produced
        FROM ${config.expectedTable}
        WHERE ${config.expectedDateColumn} = {date:Date}
      `,
      query_params: { date: businessDate },
      format: 'JSONEachRow',
    });

    const [row] = await result.json<CoverageRow>();
    return row
      ? { expected: Number(row.expected), produced: Number(row.produced) }
      : { expected: 0, produced: 0 };
  }

  async findMissingGames(
    config: MonitoringConfig['completeness'],
    businessDate: string
  ): Promise<MissingGames> {
    const scheduledGames = await this.client.query({
      query: `
        SELECT uniqExact(${config.scheduleGameIdColumn}) AS n
        FROM ${config.scheduleTable}
        WHERE ${config.scheduleDateColumn} = {date:Date}
      `,
      query_params: { date: businessDate },
      format: 'JSONEachRow',
    });
    const [scheduled] = await scheduledGames.json<CountRow>();

    const missing = await this.client.query({
      query: `
        SELECT DISTINCT toString(${config.scheduleGameIdColumn}) AS game_id
        FROM ${config.scheduleTable}
        WHERE ${config.scheduleDateColumn} = {date:Date}
          AND ${config.scheduleGameIdColumn} NOT IN (
            SELECT DISTINCT ${config.observedGameIdColumn}
            FROM ${config.observedTable}
            WHERE ${config.observedDateColumn} = {date:Date}
          )
        ORDER BY game_id
      `,
      query_params: { date: businessDate },
      format: 'JSONEachRow',
    });
    const rows = await missing.json<GameIdRow>();

    return {
      scheduledGames: scheduled ? Number(scheduled.n) : 0,
      missingGameIds: rows.map((row) => row.game_id),
    };
  }

  async storeLatencyMetrics(metrics: LatencyMetricsRow): Promise<void> {
    await this.client.insert({
      table: `${this.database}.pipeline_latency_metrics`,
      values: [
        {
          business_date: metrics.businessDate,
          stage_timestamps: JSON.stringify(metrics.stageTimestamps),
          transition_seconds: JSON.stringify(metrics.transitionSeconds),
          total_latency_seconds: metrics.totalLatencySeconds,
          violation_count: metrics.violationCount,
          computed_at: toDateTime64(metrics.computedAt),
        },
      ],
      format: 'JSONEachRow',
    });
  }

  async getLatencyStats(days: number, beforeDate: string): Promise<LatencyStats | null> {
    const result = await this.client.query({
      query: `
        SELECT
          count() AS sample_count,
          avg(total_latency_seconds) AS avg_s,
          min(total_latency_seconds) AS min_s,
          max(total_latency_seconds) AS max_s,
          stddevPop(total_latency_seconds) AS stddev_s,
          quantiles(0.5, 0.95, 0.99)(total_latency_seconds) AS q
        FROM ${this.database}.pipeline_latency_metrics FINAL
        WHERE business_date < {before:Date}
          AND business_date >= {before:Date} - {days:UInt32}
      `,
      query_params: { before: beforeDate, days },
      format: 'JSONEachRow',
    });

    const [row] = await result.json<StatsRow>();
    if (!row || Number(row.sample_count) === 0) {
      return null;
    }
    return {
      sampleCount: Number(row.sample_count),
      avgSeconds: row.avg_s ?? 0,
      minSeconds: row.min_s ?? 0,
      maxSeconds: row.max_s ?? 0,
      stddevSeconds: row.stddev_s ?? 0,
      p50Seconds: row.q[0] ?? 0,
      p95Seconds: row.q[1] ?? 0,
      p99Seconds: row.q[2] ?? 0,
    };
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
