/**
 * Configuration loading
 *
 * Two layers: infrastructure comes from environment variables, monitoring
 * policy (thresholds, stages, sources, queues) from config/monitoring.json.
 * Both are validated with zod once at startup and treated as immutable.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { Severity } from '@sentinel/shared-types';
import { ConfigError } from './errors';

const windowSchema = z.object({
  startHourUtc: z.number().int().min(0).max(23),
  endHourUtc: z.number().int().min(0).max(24),
});

const thresholdFields = {
  description: z.string().optional(),
  applicabilityWindow: windowSchema.optional(),
  warningThreshold: z.number(),
  criticalThreshold: z.number(),
  direction: z.enum(['above', 'below']),
};

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, 'must be a plain SQL identifier');

export const freshnessCheckSchema = z.object({
  ...thresholdFields,
  table: identifier,
  timestampColumn: identifier,
});

export const gapSourceSchema = z.object({
  description: z.string().optional(),
  applicabilityWindow: windowSchema.optional(),
  blobPrefix: z.string().includes('{date}'),
  table: identifier,
  dateColumn: identifier,
  gapType: z.string().min(1),
  severity: z.nativeEnum(Severity).default(Severity.WARNING),
});

export const stallCheckSchema = z.object({
  ...thresholdFields,
  dependsOn: z.string().optional(),
});

export const coverageCheckSchema = z.object({
  ...thresholdFields,
  expectedTable: identifier,
  expectedDateColumn: identifier,
  expectedKeyColumn: identifier,
  producedTable: identifier,
  producedDateColumn: identifier,
  producedKeyColumn: identifier,
});

export const stageSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  expectedProcessors: z.array(z.string().min(1)).min(1),
});

const gapActionSchema = z.object({
  serviceUrl: z.string().url(),
  endpoint: z.string().startsWith('/'),
  processors: z.array(z.string().min(1)).min(1),
  priority: z.enum(['low', 'medium', 'high']).default('medium'),
});

const dlqQueueSchema = z.object({
  description: z.string().min(1),
  phaseFrom: z.string().min(1),
  phaseTo: z.string().min(1),
  severity: z.nativeEnum(Severity),
  recoveryHint: z.string().min(1),
});

export const monitoringConfigSchema = z.object({
  freshness: z.record(freshnessCheckSchema),
  gaps: z.record(gapSourceSchema),
  stalls: z.record(stallCheckSchema),
  coverage: z.record(coverageCheckSchema),
  stages: z.array(stageSchema).min(1),
  completeness: z.object({
    lookbackHours: z.number().positive(),
    triggerStages: z.array(z.string().min(1)),
    scheduleTable: identifier,
    scheduleDateColumn: identifier,
    scheduleGameIdColumn: identifier,
    observedTable: identifier,
    observedDateColumn: identifier,
    observedGameIdColumn: identifier,
    missingGamesGapType: z.string().min(1),
  }),
  activity: z.object({
    table: identifier,
    dateColumn: identifier,
  }),
  latency: z.object({
    transitionThresholdsSeconds: z.record(z.number().positive()),
    totalWarningSeconds: z.number().positive(),
    totalCriticalSeconds: z.number().positive(),
    historyDays: z.number().int().positive(),
    minHistorySamples: z.number().int().positive(),
  }),
  backfill: z.object({
    cooldownHours: z.number().positive(),
    maxIdentifiersPerRequest: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
    actions: z.record(gapActionSchema),
  }),
  dlq: z.object({
    peekLimit: z.number().int().positive(),
    sampleSize: z.number().int().nonnegative(),
    cooldownMinutes: z.number().positive(),
    queues: z.record(dlqQueueSchema),
  }),
});

export type MonitoringConfig = z.infer<typeof monitoringConfigSchema>;
export type FreshnessCheckConfig = z.infer<typeof freshnessCheckSchema>;
export type GapSourceConfig = z.infer<typeof gapSourceSchema>;
export type StallCheckConfig = z.infer<typeof stallCheckSchema>;
export type CoverageCheckConfig = z.infer<typeof coverageCheckSchema>;
export type StageConfig = z.infer<typeof stageSchema>;
export type GapAction = z.infer<typeof gapActionSchema>;
export type DlqQueueConfig = z.infer<typeof dlqQueueSchema>;

const DEFAULT_CONFIG_URL = new URL('../../../config/monitoring.json', import.meta.url);

export function parseMonitoringConfig(raw: unknown): MonitoringConfig {
  const parsed = monitoringConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid monitoring config', parsed.error.issues);
  }

  const stageKeys = new Set(parsed.data.stages.map((stage) => stage.key));
  for (const [key, stall] of Object.entries(parsed.data.stalls)) {
    if (!stageKeys.has(key)) {
      throw new ConfigError(`Stall check "${key}" does not name a configured stage`);
    }
    if (stall.dependsOn && !stageKeys.has(stall.dependsOn)) {
      throw new ConfigError(`Stall check "${key}" depends on unknown stage "${stall.dependsOn}"`);
    }
  }
  for (const stageKey of parsed.data.completeness.triggerStages) {
    if (!stageKeys.has(stageKey)) {
      throw new ConfigError(`Completeness trigger stage "${stageKey}" is not a configured stage`);
    }
  }
  if (!parsed.data.backfill.actions[parsed.data.completeness.missingGamesGapType]) {
    throw new ConfigError('Completeness missingGamesGapType has no backfill action');
  }
  for (const [key, source] of Object.entries(parsed.data.gaps)) {
    if (!parsed.data.backfill.actions[source.gapType]) {
      throw new ConfigError(`Gap source "${key}" uses gap type "${source.gapType}" with no backfill action`);
    }
  }

  return parsed.data;
}

export function loadMonitoringConfig(path?: string): MonitoringConfig {
  const location = path ?? process.env.MONITORING_CONFIG ?? fileURLToPath(DEFAULT_CONFIG_URL);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(location, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read monitoring config at ${location}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseMonitoringConfig(raw);
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  CLICKHOUSE_HOST: z.string().default('localhost'),
  CLICKHOUSE_PORT: z.coerce.number().int().positive().default(8123),
  CLICKHOUSE_DATABASE: z.string().default('pipeline_monitoring'),
  CLICKHOUSE_USER: z.string().default('default'),
  CLICKHOUSE_PASSWORD: z.string().default(''),

  S3_REGION: z.string().default('us-east-1'),
  S3_BUCKET: z.string().default('raw-scrapes'),
  S3_ENDPOINT: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,

  BACKFILL_STORE: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  MONGO_DATABASE: z.string().default('pipeline_monitoring'),

  AMQP_URL: z.string().default('amqp://localhost:5672'),
  SIGNAL_QUEUE: z.enum(['rabbitmq', 'memory']).default('rabbitmq'),

  SLACK_WEBHOOK_URL: optionalString,
  ALERT_EMAIL_FROM: optionalString,
  ALERT_EMAIL_TO: optionalString,
  SES_REGION: z.string().default('us-east-1'),

  RECOVERY_AUTH_TOKEN: optionalString,

  ALERT_RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().positive().default(60),
  ALERT_MAX_PER_WINDOW: z.coerce.number().int().nonnegative().default(3),
  BACKFILL_MODE: booleanFlag,

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),

  PORT: z.coerce.number().int().positive().default(8080),
  SCHEDULE_INTERVAL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  SIGNAL_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  ALERT_FLUSH_INTERVAL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Replace the warning threshold of every check in a table. Used by the CLI's
 * --threshold flag; critical thresholds are left alone.
 */
export function withWarningThreshold<C extends { warningThreshold: number }>(
  checks: Record<string, C>,
  warningThreshold: number
): Record<string, C> {
  const result: Record<string, C> = {};
  for (const [key, check] of Object.entries(checks)) {
    result[key] = { ...check, warningThreshold };
  }
  return result;
}
