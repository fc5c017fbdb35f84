/**
 * Process wiring shared by the API, the worker and the CLI: builds storage
 * clients, the alert manager and every detector from one env + monitoring
 * config pair.
 */

import {
  AlertManager,
  EmailChannel,
  SlackChannel,
  type NotificationChannel,
} from '@sentinel/alerting';
import { CheckSummary, systemClock, type Clock } from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import { AmqpClient, AmqpDeadLetterSource } from './amqp';
import { BackfillTrigger } from './backfill';
import { InMemoryBackfillStore, MongoBackfillStore, type BackfillStore } from './backfillStore';
import { WarehouseStorage } from './clickhouse';
import { withWarningThreshold, type EnvConfig, type MonitoringConfig } from './config';
import { CompletenessChecker } from './detectors/completeness';
import { createCoverageMonitor } from './detectors/coverage';
import { createFreshnessChecker } from './detectors/freshness';
import { GapDetector } from './detectors/gap';
import { createStallDetector } from './detectors/stall';
import type { Detector, DetectorOptions } from './detectors/ThresholdDetector';
import { DLQMonitor } from './dlq';
import { DetectorError } from './errors';
import { LatencyTracker } from './latency';
import { RecoveryClient } from './recovery';
import { BlobInventory } from './s3';
import { withTimeout } from './timeout';

export const DETECTOR_NAMES = ['freshness', 'gaps', 'stalls', 'coverage', 'completeness', 'latency', 'dlq'] as const;
export type DetectorName = (typeof DETECTOR_NAMES)[number];

export function isDetectorName(value: string): value is DetectorName {
  return DETECTOR_NAMES.some((name) => name === value);
}

// Judged against wall-clock time or queue depth, not a day's games
const DATE_INDEPENDENT: readonly DetectorName[] = ['freshness', 'dlq'];

export type ThresholdOverrides = Partial<Record<'freshness' | 'stalls' | 'coverage', number>>;

export interface RuntimeOptions {
  dryRun?: boolean;
  thresholdOverrides?: ThresholdOverrides;
  clock?: Clock;
  logger?: Logger;
}

export function createBackfillStore(env: EnvConfig): BackfillStore {
  if (env.BACKFILL_STORE === 'memory') {
    return new InMemoryBackfillStore();
  }
  return new MongoBackfillStore({ url: env.MONGO_URL, database: env.MONGO_DATABASE });
}

export function createChannels(env: EnvConfig): NotificationChannel[] {
  const channels: NotificationChannel[] = [];
  if (env.SLACK_WEBHOOK_URL) {
    channels.push(new SlackChannel(env.SLACK_WEBHOOK_URL));
  }
  if (env.ALERT_EMAIL_FROM && env.ALERT_EMAIL_TO) {
    channels.push(
      new EmailChannel({
        region: env.SES_REGION,
        from: env.ALERT_EMAIL_FROM,
        to: env.ALERT_EMAIL_TO.split(',').map((address) => address.trim()).filter(Boolean),
      })
    );
  }
  return channels;
}

export class MonitorRuntime {
  readonly alerts: AlertManager;
  readonly warehouse: WarehouseStorage;
  readonly blobs: BlobInventory;
  readonly amqp: AmqpClient;
  readonly backfillStore: BackfillStore;
  readonly backfill: BackfillTrigger;
  readonly completeness: CompletenessChecker;
  readonly latency: LatencyTracker;
  readonly dlq: DLQMonitor;
  readonly detectors: Record<DetectorName, Detector>;
  private clock: Clock;
  private logger: Logger;

  constructor(
    readonly env: EnvConfig,
    readonly config: MonitoringConfig,
    options: RuntimeOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('runtime');
    const overrides = options.thresholdOverrides ?? {};

    this.alerts = new AlertManager(
      createChannels(env),
      {
        rateLimitWindowMs: env.ALERT_RATE_LIMIT_WINDOW_MINUTES * 60 * 1000,
        maxAlertsPerWindow: env.ALERT_MAX_PER_WINDOW,
        backfillMode: env.BACKFILL_MODE,
        dryRun: options.dryRun ?? false,
      },
      { clock: this.clock }
    );

    this.warehouse = new WarehouseStorage({
      host: env.CLICKHOUSE_HOST,
      port: env.CLICKHOUSE_PORT,
      database: env.CLICKHOUSE_DATABASE,
      user: env.CLICKHOUSE_USER,
      password: env.CLICKHOUSE_PASSWORD,
    });
    this.blobs = new BlobInventory({
      region: env.S3_REGION,
      bucket: env.S3_BUCKET,
      endpoint: env.S3_ENDPOINT,
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    });
    this.amqp = new AmqpClient(env.AMQP_URL);
    this.backfillStore = createBackfillStore(env);

    this.backfill = new BackfillTrigger(
      this.backfillStore,
      new RecoveryClient(env.RECOVERY_AUTH_TOKEN, config.backfill.requestTimeoutMs),
      this.alerts,
      config.backfill,
      { clock: this.clock }
    );

    const detectorOptions: DetectorOptions = { clock: this.clock, fetchTimeoutMs: env.FETCH_TIMEOUT_MS };
    // A dry run must not start real backfills
    const gapSink = options.dryRun ? undefined : this.backfill;

    this.completeness = new CompletenessChecker(
      this.warehouse,
      this.alerts,
      config.stages,
      config.completeness,
      { ...detectorOptions, gapSink }
    );
    this.latency = new LatencyTracker(this.warehouse, this.alerts, config.stages, config.latency, detectorOptions);
    this.dlq = new DLQMonitor(new AmqpDeadLetterSource(this.amqp), this.alerts, config.dlq, detectorOptions);

    const freshness =
      overrides.freshness === undefined ? config.freshness : withWarningThreshold(config.freshness, overrides.freshness);
    const stalls =
      overrides.stalls === undefined ? config.stalls : withWarningThreshold(config.stalls, overrides.stalls);
    const coverage =
      overrides.coverage === undefined ? config.coverage : withWarningThreshold(config.coverage, overrides.coverage);

    this.detectors = {
      freshness: createFreshnessChecker(this.warehouse, this.alerts, freshness, detectorOptions),
      gaps: new GapDetector({ blobs: this.blobs, warehouse: this.warehouse }, this.alerts, config.gaps, {
        ...detectorOptions,
        sink: gapSink,
      }),
      stalls: createStallDetector(this.warehouse, this.alerts, stalls, config.stages, detectorOptions),
      coverage: createCoverageMonitor(this.warehouse, this.alerts, coverage, detectorOptions),
      completeness: this.completeness,
      latency: this.latency,
      dlq: this.dlq,
    };
  }

  async initialize(): Promise<void> {
    await this.warehouse.initialize();
    if (this.backfillStore instanceof MongoBackfillStore) {
      await this.backfillStore.initialize();
    }
    this.logger.info('Monitor runtime initialized', { backfillStore: this.env.BACKFILL_STORE });
  }

  detector(name: string): Detector {
    if (!isDetectorName(name)) {
      throw new DetectorError(`Unknown detector: ${name}. Expected one of: ${DETECTOR_NAMES.join(', ')}`);
    }
    return this.detectors[name];
  }

  /**
   * Undefined when activity cannot be determined; detectors then measure as
   * usual instead of assuming an idle day.
   */
  async hasActivity(businessDate: string): Promise<boolean | undefined> {
    try {
      return await withTimeout(
        this.warehouse.hasActivity(this.config.activity, businessDate),
        this.env.FETCH_TIMEOUT_MS,
        'activity check'
      );
    } catch (error) {
      this.logger.warn('Activity check failed', { businessDate, error: errorMessage(error) });
      return undefined;
    }
  }

  async runDetector(name: string, businessDate: string, options: { alert?: boolean } = {}): Promise<CheckSummary> {
    const detector = this.detector(name);
    const hasActivity =
      isDetectorName(name) && DATE_INDEPENDENT.includes(name) ? undefined : await this.hasActivity(businessDate);
    return detector.checkAll(businessDate, { hasActivity, alert: options.alert });
  }

  async runAll(businessDate: string, options: { alert?: boolean } = {}): Promise<CheckSummary[]> {
    const summaries: CheckSummary[] = [];
    for (const name of DETECTOR_NAMES) {
      summaries.push(await this.runDetector(name, businessDate, options));
    }
    return summaries;
  }

  async close(): Promise<void> {
    await this.alerts.close();
    const results = await Promise.allSettled([this.warehouse.close(), this.backfillStore.close(), this.amqp.close()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.warn('Error closing client', { error: errorMessage(result.reason) });
      }
    }
    this.blobs.destroy();
  }
}
