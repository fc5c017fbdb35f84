/**
 * MonitorScheduler - fixed-cadence detector runs
 *
 * Each tick runs every detector for yesterday's business date, bounded by
 * runTimeoutMs, then flushes batched alerts. A run that outlives its budget
 * keeps going in the background; ticks are skipped until it settles so runs
 * never overlap.
 */

import { worstStatus, systemClock, type CheckStatus, type CheckSummary, type Clock } from '@sentinel/shared-types';
import { withTimeout, yesterday, type MonitorRuntime } from '@sentinel/monitor-core';
import type { AlertManager } from '@sentinel/alerting';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';

export interface SchedulerConfig {
  intervalMs: number;
  runTimeoutMs: number;
}

export interface SchedulerDeps {
  clock?: Clock;
  logger?: Logger;
}

export interface TickResult {
  businessDate: string;
  status: CheckStatus;
  summaries: CheckSummary[];
}

export class MonitorScheduler {
  private clock: Clock;
  private logger: Logger;
  private isRunning = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<CheckSummary[]> | null = null;

  constructor(
    private readonly runner: Pick<MonitorRuntime, 'runAll'>,
    private readonly alerts: Pick<AlertManager, 'flushBatchedAlerts'>,
    private readonly config: SchedulerConfig,
    deps: SchedulerDeps = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('scheduler');
  }

  start(): void {
    if (this.isRunning) {
      this.logger.warn('Scheduler already running');
      return;
    }
    this.isRunning = true;
    this.logger.info('Scheduler started', {
      interval: this.config.intervalMs,
      runTimeout: this.config.runTimeoutMs,
    });
    this.loop();
  }

  stop(): void {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info('Scheduler stopped');
  }

  /**
   * Null when the previous run is still in flight.
   */
  async tick(): Promise<TickResult | null> {
    if (this.inFlight) {
      this.logger.warn('Previous run still in flight, skipping tick');
      return null;
    }

    const businessDate = yesterday(this.clock.now());
    const run = this.runner.runAll(businessDate);
    this.inFlight = run;
    run
      .catch((error) => {
        this.logger.debug('Run settled with an error', { businessDate, error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight = null;
      });

    try {
      const summaries = await withTimeout(run, this.config.runTimeoutMs, `scheduled run for ${businessDate}`);
      const status = worstStatus(summaries.map((summary) => summary.status));
      this.logger.info('Scheduled run finished', {
        businessDate,
        status,
        breaching: summaries.reduce((total, summary) => total + summary.breaching.length, 0),
      });
      return { businessDate, status, summaries };
    } finally {
      await this.flush();
    }
  }

  private loop(): void {
    if (!this.isRunning) {
      return;
    }

    this.tick()
      .catch((error) => {
        this.logger.error('Scheduled run failed', { error: errorMessage(error) });
      })
      .finally(() => {
        if (this.isRunning) {
          this.timer = setTimeout(() => this.loop(), this.config.intervalMs);
        }
      });
  }

  private async flush(): Promise<void> {
    try {
      const flushed = await this.alerts.flushBatchedAlerts();
      if (flushed > 0) {
        this.logger.info('Flushed batched alerts', { categories: flushed });
      }
    } catch (error) {
      this.logger.error('Alert flush failed', { error: errorMessage(error) });
    }
  }
}
