/**
 * AlertManager - single choke point for every notification the system sends
 *
 * Decision order for each alert:
 * 1. Backfill mode drops everything below critical.
 * 2. Non-forced alerts are rate limited per category; over the limit they are
 *    counted into a batch instead of being sent.
 * 3. Allowed alerts fan out by severity: critical to all channels, warning to
 *    secondary channels, info to the log only.
 *
 * Batches are drained by flushBatchedAlerts(), which sends one summary per
 * category. Long-running processes can opt into a periodic flush.
 */

import {
  AlertEvent,
  Clock,
  Severity,
  maxSeverity,
  systemClock,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import { AlertHistory } from './history';
import type { NotificationChannel } from './channels';

export interface AlertManagerConfig {
  rateLimitWindowMs: number;
  maxAlertsPerWindow: number;
  backfillMode: boolean;
  dryRun: boolean;
  maxSamplesPerCategory: number;
}

const DEFAULT_CONFIG: AlertManagerConfig = {
  rateLimitWindowMs: 60 * 60 * 1000,
  maxAlertsPerWindow: 3,
  backfillMode: false,
  dryRun: false,
  maxSamplesPerCategory: 3,
};

export interface AlertInput {
  severity: Severity;
  title: string;
  message: string;
  category: string;
  context?: Record<string, unknown>;
  force?: boolean;
}

export interface AlertSample {
  title: string;
  timestamp: string;
  context: Record<string, unknown>;
}

interface AlertBatch {
  count: number;
  severity: Severity;
  firstSuppressedAt: Date;
  lastSuppressedAt: Date;
  samples: AlertSample[];
}

export interface AlertManagerDeps {
  clock?: Clock;
  logger?: Logger;
}

export class AlertManager {
  private config: AlertManagerConfig;
  private channels: NotificationChannel[];
  private clock: Clock;
  private logger: Logger;
  private history: AlertHistory;
  private batches: Map<string, AlertBatch> = new Map();
  private flushTimer: NodeJS.Timeout | null = null;

  constructor(
    channels: NotificationChannel[],
    config: Partial<AlertManagerConfig> = {},
    deps: AlertManagerDeps = {}
  ) {
    this.channels = channels;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? createLogger('alerting');
    this.history = new AlertHistory(this.config.rateLimitWindowMs, this.clock);
  }

  /**
   * Returns true only when the alert was forwarded, false when it was
   * suppressed by backfill mode or folded into a batch.
   */
  async sendAlert(input: AlertInput): Promise<boolean> {
    const alert: AlertEvent = {
      severity: input.severity,
      title: input.title,
      message: input.message,
      category: input.category,
      context: input.context ?? {},
      timestamp: this.clock.now(),
    };

    if (this.config.backfillMode && alert.severity !== Severity.CRITICAL) {
      this.logger.info('Alert suppressed in backfill mode', {
        category: alert.category,
        severity: alert.severity,
        title: alert.title,
      });
      return false;
    }

    if (!input.force && !this.shouldAlert(alert.category)) {
      this.addToBatch(alert);
      return false;
    }

    // Recorded before the first await so concurrent callers see the slot as taken
    this.history.record(alert.category);
    await this.dispatch(alert);
    return true;
  }

  shouldAlert(category: string): boolean {
    return this.history.hasCapacity(category, this.config.maxAlertsPerWindow);
  }

  /**
   * Send one summary per category that has suppressed alerts, then clear the
   * batches. Returns the number of summaries sent.
   */
  async flushBatchedAlerts(): Promise<number> {
    const pending = [...this.batches.entries()];
    this.batches.clear();

    for (const [category, batch] of pending) {
      const summary: AlertEvent = {
        severity: batch.severity,
        title: `Batched alerts: ${category} (${batch.count} suppressed)`,
        message:
          `${batch.count} alert(s) in category "${category}" were rate limited between ` +
          `${batch.firstSuppressedAt.toISOString()} and ${batch.lastSuppressedAt.toISOString()}.`,
        category,
        context: {
          count: batch.count,
          samples: batch.samples,
        },
        timestamp: this.clock.now(),
      };
      await this.dispatch(summary);
    }

    if (pending.length > 0) {
      this.logger.info('Flushed batched alerts', { summaries: pending.length });
    }
    return pending.length;
  }

  pendingBatchCount(category: string): number {
    return this.batches.get(category)?.count ?? 0;
  }

  startAutoFlush(intervalMs: number): void {
    this.stopAutoFlush();
    this.flushTimer = setInterval(() => {
      this.flushBatchedAlerts().catch((error) => {
        this.logger.error('Periodic alert flush failed', { error: errorMessage(error) });
      });
    }, intervalMs);
    this.flushTimer.unref();
  }

  stopAutoFlush(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
  }

  async close(): Promise<void> {
    this.stopAutoFlush();
    await this.flushBatchedAlerts();
  }

  private addToBatch(alert: AlertEvent): void {
    const existing = this.batches.get(alert.category);
    const sample: AlertSample = {
      title: alert.title,
      timestamp: alert.timestamp.toISOString(),
      context: alert.context,
    };

    if (!existing) {
      this.batches.set(alert.category, {
        count: 1,
        severity: alert.severity,
        firstSuppressedAt: alert.timestamp,
        lastSuppressedAt: alert.timestamp,
        samples: [sample],
      });
    } else {
      existing.count += 1;
      existing.severity = maxSeverity(existing.severity, alert.severity);
      existing.lastSuppressedAt = alert.timestamp;
      if (existing.samples.length < this.config.maxSamplesPerCategory) {
        existing.samples.push(sample);
      }
    }

    this.logger.debug('Alert rate limited, batched', {
      category: alert.category,
      pending: this.pendingBatchCount(alert.category),
    });
  }

  private channelsFor(severity: Severity): NotificationChannel[] {
    switch (severity) {
      case Severity.CRITICAL:
        return this.channels;
      case Severity.WARNING:
        return this.channels.filter((channel) => channel.tier === 'secondary');
      default:
        return [];
    }
  }

  private async dispatch(alert: AlertEvent): Promise<void> {
    const level = alert.severity === Severity.CRITICAL
      ? 'error'
      : alert.severity === Severity.WARNING ? 'warn' : 'info';
    this.logger.log(level, alert.title, {
      category: alert.category,
      severity: alert.severity,
      detail: alert.message,
    });

    const targets = this.channelsFor(alert.severity);
    if (this.config.dryRun) {
      if (targets.length > 0) {
        this.logger.info('Dry run: alert not delivered', {
          category: alert.category,
          channels: targets.map((channel) => channel.name),
        });
      }
      return;
    }

    await Promise.all(
      targets.map(async (channel) => {
        try {
          await channel.send(alert);
        } catch (error) {
          // Logged, not raised
          this.logger.error('Alert delivery failed', {
            channel: channel.name,
            category: alert.category,
            error: errorMessage(error),
          });
        }
      })
    );
  }
}
