/**
 * DLQMonitor - messages that exhausted their retries
 *
 * Any message in a dead-letter queue is worth a human look, so DLQ alerts
 * skip the alert rate limit (force) and are throttled only by a per-queue
 * cooldown.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CheckResult,
  CheckStatus,
  CheckSummary,
  Severity,
  isBreach,
  systemClock,
  worstStatus,
  type Clock,
} from '@sentinel/shared-types';
import { AlertHistory } from '@sentinel/alerting';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { DeadLetterMessage, DeadLetterSource } from './amqp';
import type { DlqQueueConfig, MonitoringConfig } from './config';
import type { AlertSender, CheckAllOptions, Detector, DetectorOptions } from './detectors/ThresholdDetector';
import { withTimeout } from './timeout';

const PREVIEW_LENGTH = 200;

export interface DlqSample {
  messageId: string | null;
  timestamp: string | null;
  redelivered: boolean;
  preview: string;
}

export interface DlqQueueResult {
  queue: string;
  description: string;
  status: CheckStatus;
  messageCount: number | null;
  samples: DlqSample[];
  alertSent: boolean;
  note?: string;
}

export interface DlqReport {
  checkedAt: Date;
  queuesChecked: number;
  queuesWithMessages: number;
  totalMessages: number;
  alertsSent: number;
  queues: DlqQueueResult[];
}

export function toSample(message: DeadLetterMessage): DlqSample {
  return {
    messageId: message.messageId,
    timestamp: message.timestamp ? message.timestamp.toISOString() : null,
    redelivered: message.redelivered,
    preview: message.body.slice(0, PREVIEW_LENGTH),
  };
}

export function formatDlqMessage(queue: string, config: DlqQueueConfig, count: number, samples: DlqSample[]): string {
  const lines = [
    `Dead letter queue: ${queue}`,
    `Message count: ${count}`,
    `Pipeline: ${config.phaseFrom} -> ${config.phaseTo}`,
    '',
    'Messages failed processing after maximum retry attempts.',
    '',
    `Recovery: ${config.recoveryHint}`,
  ];

  if (samples.length > 0) {
    lines.push('', 'Sample messages:');
    samples.slice(0, 3).forEach((sample, index) => {
      lines.push(`  ${index + 1}. Published: ${sample.timestamp ?? 'unknown'}`);
      if (sample.preview) {
        lines.push(`     Data: ${sample.preview.slice(0, 100)}`);
      }
    });
  }
  return lines.join('\n');
}

export class DLQMonitor implements Detector {
  readonly name = 'dlq';
  private clock: Clock;
  private logger: Logger;
  private fetchTimeoutMs: number;
  private cooldowns: AlertHistory;

  constructor(
    private readonly source: DeadLetterSource,
    private readonly alerts: AlertSender,
    private readonly config: MonitoringConfig['dlq'],
    options: DetectorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('dlq');
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
    this.cooldowns = new AlertHistory(config.cooldownMinutes * 60 * 1000, this.clock);
  }

  keys(): string[] {
    return Object.keys(this.config.queues);
  }

  async checkQueues(options: { alert?: boolean } = {}): Promise<DlqReport> {
    const queues = await Promise.all(this.keys().map((queue) => this.checkQueue(queue, options.alert !== false)));

    const found = queues.filter((result) => result.status !== CheckStatus.ERROR);
    const withMessages = found.filter((result) => (result.messageCount ?? 0) > 0);
    const report: DlqReport = {
      checkedAt: this.clock.now(),
      queuesChecked: found.length,
      queuesWithMessages: withMessages.length,
      totalMessages: withMessages.reduce((sum, result) => sum + (result.messageCount ?? 0), 0),
      alertsSent: queues.filter((result) => result.alertSent).length,
      queues,
    };

    this.logger.info('Dead-letter queues checked', {
      queuesChecked: report.queuesChecked,
      queuesWithMessages: report.queuesWithMessages,
      totalMessages: report.totalMessages,
      alertsSent: report.alertsSent,
    });
    return report;
  }

  async checkOne(key: string): Promise<CheckResult> {
    return this.toCheckResult(await this.checkQueue(key, false));
  }

  /**
   * Dead letters are not tied to a business date; the date only labels the
   * summary.
   */
  async checkAll(businessDate: string, options: CheckAllOptions = {}): Promise<CheckSummary> {
    const report = await this.checkQueues({ alert: options.alert });
    const results = report.queues.map((result) => this.toCheckResult(result));
    return {
      checkId: uuidv4(),
      detector: this.name,
      businessDate,
      status: worstStatus(results.map((result) => result.status)),
      results,
      breaching: results.filter((result) => isBreach(result.status)).map((result) => result.key),
      alerted: report.alertsSent > 0,
      checkedAt: report.checkedAt,
    };
  }

  private async checkQueue(queue: string, alert: boolean): Promise<DlqQueueResult> {
    const config = this.config.queues[queue];
    if (!config) {
      return {
        queue,
        description: queue,
        status: CheckStatus.ERROR,
        messageCount: null,
        samples: [],
        alertSent: false,
        note: 'queue is not configured',
      };
    }

    let messageCount: number;
    let samples: DlqSample[];
    try {
      const messages = await withTimeout(
        this.source.peek(queue, this.config.peekLimit),
        this.fetchTimeoutMs,
        `peek ${queue}`
      );
      if (messages === null) {
        this.logger.warn('Dead-letter queue not found', { queue });
        return {
          queue,
          description: config.description,
          status: CheckStatus.ERROR,
          messageCount: null,
          samples: [],
          alertSent: false,
          note: 'queue not found',
        };
      }

      // A full peek only proves there are at least peekLimit messages
      messageCount =
        messages.length >= this.config.peekLimit
          ? await withTimeout(this.source.exactCount(queue), this.fetchTimeoutMs, `count ${queue}`)
          : messages.length;
      samples = messages.slice(0, this.config.sampleSize).map(toSample);
    } catch (error) {
      this.logger.warn('Dead-letter queue check failed', { queue, error: errorMessage(error) });
      return {
        queue,
        description: config.description,
        status: CheckStatus.ERROR,
        messageCount: null,
        samples: [],
        alertSent: false,
        note: errorMessage(error),
      };
    }

    if (messageCount === 0) {
      return { queue, description: config.description, status: CheckStatus.OK, messageCount, samples, alertSent: false };
    }

    const status = config.severity === Severity.CRITICAL ? CheckStatus.CRITICAL : CheckStatus.WARNING;
    const result: DlqQueueResult = {
      queue,
      description: config.description,
      status,
      messageCount,
      samples,
      alertSent: false,
    };
    if (!alert) {
      return result;
    }

    const category = `dlq_${queue}`;
    if (!this.cooldowns.hasCapacity(category, 1)) {
      result.note = `In cooldown (${this.config.cooldownMinutes}min)`;
      return result;
    }

    try {
      result.alertSent = await this.alerts.sendAlert({
        severity: config.severity,
        title: `DLQ Messages Detected: ${config.description}`,
        message: formatDlqMessage(queue, config, messageCount, samples),
        category,
        context: {
          queue,
          messageCount,
          phaseFrom: config.phaseFrom,
          phaseTo: config.phaseTo,
        },
        force: true,
      });
    } catch (error) {
      this.logger.error('Failed to send DLQ alert', { queue, error: errorMessage(error) });
    }
    if (result.alertSent) {
      this.cooldowns.record(category);
    }
    return result;
  }

  private toCheckResult(result: DlqQueueResult): CheckResult {
    const count = result.messageCount;
    return {
      key: result.queue,
      status: result.status,
      measuredValue: count,
      message:
        count === null
          ? `${result.queue}: ${result.note ?? 'unavailable'}`
          : `${result.queue}: ${count} message(s)`,
      details: { samples: result.samples, alertSent: result.alertSent, note: result.note },
    };
  }
}
