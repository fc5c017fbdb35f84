import type { AlertInput } from '@sentinel/alerting';
import { createLogger } from '@sentinel/logger';
import type { Clock, CompletionRecord } from '@sentinel/shared-types';
import type { StageConfig } from '../config';
import type { AlertSender } from '../detectors/ThresholdDetector';

export class FakeClock implements Clock {
  private current: number;

  constructor(start: string | Date) {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export class RecordingAlerts implements AlertSender {
  readonly sent: AlertInput[] = [];

  constructor(private readonly forwarded = true) {}

  async sendAlert(input: AlertInput): Promise<boolean> {
    this.sent.push(input);
    return this.forwarded;
  }
}

export const silentLogger = createLogger('test', { silent: true });

export const STAGES: StageConfig[] = [
  { key: 'phase1', name: 'Scrapers', expectedProcessors: ['scrape_a', 'scrape_b'] },
  { key: 'phase2', name: 'Raw', expectedProcessors: ['raw_a'] },
  { key: 'phase3', name: 'Analytics', expectedProcessors: ['analytics_a', 'analytics_b'] },
];

export function completion(
  stageKey: string,
  processorName: string,
  completedAt: string,
  status: CompletionRecord['status'] = 'success'
): CompletionRecord {
  return {
    stageKey,
    businessDate: '2024-03-09',
    processorName,
    completedAt: new Date(completedAt),
    status,
    rowsProcessed: 10,
  };
}
