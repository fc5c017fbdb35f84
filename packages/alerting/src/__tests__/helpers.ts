import { AlertEvent, Clock } from '@sentinel/shared-types';
import { createLogger } from '@sentinel/logger';
import type { ChannelTier, NotificationChannel } from '../channels';

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

export class RecordingChannel implements NotificationChannel {
  readonly sent: AlertEvent[] = [];

  constructor(
    readonly name: string,
    readonly tier: ChannelTier,
    private readonly failWith?: Error
  ) {}

  async send(alert: AlertEvent): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.sent.push(alert);
  }
}

export const silentLogger = createLogger('test', { silent: true });
