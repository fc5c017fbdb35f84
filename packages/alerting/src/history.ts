import { Clock, systemClock } from '@sentinel/shared-types';

/**
 * Sliding-window record of when each category last alerted.
 *
 * Entries older than the window are pruned on every read, so memory stays
 * bounded by maxAlertsPerWindow per category.
 */
export class AlertHistory {
  private entries: Map<string, Date[]> = new Map();

  constructor(
    private readonly windowMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  count(category: string): number {
    return this.prune(category).length;
  }

  hasCapacity(category: string, maxPerWindow: number): boolean {
    return this.count(category) < maxPerWindow;
  }

  record(category: string): void {
    const timestamps = this.prune(category);
    timestamps.push(this.clock.now());
    this.entries.set(category, timestamps);
  }

  private prune(category: string): Date[] {
    const timestamps = this.entries.get(category);
    if (!timestamps) {
      return [];
    }

    const cutoff = this.clock.now().getTime() - this.windowMs;
    const kept = timestamps.filter((ts) => ts.getTime() > cutoff);
    if (kept.length === 0) {
      this.entries.delete(category);
    } else {
      this.entries.set(category, kept);
    }
    return kept;
  }
}
