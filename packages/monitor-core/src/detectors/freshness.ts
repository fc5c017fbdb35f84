import { Clock, systemClock } from '@sentinel/shared-types';
import type { FreshnessCheckConfig } from '../config';
import { ThresholdDetector, type AlertSender, type DetectorOptions } from './ThresholdDetector';

const HOUR_MS = 60 * 60 * 1000;

export interface FreshnessSource {
  latestTimestamp(table: string, column: string): Promise<Date | null>;
}

/**
 * Age in hours of the newest row of each configured table. Freshness is
 * measured against now, whatever business date the run targets.
 */
export function createFreshnessChecker(
  source: FreshnessSource,
  alerts: AlertSender,
  checks: Record<string, FreshnessCheckConfig>,
  options: DetectorOptions = {}
): ThresholdDetector<FreshnessCheckConfig> {
  const clock: Clock = options.clock ?? systemClock;

  return new ThresholdDetector<FreshnessCheckConfig>(
    {
      name: 'freshness',
      title: 'Stale data',
      category: 'freshness',
      unit: 'hours old',
      checks,
      fetch: async (_key, config) => {
        const latest = await source.latestTimestamp(config.table, config.timestampColumn);
        if (!latest) {
          return null;
        }
        const ageHours = Math.max(0, clock.now().getTime() - latest.getTime()) / HOUR_MS;
        return {
          value: ageHours,
          details: { table: config.table, latest: latest.toISOString() },
        };
      },
      strategy: { kind: 'threshold', rule: (config) => config },
    },
    alerts,
    { ...options, clock }
  );
}
