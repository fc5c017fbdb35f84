import type { CoverageCheckConfig } from '../config';
import { ThresholdDetector, type AlertSender, type DetectorOptions } from './ThresholdDetector';

export interface CoverageSource {
  coverageCounts(config: CoverageCheckConfig, businessDate: string): Promise<{ expected: number; produced: number }>;
}

/**
 * Percentage of expected inputs (players who played) that have an output
 * (a prediction). Lower is worse; nothing expected means nothing to judge.
 */
export function createCoverageMonitor(
  source: CoverageSource,
  alerts: AlertSender,
  checks: Record<string, CoverageCheckConfig>,
  options: DetectorOptions = {}
): ThresholdDetector<CoverageCheckConfig> {
  return new ThresholdDetector<CoverageCheckConfig>(
    {
      name: 'coverage',
      title: 'Prediction coverage low',
      category: 'coverage',
      unit: 'percent covered',
      checks,
      fetch: async (_key, config, businessDate) => {
        const { expected, produced } = await source.coverageCounts(config, businessDate);
        if (expected === 0) {
          return null;
        }
        return {
          value: (produced * 100) / expected,
          details: { expected, produced, missing: expected - produced },
        };
      },
      strategy: { kind: 'threshold', rule: (config) => config },
    },
    alerts,
    options
  );
}
