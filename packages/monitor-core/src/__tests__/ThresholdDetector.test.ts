import { describe, it, expect, vi } from 'vitest';
import { CheckStatus, Severity, type ThresholdConfig } from '@sentinel/shared-types';
import {
  ThresholdDetector,
  classifyThreshold,
  isWithinWindow,
  type DetectorStrategy,
  type Fetcher,
} from '../detectors/ThresholdDetector';
import { FakeClock, RecordingAlerts, silentLogger } from './helpers';

const DATE = '2024-03-09';

const above: ThresholdConfig = { warningThreshold: 4, criticalThreshold: 8, direction: 'above' };

function detectorWith(
  checks: Record<string, ThresholdConfig>,
  fetch: Fetcher<ThresholdConfig>,
  options: { strategy?: DetectorStrategy<ThresholdConfig>; alerts?: RecordingAlerts; clock?: FakeClock; timeoutMs?: number } = {}
) {
  return new ThresholdDetector<ThresholdConfig>(
    {
      name: 'age',
      title: 'Stale data',
      category: 'age',
      unit: 'hours old',
      checks,
      fetch,
      strategy: options.strategy ?? { kind: 'threshold', rule: (config) => config },
    },
    options.alerts ?? new RecordingAlerts(),
    {
      clock: options.clock ?? new FakeClock('2024-03-10T12:00:00Z'),
      logger: silentLogger,
      fetchTimeoutMs: options.timeoutMs,
    }
  );
}

function valueFetcher(values: Record<string, number | null>): Fetcher<ThresholdConfig> {
  return async (key) => {
    const value = values[key];
    return value === null || value === undefined ? null : { value };
  };
}

describe('classifyThreshold', () => {
  it('treats the boundary as breaching for higher-is-worse checks', () => {
    expect(classifyThreshold(3.99, above)).toBe(CheckStatus.OK);
    expect(classifyThreshold(4, above)).toBe(CheckStatus.WARNING);
    expect(classifyThreshold(8, above)).toBe(CheckStatus.CRITICAL);
  });

  it('treats the boundary as breaching for lower-is-worse checks', () => {
    const below: ThresholdConfig = { warningThreshold: 90, criticalThreshold: 75, direction: 'below' };
    expect(classifyThreshold(91, below)).toBe(CheckStatus.OK);
    expect(classifyThreshold(90, below)).toBe(CheckStatus.WARNING);
    expect(classifyThreshold(75, below)).toBe(CheckStatus.CRITICAL);
  });
});

describe('isWithinWindow', () => {
  const overnight = { applicabilityWindow: { startHourUtc: 14, endHourUtc: 4 } };

  it('applies everywhere without a window', () => {
    expect(isWithinWindow(new Date('2024-03-10T09:00:00Z'), {})).toBe(true);
  });

  it('handles windows that wrap midnight', () => {
    expect(isWithinWindow(new Date('2024-03-10T15:00:00Z'), overnight)).toBe(true);
    expect(isWithinWindow(new Date('2024-03-10T02:00:00Z'), overnight)).toBe(true);
    expect(isWithinWindow(new Date('2024-03-10T04:00:00Z'), overnight)).toBe(false);
    expect(isWithinWindow(new Date('2024-03-10T10:00:00Z'), overnight)).toBe(false);
  });

  it('handles same-day windows', () => {
    const daytime = { applicabilityWindow: { startHourUtc: 8, endHourUtc: 20 } };
    expect(isWithinWindow(new Date('2024-03-10T08:00:00Z'), daytime)).toBe(true);
    expect(isWithinWindow(new Date('2024-03-10T20:00:00Z'), daytime)).toBe(false);
  });
});

describe('ThresholdDetector.checkOne', () => {
  it('reports the measurement against both thresholds', async () => {
    const detector = detectorWith({ injuries: above }, valueFetcher({ injuries: 4 }));

    const result = await detector.checkOne('injuries', DATE);

    expect(result).toEqual({
      key: 'injuries',
      status: CheckStatus.WARNING,
      measuredValue: 4,
      message: 'injuries: 4 hours old (warning 4, critical 8)',
      details: undefined,
    });
  });

  it('reports NO_DATA, never CRITICAL, when there is nothing to measure', async () => {
    const detector = detectorWith({ injuries: above }, valueFetcher({ injuries: null }));

    const result = await detector.checkOne('injuries', DATE);

    expect(result.status).toBe(CheckStatus.NO_DATA);
    expect(result.message).toBe('injuries: no data');
  });

  it('turns a failed fetch into ERROR', async () => {
    const detector = detectorWith({ injuries: above }, async () => {
      throw new Error('connection refused');
    });

    const result = await detector.checkOne('injuries', DATE);

    expect(result.status).toBe(CheckStatus.ERROR);
    expect(result.message).toBe('injuries: measurement failed: connection refused');
  });

  it('turns a fetch that outlives its timeout into ERROR', async () => {
    const detector = detectorWith({ injuries: above }, () => new Promise(() => undefined), { timeoutMs: 10 });

    const result = await detector.checkOne('injuries', DATE);

    expect(result.status).toBe(CheckStatus.ERROR);
    expect(result.message).toBe('injuries: measurement failed: age fetch for injuries timed out after 10ms');
  });

  it('rejects non-finite measurements', async () => {
    const detector = detectorWith({ injuries: above }, async () => ({ value: Number.NaN }));

    expect((await detector.checkOne('injuries', DATE)).status).toBe(CheckStatus.ERROR);
  });

  it('skips checks outside their applicability window', async () => {
    const fetch = vi.fn(valueFetcher({ props: 20 }));
    const detector = detectorWith(
      { props: { ...above, applicabilityWindow: { startHourUtc: 14, endHourUtc: 4 } } },
      fetch,
      { clock: new FakeClock('2024-03-10T10:00:00Z') }
    );

    const result = await detector.checkOne('props', DATE);

    expect(result.status).toBe(CheckStatus.NO_DATA);
    expect(result.message).toBe('props: outside applicability window');
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('ThresholdDetector.checkAll', () => {
  it('sends one aggregated alert for every breaching key', async () => {
    const alerts = new RecordingAlerts();
    const detector = detectorWith(
      { a: above, b: above, c: above },
      valueFetcher({ a: 5, b: 9, c: 1 }),
      { alerts }
    );

    const summary = await detector.checkAll(DATE);

    expect(summary.status).toBe(CheckStatus.CRITICAL);
    expect(summary.breaching).toEqual(['a', 'b']);
    expect(summary.alerted).toBe(true);
    expect(alerts.sent).toHaveLength(1);
    expect(alerts.sent[0]).toMatchObject({
      severity: Severity.CRITICAL,
      title: 'Stale data: 2 check(s) breaching for 2024-03-09',
      message: '[WARNING] a: 5 hours old (warning 4, critical 8)\n[CRITICAL] b: 9 hours old (warning 4, critical 8)',
      category: 'age',
    });
  });

  it('alerts at warning severity when no key is critical', async () => {
    const alerts = new RecordingAlerts();
    const detector = detectorWith({ a: above, b: above }, valueFetcher({ a: 5, b: 6 }), { alerts });

    await detector.checkAll(DATE);

    expect(alerts.sent).toHaveLength(1);
    expect(alerts.sent[0].severity).toBe(Severity.WARNING);
  });

  it('does not alert on NO_DATA or ERROR', async () => {
    const alerts = new RecordingAlerts();
    const detector = detectorWith(
      { a: above, b: above },
      async (key) => {
        if (key === 'a') {
          throw new Error('timeout');
        }
        return null;
      },
      { alerts }
    );

    const summary = await detector.checkAll(DATE);

    expect(summary.status).toBe(CheckStatus.ERROR);
    expect(summary.breaching).toEqual([]);
    expect(alerts.sent).toHaveLength(0);
  });

  it('marks every key NO_DATA without fetching when nothing was scheduled', async () => {
    const fetch = vi.fn(valueFetcher({ a: 100 }));
    const detector = detectorWith({ a: above }, fetch);

    const summary = await detector.checkAll(DATE, { hasActivity: false });

    expect(summary.status).toBe(CheckStatus.NO_DATA);
    expect(summary.results[0].message).toBe('a: no activity scheduled for 2024-03-09');
    expect(fetch).not.toHaveBeenCalled();
  });

  it('keeps findings but skips the alert when alerting is off', async () => {
    const alerts = new RecordingAlerts();
    const detector = detectorWith({ a: above }, valueFetcher({ a: 8 }), { alerts });

    const summary = await detector.checkAll(DATE, { alert: false });

    expect(summary.status).toBe(CheckStatus.CRITICAL);
    expect(summary.alerted).toBe(false);
    expect(alerts.sent).toHaveLength(0);
  });

  it('reports alerted=false when the alert was batched', async () => {
    const detector = detectorWith({ a: above }, valueFetcher({ a: 8 }), { alerts: new RecordingAlerts(false) });

    expect((await detector.checkAll(DATE)).alerted).toBe(false);
  });
});

describe('dependency strategy', () => {
  const checks: Record<string, ThresholdConfig> = {
    upstream: above,
    downstream: { ...above, dependsOn: 'upstream' },
  };
  const strategy: DetectorStrategy<ThresholdConfig> = {
    kind: 'dependency',
    rule: (config) => config,
    upstreamOf: (_key, config) => config.dependsOn,
  };

  it('names a silent upstream as the likely root cause', async () => {
    const detector = detectorWith(checks, valueFetcher({ upstream: null, downstream: 10 }), { strategy });

    const summary = await detector.checkAll(DATE);
    const downstream = summary.results.find((result) => result.key === 'downstream');

    expect(downstream?.status).toBe(CheckStatus.CRITICAL);
    expect(downstream?.details?.rootCause).toBe('upstream');
    expect(downstream?.message).toBe(
      'downstream: 10 hours old (warning 4, critical 8); upstream upstream is no_data, likely root cause'
    );
  });

  it('blames the stage itself when its upstream is healthy', async () => {
    const detector = detectorWith(checks, valueFetcher({ upstream: 1, downstream: 10 }), { strategy });

    const result = await detector.checkOne('downstream', DATE);

    expect(result.details?.rootCause).toBe('downstream');
    expect(result.message).toBe('downstream: 10 hours old (warning 4, critical 8)');
  });

  it('diagnoses a stalled upstream from checkOne as well', async () => {
    const detector = detectorWith(checks, valueFetcher({ upstream: 12, downstream: 10 }), { strategy });

    const result = await detector.checkOne('downstream', DATE);

    expect(result.details?.rootCause).toBe('upstream');
  });
});
