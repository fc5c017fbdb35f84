import { describe, it, expect, beforeEach } from 'vitest';
import { CheckStatus, Severity, type CompletionRecord } from '@sentinel/shared-types';
import type { LatencyMetricsRow, LatencyStats } from '../clickhouse';
import type { MonitoringConfig } from '../config';
import { LatencyTracker, buildTimeline, findViolations, type LatencyStore } from '../latency';
import { FakeClock, RecordingAlerts, STAGES, completion, silentLogger } from './helpers';

const DATE = '2024-03-09';

const thresholds: MonitoringConfig['latency'] = {
  transitionThresholdsSeconds: { phase1_to_phase2: 300, phase2_to_phase3: 600 },
  totalWarningSeconds: 1800,
  totalCriticalSeconds: 3600,
  historyDays: 7,
  minHistorySamples: 5,
};

const fullRun: CompletionRecord[] = [
  completion('phase1', 'scrape_a', '2024-03-10T10:00:00Z'),
  completion('phase1', 'scrape_b', '2024-03-10T10:05:00Z'),
  completion('phase2', 'raw_a', '2024-03-10T10:10:00Z'),
  completion('phase3', 'analytics_a', '2024-03-10T10:20:00Z'),
  completion('phase3', 'analytics_b', '2024-03-10T10:30:00Z'),
];

function stats(sampleCount: number, p95Seconds: number): LatencyStats {
  return {
    sampleCount,
    avgSeconds: 1200,
    minSeconds: 900,
    maxSeconds: 2000,
    stddevSeconds: 150,
    p50Seconds: 1200,
    p95Seconds,
    p99Seconds: 1900,
  };
}

class FakeLatencyStore implements LatencyStore {
  completions: CompletionRecord[] = [];
  stats: LatencyStats | null = null;
  stored: LatencyMetricsRow[] = [];
  failWith?: Error;

  async getCompletions(businessDate: string): Promise<CompletionRecord[]> {
    if (this.failWith) {
      throw this.failWith;
    }
    return this.completions.filter((record) => record.businessDate === businessDate);
  }

  async storeLatencyMetrics(metrics: LatencyMetricsRow): Promise<void> {
    this.stored.push(metrics);
  }

  async getLatencyStats(): Promise<LatencyStats | null> {
    return this.stats;
  }
}

describe('buildTimeline', () => {
  it('computes adjacent transitions and the end-to-end duration', () => {
    const timeline = buildTimeline(STAGES, fullRun);

    expect(timeline.state).toBe('complete');
    expect(timeline.pipelineStart).toEqual(new Date('2024-03-10T10:00:00Z'));
    expect(timeline.stageTimestamps.phase1).toEqual(new Date('2024-03-10T10:05:00Z'));
    expect(timeline.transitionSeconds).toEqual({ phase1_to_phase2: 300, phase2_to_phase3: 1200 });
    expect(timeline.totalSeconds).toBe(1800);
  });

  it('leaves transitions with an unfinished endpoint null rather than zero', () => {
    const timeline = buildTimeline(STAGES, fullRun.slice(0, 4));

    expect(timeline.state).toBe('in_progress');
    expect(timeline.stageTimestamps.phase3).toBeNull();
    expect(timeline.transitionSeconds).toEqual({ phase1_to_phase2: 300, phase2_to_phase3: null });
    expect(timeline.totalSeconds).toBeNull();
  });

  it('does not time a stage until every expected processor succeeded', () => {
    const timeline = buildTimeline(STAGES, [completion('phase1', 'scrape_a', '2024-03-10T10:00:00Z')]);

    expect(timeline.pipelineStart).toEqual(new Date('2024-03-10T10:00:00Z'));
    expect(timeline.stageTimestamps.phase1).toBeNull();
    expect(timeline.transitionSeconds.phase1_to_phase2).toBeNull();
  });

  it('reports a date with no completions as not started', () => {
    const timeline = buildTimeline(STAGES, []);

    expect(timeline.state).toBe('not_started');
    expect(timeline.pipelineStart).toBeNull();
  });
});

describe('findViolations', () => {
  it('grades transitions at the threshold as warning and at twice the threshold as critical', () => {
    const violations = findViolations(
      { transitionSeconds: { phase1_to_phase2: 300, phase2_to_phase3: 1200 }, totalSeconds: 1800 },
      thresholds
    );

    expect(violations).toEqual([
      { transition: 'phase1_to_phase2', actualSeconds: 300, thresholdSeconds: 300, severity: Severity.WARNING, excessPct: 0 },
      { transition: 'phase2_to_phase3', actualSeconds: 1200, thresholdSeconds: 600, severity: Severity.CRITICAL, excessPct: 100 },
      { transition: 'total', actualSeconds: 1800, thresholdSeconds: 1800, severity: Severity.WARNING, excessPct: 0 },
    ]);
  });

  it('ignores null transitions and transitions without a threshold', () => {
    const violations = findViolations(
      { transitionSeconds: { phase1_to_phase2: null, phase9_to_phase10: 99999 }, totalSeconds: null },
      thresholds
    );

    expect(violations).toEqual([]);
  });

  it('uses the critical end-to-end threshold once it is reached', () => {
    const [total] = findViolations({ transitionSeconds: {}, totalSeconds: 4500 }, thresholds);

    expect(total).toEqual({
      transition: 'total',
      actualSeconds: 4500,
      thresholdSeconds: 3600,
      severity: Severity.CRITICAL,
      excessPct: 25,
    });
  });
});

describe('LatencyTracker', () => {
  let store: FakeLatencyStore;
  let alerts: RecordingAlerts;

  function tracker(config: MonitoringConfig['latency'] = thresholds): LatencyTracker {
    return new LatencyTracker(store, alerts, STAGES, config, {
      clock: new FakeClock('2024-03-10T12:00:00Z'),
      logger: silentLogger,
    });
  }

  beforeEach(() => {
    store = new FakeLatencyStore();
    alerts = new RecordingAlerts();
  });

  it('alerts once with every violation and stores the completed date', async () => {
    store.completions = fullRun;

    const report = await tracker().trackDate(DATE);

    expect(report.status).toBe(CheckStatus.CRITICAL);
    expect(report.stored).toBe(true);
    expect(alerts.sent).toHaveLength(1);
    expect(alerts.sent[0].severity).toBe(Severity.CRITICAL);
    expect(alerts.sent[0].title).toBe('Pipeline latency for 2024-03-09: 3 violation(s)');
    expect(alerts.sent[0].message).toBe(
      [
        '[WARNING] phase1_to_phase2: 5.0m (threshold 5.0m, +0%)',
        '[CRITICAL] phase2_to_phase3: 20.0m (threshold 10.0m, +100%)',
        '[WARNING] total: 30.0m (threshold 30.0m, +0%)',
      ].join('\n')
    );
    expect(store.stored).toEqual([
      {
        businessDate: DATE,
        stageTimestamps: {
          phase1: '2024-03-10T10:05:00.000Z',
          phase2: '2024-03-10T10:10:00.000Z',
          phase3: '2024-03-10T10:30:00.000Z',
        },
        transitionSeconds: { phase1_to_phase2: 300, phase2_to_phase3: 1200 },
        totalLatencySeconds: 1800,
        violationCount: 3,
        computedAt: new Date('2024-03-10T12:00:00Z'),
      },
    ]);
  });

  it('does not store an unfinished date', async () => {
    store.completions = fullRun.slice(0, 3);

    const report = await tracker().trackDate(DATE);

    expect(report.state).toBe('in_progress');
    expect(report.stored).toBe(false);
    expect(store.stored).toHaveLength(0);
  });

  it('flags an end-to-end time at or above the historical p95', async () => {
    const relaxed = { ...thresholds, transitionThresholdsSeconds: {}, totalWarningSeconds: 7200, totalCriticalSeconds: 10800 };
    store.completions = fullRun;
    store.stats = stats(7, 1500);

    const report = await tracker(relaxed).trackDate(DATE);

    expect(report.violations).toEqual([]);
    expect(report.anomaly).toBe(true);
    expect(report.status).toBe(CheckStatus.WARNING);
    expect(alerts.sent[0].severity).toBe(Severity.WARNING);
    expect(alerts.sent[0].message).toBe('End-to-end 30.0m is at or above the historical p95 of 25.0m (7 samples)');
  });

  it('needs enough history before flagging anomalies', async () => {
    const relaxed = { ...thresholds, transitionThresholdsSeconds: {}, totalWarningSeconds: 7200, totalCriticalSeconds: 10800 };
    store.completions = fullRun;
    store.stats = stats(3, 1500);

    const report = await tracker(relaxed).trackDate(DATE);

    expect(report.anomaly).toBe(false);
    expect(report.status).toBe(CheckStatus.OK);
    expect(alerts.sent).toHaveLength(0);
  });

  it('reports a date that has not started as NO_DATA', async () => {
    const report = await tracker().trackDate(DATE);

    expect(report.status).toBe(CheckStatus.NO_DATA);
    expect(alerts.sent).toHaveLength(0);
  });

  it('turns a failed read into ERROR', async () => {
    store.failWith = new Error('ClickHouse unavailable');

    const summary = await tracker().checkAll(DATE);

    expect(summary.status).toBe(CheckStatus.ERROR);
    expect(summary.results.map((result) => result.status)).toEqual([
      CheckStatus.ERROR,
      CheckStatus.ERROR,
      CheckStatus.ERROR,
    ]);
  });

  it('exposes per-transition results through checkAll', async () => {
    store.completions = fullRun.slice(0, 3);

    const summary = await tracker().checkAll(DATE, { alert: false });

    expect(summary.results).toEqual([
      {
        key: 'phase1_to_phase2',
        status: CheckStatus.WARNING,
        measuredValue: 300,
        message: 'phase1_to_phase2: 5.0m (threshold 5.0m, +0%)',
      },
      { key: 'phase2_to_phase3', status: CheckStatus.NO_DATA, measuredValue: null, message: 'phase2_to_phase3: not yet complete' },
      { key: 'total', status: CheckStatus.NO_DATA, measuredValue: null, message: 'total: not yet complete' },
    ]);
    expect(alerts.sent).toHaveLength(0);
  });
});
