/**
 * LatencyTracker
 *
 * Measures how long a business date takes to move through the pipeline:
 * adjacent stage transitions and the end-to-end duration, in seconds. A
 * transition whose start or end stage has not finished is null, never 0.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CheckResult,
  CheckStatus,
  CheckSummary,
  CompletionRecord,
  Severity,
  isBreach,
  systemClock,
  worstStatus,
  type Clock,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { LatencyMetricsRow, LatencyStats } from './clickhouse';
import type { MonitoringConfig, StageConfig } from './config';
import { isStageComplete } from './detectors/stall';
import type { AlertSender, CheckAllOptions, Detector, DetectorOptions } from './detectors/ThresholdDetector';
import { withTimeout } from './timeout';

export const TOTAL_KEY = 'total';

export type PipelineState = 'not_started' | 'in_progress' | 'complete';

export interface LatencyStore {
  getCompletions(businessDate: string): Promise<CompletionRecord[]>;
  storeLatencyMetrics(metrics: LatencyMetricsRow): Promise<void>;
  getLatencyStats(days: number, beforeDate: string): Promise<LatencyStats | null>;
}

export interface LatencyViolation {
  transition: string;
  actualSeconds: number;
  thresholdSeconds: number;
  severity: Severity;
  excessPct: number;
}

export interface PipelineTimeline {
  pipelineStart: Date | null;
  stageTimestamps: Record<string, Date | null>;
  transitionSeconds: Record<string, number | null>;
  totalSeconds: number | null;
  state: PipelineState;
}

export interface LatencyReport extends PipelineTimeline {
  businessDate: string;
  status: CheckStatus;
  violations: LatencyViolation[];
  stats: LatencyStats | null;
  anomaly: boolean;
  stored: boolean;
  alerted: boolean;
  error?: string;
}

export interface TrackOptions {
  alert?: boolean;
  store?: boolean;
}

export function transitionKey(from: string, to: string): string {
  return `${from}_to_${to}`;
}

function secondsBetween(start: Date | null, end: Date | null): number | null {
  if (!start || !end) {
    return null;
  }
  return (end.getTime() - start.getTime()) / 1000;
}

function stageSuccesses(stage: StageConfig, completions: CompletionRecord[]): Date[] {
  return completions
    .filter((record) => record.stageKey === stage.key && record.status === 'success')
    .map((record) => record.completedAt);
}

export function buildTimeline(stages: StageConfig[], completions: CompletionRecord[]): PipelineTimeline {
  const stageTimestamps: Record<string, Date | null> = {};
  for (const stage of stages) {
    const times = stageSuccesses(stage, completions);
    stageTimestamps[stage.key] =
      times.length > 0 && isStageComplete(stage, completions)
        ? new Date(Math.max(...times.map((time) => time.getTime())))
        : null;
  }

  const firstTimes = stages.length > 0 ? stageSuccesses(stages[0], completions) : [];
  const pipelineStart = firstTimes.length > 0 ? new Date(Math.min(...firstTimes.map((time) => time.getTime()))) : null;

  const transitionSeconds: Record<string, number | null> = {};
  for (let i = 0; i + 1 < stages.length; i++) {
    const from = stages[i];
    const to = stages[i + 1];
    transitionSeconds[transitionKey(from.key, to.key)] = secondsBetween(
      stageTimestamps[from.key] ?? null,
      stageTimestamps[to.key] ?? null
    );
  }

  const last = stages.length > 0 ? stages[stages.length - 1] : undefined;
  const end = last ? stageTimestamps[last.key] ?? null : null;
  const totalSeconds = secondsBetween(pipelineStart, end);

  let state: PipelineState = 'in_progress';
  if (!pipelineStart) {
    state = 'not_started';
  } else if (end) {
    state = 'complete';
  }

  return { pipelineStart, stageTimestamps, transitionSeconds, totalSeconds, state };
}

function excessPct(actual: number, threshold: number): number {
  return Math.round(((actual - threshold) / threshold) * 100);
}

export function findViolations(
  timeline: Pick<PipelineTimeline, 'transitionSeconds' | 'totalSeconds'>,
  config: MonitoringConfig['latency']
): LatencyViolation[] {
  const violations: LatencyViolation[] = [];

  for (const [transition, seconds] of Object.entries(timeline.transitionSeconds)) {
    const threshold = config.transitionThresholdsSeconds[transition];
    if (seconds === null || threshold === undefined || seconds < threshold) {
      continue;
    }
    violations.push({
      transition,
      actualSeconds: seconds,
      thresholdSeconds: threshold,
      severity: seconds >= threshold * 2 ? Severity.CRITICAL : Severity.WARNING,
      excessPct: excessPct(seconds, threshold),
    });
  }

  const total = timeline.totalSeconds;
  if (total !== null && total >= config.totalWarningSeconds) {
    const critical = total >= config.totalCriticalSeconds;
    const threshold = critical ? config.totalCriticalSeconds : config.totalWarningSeconds;
    violations.push({
      transition: TOTAL_KEY,
      actualSeconds: total,
      thresholdSeconds: threshold,
      severity: critical ? Severity.CRITICAL : Severity.WARNING,
      excessPct: excessPct(total, threshold),
    });
  }
  return violations;
}

function statusForViolation(violation: LatencyViolation | undefined): CheckStatus {
  if (!violation) {
    return CheckStatus.OK;
  }
  return violation.severity === Severity.CRITICAL ? CheckStatus.CRITICAL : CheckStatus.WARNING;
}

function formatDuration(seconds: number): string {
  if (seconds < 120) {
    return `${Math.round(seconds)}s`;
  }
  return `${(seconds / 60).toFixed(1)}m`;
}

export class LatencyTracker implements Detector {
  readonly name = 'latency';
  private clock: Clock;
  private logger: Logger;
  private fetchTimeoutMs: number;

  constructor(
    private readonly store: LatencyStore,
    private readonly alerts: AlertSender,
    private readonly stages: StageConfig[],
    private readonly config: MonitoringConfig['latency'],
    options: DetectorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('latency');
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
  }

  keys(): string[] {
    const keys: string[] = [];
    for (let i = 0; i + 1 < this.stages.length; i++) {
      keys.push(transitionKey(this.stages[i].key, this.stages[i + 1].key));
    }
    return [...keys, TOTAL_KEY];
  }

  async trackDate(businessDate: string, options: TrackOptions = {}): Promise<LatencyReport> {
    let completions: CompletionRecord[];
    try {
      completions = await withTimeout(
        this.store.getCompletions(businessDate),
        this.fetchTimeoutMs,
        `latency completions for ${businessDate}`
      );
    } catch (error) {
      this.logger.warn('Latency measurement failed', { businessDate, error: errorMessage(error) });
      return {
        ...buildTimeline(this.stages, []),
        businessDate,
        status: CheckStatus.ERROR,
        violations: [],
        stats: null,
        anomaly: false,
        stored: false,
        alerted: false,
        error: errorMessage(error),
      };
    }

    const timeline = buildTimeline(this.stages, completions);
    const violations = findViolations(timeline, this.config);

    let stats: LatencyStats | null = null;
    let anomaly = false;
    let stored = false;
    if (timeline.state === 'complete' && timeline.totalSeconds !== null) {
      stats = await this.historicalStats(businessDate);
      anomaly =
        stats !== null &&
        stats.sampleCount >= this.config.minHistorySamples &&
        timeline.totalSeconds >= stats.p95Seconds;

      if (options.store !== false) {
        stored = await this.storeMetrics(businessDate, timeline, violations.length);
      }
    }

    let status =
      timeline.state === 'not_started'
        ? CheckStatus.NO_DATA
        : worstStatus([CheckStatus.OK, ...violations.map((violation) => statusForViolation(violation))]);
    if (anomaly && status === CheckStatus.OK) {
      status = CheckStatus.WARNING;
    }

    const report: LatencyReport = {
      ...timeline,
      businessDate,
      status,
      violations,
      stats,
      anomaly,
      stored,
      alerted: false,
    };

    if (options.alert !== false && (violations.length > 0 || anomaly)) {
      report.alerted = await this.sendLatencyAlert(report);
    }

    this.logger.info('Latency tracked', {
      businessDate,
      state: timeline.state,
      totalSeconds: timeline.totalSeconds,
      violations: violations.length,
      anomaly,
      stored,
    });
    return report;
  }

  /**
   * End-to-end latency percentiles over the trailing window before a date.
   */
  async getHistoricalStats(days: number, beforeDate: string): Promise<LatencyStats | null> {
    return withTimeout(this.store.getLatencyStats(days, beforeDate), this.fetchTimeoutMs, 'latency stats');
  }

  async checkOne(key: string, businessDate: string): Promise<CheckResult> {
    const report = await this.trackDate(businessDate, { alert: false, store: false });
    const result = this.toResults(report).find((candidate) => candidate.key === key);
    if (!result) {
      return { key, status: CheckStatus.NO_DATA, measuredValue: null, message: `${key}: unknown transition` };
    }
    return result;
  }

  async checkAll(businessDate: string, options: CheckAllOptions = {}): Promise<CheckSummary> {
    const report =
      options.hasActivity === false
        ? null
        : await this.trackDate(businessDate, { alert: options.alert, store: options.alert !== false });

    const results: CheckResult[] = report
      ? this.toResults(report)
      : this.keys().map((key) => ({
          key,
          status: CheckStatus.NO_DATA,
          measuredValue: null,
          message: `${key}: no activity scheduled for ${businessDate}`,
        }));

    return {
      checkId: uuidv4(),
      detector: this.name,
      businessDate,
      status: report ? report.status : CheckStatus.NO_DATA,
      results,
      breaching: results.filter((result) => isBreach(result.status)).map((result) => result.key),
      alerted: report?.alerted ?? false,
      checkedAt: this.clock.now(),
    };
  }

  private toResults(report: LatencyReport): CheckResult[] {
    if (report.status === CheckStatus.ERROR) {
      return this.keys().map((key) => ({
        key,
        status: CheckStatus.ERROR,
        measuredValue: null,
        message: `${key}: measurement failed: ${report.error ?? 'unknown error'}`,
      }));
    }

    const seconds: Record<string, number | null> = { ...report.transitionSeconds, [TOTAL_KEY]: report.totalSeconds };
    return this.keys().map((key): CheckResult => {
      const value = seconds[key] ?? null;
      if (value === null) {
        return { key, status: CheckStatus.NO_DATA, measuredValue: null, message: `${key}: not yet complete` };
      }
      const violation = report.violations.find((candidate) => candidate.transition === key);
      let status = statusForViolation(violation);
      let message = violation
        ? `${key}: ${formatDuration(value)} (threshold ${formatDuration(violation.thresholdSeconds)}, +${violation.excessPct}%)`
        : `${key}: ${formatDuration(value)}`;
      if (key === TOTAL_KEY && report.anomaly && report.stats) {
        message += `; above historical p95 ${formatDuration(report.stats.p95Seconds)}`;
        if (status === CheckStatus.OK) {
          status = CheckStatus.WARNING;
        }
      }
      return { key, status, measuredValue: value, message };
    });
  }

  private async historicalStats(businessDate: string): Promise<LatencyStats | null> {
    try {
      return await this.getHistoricalStats(this.config.historyDays, businessDate);
    } catch (error) {
      this.logger.warn('Latency history unavailable', { businessDate, error: errorMessage(error) });
      return null;
    }
  }

  private async storeMetrics(businessDate: string, timeline: PipelineTimeline, violationCount: number): Promise<boolean> {
    if (timeline.totalSeconds === null) {
      return false;
    }
    const stageTimestamps: Record<string, string | null> = {};
    for (const [key, value] of Object.entries(timeline.stageTimestamps)) {
      stageTimestamps[key] = value ? value.toISOString() : null;
    }

    try {
      await withTimeout(
        this.store.storeLatencyMetrics({
          businessDate,
          stageTimestamps,
          transitionSeconds: timeline.transitionSeconds,
          totalLatencySeconds: timeline.totalSeconds,
          violationCount,
          computedAt: this.clock.now(),
        }),
        this.fetchTimeoutMs,
        'store latency metrics'
      );
      return true;
    } catch (error) {
      this.logger.error('Failed to store latency metrics', { businessDate, error: errorMessage(error) });
      return false;
    }
  }

  private async sendLatencyAlert(report: LatencyReport): Promise<boolean> {
    const critical = report.violations.some((violation) => violation.severity === Severity.CRITICAL);
    const lines = report.violations.map(
      (violation) =>
        `[${violation.severity.toUpperCase()}] ${violation.transition}: ${formatDuration(violation.actualSeconds)} ` +
        `(threshold ${formatDuration(violation.thresholdSeconds)}, +${violation.excessPct}%)`
    );
    if (report.anomaly && report.stats && report.totalSeconds !== null) {
      lines.push(
        `End-to-end ${formatDuration(report.totalSeconds)} is at or above the historical p95 ` +
          `of ${formatDuration(report.stats.p95Seconds)} (${report.stats.sampleCount} samples)`
      );
    }

    try {
      return await this.alerts.sendAlert({
        severity: critical ? Severity.CRITICAL : Severity.WARNING,
        title: `Pipeline latency for ${report.businessDate}: ${report.violations.length} violation(s)`,
        message: lines.join('\n'),
        category: 'latency',
        context: {
          businessDate: report.businessDate,
          totalSeconds: report.totalSeconds,
          violations: report.violations,
          p95Seconds: report.stats?.p95Seconds ?? null,
        },
      });
    } catch (error) {
      this.logger.error('Failed to send latency alert', { businessDate: report.businessDate, error: errorMessage(error) });
      return false;
    }
  }
}
