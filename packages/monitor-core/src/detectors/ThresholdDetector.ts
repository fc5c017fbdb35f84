/**
 * Generic threshold detector
 *
 * Every polled detector runs the same loop: for each configured key, fetch a
 * measurement, classify it, then send one aggregated alert for the whole run.
 * What differs between detectors is captured by a small strategy value:
 *
 * - threshold:  compare one scalar against warning/critical limits
 * - dependency: same, and explain a critical key through its upstream key
 * - two-source: fetch two scalars and let the detector classify the pair
 *
 * Failures to measure never escalate: a thrown or timed-out fetch is ERROR,
 * an empty fetch is NO_DATA.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CheckConfig,
  CheckResult,
  CheckStatus,
  CheckSummary,
  Clock,
  ThresholdConfig,
  isBreach,
  severityForStatus,
  systemClock,
  worstStatus,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { AlertInput } from '@sentinel/alerting';
import { DetectorError } from '../errors';
import { withTimeout } from '../timeout';

export interface Measurement {
  value: number;
  details?: Record<string, unknown>;
}

export type Fetcher<C> = (key: string, config: C, businessDate: string) => Promise<Measurement | null>;

export type ThresholdRule = Pick<ThresholdConfig, 'warningThreshold' | 'criticalThreshold' | 'direction'>;

export interface Classification {
  status: CheckStatus;
  message: string;
  details?: Record<string, unknown>;
}

export type DetectorStrategy<C> =
  | { kind: 'threshold'; rule: (config: C) => ThresholdRule }
  | {
      kind: 'dependency';
      rule: (config: C) => ThresholdRule;
      upstreamOf: (key: string, config: C) => string | undefined;
    }
  | {
      kind: 'two-source';
      fetchSecondary: Fetcher<C>;
      classify: (key: string, primary: Measurement, secondary: Measurement, config: C) => Classification;
    };

export interface DetectorDefinition<C extends CheckConfig> {
  name: string;
  title: string;
  category: string;
  unit: string;
  checks: Record<string, C>;
  fetch: Fetcher<C>;
  strategy: DetectorStrategy<C>;
}

export interface AlertSender {
  sendAlert(input: AlertInput): Promise<boolean>;
}

export interface DetectorOptions {
  clock?: Clock;
  logger?: Logger;
  fetchTimeoutMs?: number;
}

export interface CheckAllOptions {
  hasActivity?: boolean;
  alert?: boolean;
}

/**
 * What schedulers, the HTTP trigger and the CLI run.
 */
export interface Detector {
  readonly name: string;
  keys(): string[];
  checkOne(key: string, businessDate: string): Promise<CheckResult>;
  checkAll(businessDate: string, options?: CheckAllOptions): Promise<CheckSummary>;
}

export function classifyThreshold(value: number, rule: ThresholdRule): CheckStatus {
  const breaches = (limit: number): boolean =>
    rule.direction === 'above' ? value >= limit : value <= limit;

  if (breaches(rule.criticalThreshold)) {
    return CheckStatus.CRITICAL;
  }
  if (breaches(rule.warningThreshold)) {
    return CheckStatus.WARNING;
  }
  return CheckStatus.OK;
}

export function isWithinWindow(now: Date, config: CheckConfig): boolean {
  const window = config.applicabilityWindow;
  if (!window) {
    return true;
  }
  const hour = now.getUTCHours();
  if (window.startHourUtc <= window.endHourUtc) {
    return hour >= window.startHourUtc && hour < window.endHourUtc;
  }
  return hour >= window.startHourUtc || hour < window.endHourUtc;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export class ThresholdDetector<C extends CheckConfig> implements Detector {
  private clock: Clock;
  private logger: Logger;
  private fetchTimeoutMs: number;

  constructor(
    private readonly definition: DetectorDefinition<C>,
    private readonly alerts: AlertSender,
    options: DetectorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger(`detector:${definition.name}`);
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
  }

  get name(): string {
    return this.definition.name;
  }

  keys(): string[] {
    return Object.keys(this.definition.checks);
  }

  async checkOne(key: string, businessDate: string): Promise<CheckResult> {
    const result = await this.evaluate(key, businessDate);
    const strategy = this.definition.strategy;
    if (strategy.kind !== 'dependency' || result.status !== CheckStatus.CRITICAL) {
      return result;
    }

    const upstream = strategy.upstreamOf(key, this.configFor(key));
    const upstreamResult =
      upstream && this.definition.checks[upstream] ? await this.evaluate(upstream, businessDate) : undefined;
    return this.diagnose(result, upstream, upstreamResult);
  }

  async checkAll(businessDate: string, options: CheckAllOptions = {}): Promise<CheckSummary> {
    const checkId = uuidv4();
    const keys = this.keys();
    let results: CheckResult[];

    if (options.hasActivity === false) {
      results = keys.map((key) => ({
        key,
        status: CheckStatus.NO_DATA,
        measuredValue: null,
        message: `${key}: no activity scheduled for ${businessDate}`,
      }));
    } else {
      results = await Promise.all(
        keys.map((key) =>
          this.evaluate(key, businessDate).catch((error): CheckResult => ({
            key,
            status: CheckStatus.ERROR,
            measuredValue: null,
            message: `${key}: ${errorMessage(error)}`,
          }))
        )
      );
      results = this.applyDependencies(results);
    }

    const breachingResults = results.filter((result) => isBreach(result.status));
    const summary: CheckSummary = {
      checkId,
      detector: this.definition.name,
      businessDate,
      status: worstStatus(results.map((result) => result.status)),
      results,
      breaching: breachingResults.map((result) => result.key),
      alerted: false,
      checkedAt: this.clock.now(),
    };

    if (breachingResults.length > 0 && options.alert !== false) {
      summary.alerted = await this.sendAggregateAlert(summary, breachingResults);
    }

    this.logger.info('Detector run complete', {
      checkId,
      detector: summary.detector,
      businessDate,
      status: summary.status,
      checked: results.length,
      breaching: summary.breaching,
      alerted: summary.alerted,
    });
    return summary;
  }

  private configFor(key: string): C {
    const config = this.definition.checks[key];
    if (!config) {
      throw new DetectorError(`Unknown ${this.definition.name} check: ${key}`);
    }
    return config;
  }

  private async evaluate(key: string, businessDate: string): Promise<CheckResult> {
    const config = this.configFor(key);

    if (!isWithinWindow(this.clock.now(), config)) {
      return {
        key,
        status: CheckStatus.NO_DATA,
        measuredValue: null,
        message: `${key}: outside applicability window`,
      };
    }

    try {
      const strategy = this.definition.strategy;
      if (strategy.kind === 'two-source') {
        const [primary, secondary] = await Promise.all([
          this.fetchBounded(this.definition.fetch, key, config, businessDate),
          this.fetchBounded(strategy.fetchSecondary, key, config, businessDate),
        ]);
        if (!primary || !secondary) {
          return { key, status: CheckStatus.NO_DATA, measuredValue: null, message: `${key}: no data` };
        }
        const classification = strategy.classify(key, primary, secondary, config);
        return {
          key,
          status: classification.status,
          measuredValue: primary.value,
          message: classification.message,
          details: classification.details,
        };
      }

      const measurement = await this.fetchBounded(this.definition.fetch, key, config, businessDate);
      if (!measurement) {
        return { key, status: CheckStatus.NO_DATA, measuredValue: null, message: `${key}: no data` };
      }
      if (!Number.isFinite(measurement.value)) {
        return {
          key,
          status: CheckStatus.ERROR,
          measuredValue: null,
          message: `${key}: measurement is not a finite number`,
        };
      }

      const rule = strategy.rule(config);
      const status = classifyThreshold(measurement.value, rule);
      return {
        key,
        status,
        measuredValue: measurement.value,
        message:
          `${key}: ${formatNumber(measurement.value)} ${this.definition.unit} ` +
          `(warning ${formatNumber(rule.warningThreshold)}, critical ${formatNumber(rule.criticalThreshold)})`,
        details: measurement.details,
      };
    } catch (error) {
      this.logger.warn('Measurement failed', {
        detector: this.definition.name,
        key,
        businessDate,
        error: errorMessage(error),
      });
      return {
        key,
        status: CheckStatus.ERROR,
        measuredValue: null,
        message: `${key}: measurement failed: ${errorMessage(error)}`,
      };
    }
  }

  private fetchBounded(
    fetcher: Fetcher<C>,
    key: string,
    config: C,
    businessDate: string
  ): Promise<Measurement | null> {
    return withTimeout(
      fetcher(key, config, businessDate),
      this.fetchTimeoutMs,
      `${this.definition.name} fetch for ${key}`
    );
  }

  private applyDependencies(results: CheckResult[]): CheckResult[] {
    const strategy = this.definition.strategy;
    if (strategy.kind !== 'dependency') {
      return results;
    }

    const byKey = new Map(results.map((result) => [result.key, result]));
    return results.map((result) => {
      if (result.status !== CheckStatus.CRITICAL) {
        return result;
      }
      const upstream = strategy.upstreamOf(result.key, this.configFor(result.key));
      return this.diagnose(result, upstream, upstream ? byKey.get(upstream) : undefined);
    });
  }

  /**
   * One level only: a stalled key whose upstream is stalled or silent blames
   * the upstream, otherwise it blames itself.
   */
  private diagnose(result: CheckResult, upstream: string | undefined, upstreamResult?: CheckResult): CheckResult {
    if (
      upstream !== undefined &&
      upstreamResult !== undefined &&
      (upstreamResult.status === CheckStatus.CRITICAL || upstreamResult.status === CheckStatus.NO_DATA)
    ) {
      return {
        ...result,
        message: `${result.message}; upstream ${upstream} is ${upstreamResult.status}, likely root cause`,
        details: { ...result.details, rootCause: upstream },
      };
    }
    return { ...result, details: { ...result.details, rootCause: result.key } };
  }

  private async sendAggregateAlert(summary: CheckSummary, breaching: CheckResult[]): Promise<boolean> {
    try {
      return await this.alerts.sendAlert({
        severity: severityForStatus(worstStatus(breaching.map((result) => result.status))),
        title: `${this.definition.title}: ${breaching.length} check(s) breaching for ${summary.businessDate}`,
        message: breaching.map((result) => `[${result.status.toUpperCase()}] ${result.message}`).join('\n'),
        category: this.definition.category,
        context: {
          checkId: summary.checkId,
          businessDate: summary.businessDate,
          breaching: breaching.map((result) => ({
            key: result.key,
            status: result.status,
            measuredValue: result.measuredValue,
          })),
        },
      });
    } catch (error) {
      this.logger.error('Failed to send detector alert', {
        detector: this.definition.name,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
