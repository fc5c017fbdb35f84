/**
 * CompletenessChecker - reacts to completion signals instead of polling
 *
 * Each signal is recorded, then the set of processors that succeeded for the
 * date inside the lookback window is compared with the stage's expected set.
 * The moment a trigger stage is complete, the schedule is cross-checked
 * against the games actually observed downstream, so a missing game is
 * reported minutes after the stage finishes instead of at the next poll.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  CheckResult,
  CheckStatus,
  CheckSummary,
  CompletionRecord,
  CompletionSignal,
  Severity,
  isBreach,
  systemClock,
  worstStatus,
  type Clock,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { MissingGames } from '../clickhouse';
import type { MonitoringConfig, StageConfig } from '../config';
import { DetectorError } from '../errors';
import { withTimeout } from '../timeout';
import type { GapSink } from './gap';
import type { AlertSender, CheckAllOptions, Detector, DetectorOptions } from './ThresholdDetector';

const HOUR_MS = 60 * 60 * 1000;
export const UNASSIGNED_STAGE = 'unassigned';

export interface CompletenessSource {
  recordCompletion(record: CompletionRecord): Promise<void>;
  getCompletions(businessDate: string, since?: Date): Promise<CompletionRecord[]>;
  findMissingGames(config: MonitoringConfig['completeness'], businessDate: string): Promise<MissingGames>;
}

export interface CompletenessOptions extends DetectorOptions {
  gapSink?: GapSink;
}

export interface CompletionOutcome {
  stageKey: string;
  businessDate: string;
  stageComplete: boolean;
  missingProcessors: string[];
  result: CheckResult;
  alerted: boolean;
}

export function findStage(stages: StageConfig[], processorName: string): StageConfig | undefined {
  return stages.find((stage) => stage.expectedProcessors.includes(processorName));
}

export class CompletenessChecker implements Detector {
  readonly name = 'completeness';
  private clock: Clock;
  private logger: Logger;
  private fetchTimeoutMs: number;
  private gapSink?: GapSink;

  constructor(
    private readonly source: CompletenessSource,
    private readonly alerts: AlertSender,
    private readonly stages: StageConfig[],
    private readonly config: MonitoringConfig['completeness'],
    options: CompletenessOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('detector:completeness');
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 30000;
    this.gapSink = options.gapSink;
  }

  keys(): string[] {
    return this.stages.map((stage) => stage.key);
  }

  async handleCompletion(signal: CompletionSignal): Promise<CompletionOutcome> {
    const now = this.clock.now();
    const stage = findStage(this.stages, signal.processorName);
    const stageKey = stage?.key ?? UNASSIGNED_STAGE;

    await this.bounded(
      this.source.recordCompletion({
        stageKey,
        businessDate: signal.gameDate,
        processorName: signal.processorName,
        completedAt: now,
        status: signal.status,
        rowsProcessed: signal.rowsProcessed,
      }),
      'record completion'
    );

    if (!stage) {
      this.logger.warn('Completion from processor outside every stage', {
        processor: signal.processorName,
        businessDate: signal.gameDate,
      });
      return {
        stageKey,
        businessDate: signal.gameDate,
        stageComplete: false,
        missingProcessors: [],
        result: {
          key: stageKey,
          status: CheckStatus.NO_DATA,
          measuredValue: null,
          message: `${signal.processorName} is not an expected processor of any stage`,
        },
        alerted: false,
      };
    }

    const completions = await this.recentCompletions(signal.gameDate, now);
    // The warehouse may not return the row just written yet
    const justSucceeded = signal.status === 'success' ? [signal.processorName] : [];
    const missingProcessors = this.missingProcessors(stage, completions, justSucceeded);
    const result = await this.evaluateStage(stage, signal.gameDate, missingProcessors);

    this.logger.info('Completion recorded', {
      processor: signal.processorName,
      stage: stage.key,
      businessDate: signal.gameDate,
      missingProcessors,
      status: result.status,
    });

    let alerted = false;
    if (isBreach(result.status)) {
      alerted = await this.report(signal.gameDate, [result]);
    }
    return {
      stageKey: stage.key,
      businessDate: signal.gameDate,
      stageComplete: missingProcessors.length === 0,
      missingProcessors,
      result,
      alerted,
    };
  }

  async checkOne(key: string, businessDate: string): Promise<CheckResult> {
    const stage = this.stages.find((candidate) => candidate.key === key);
    if (!stage) {
      throw new DetectorError(`Unknown completeness stage: ${key}`);
    }
    const completions = await this.recentCompletions(businessDate, this.clock.now());
    return this.evaluateStage(stage, businessDate, this.missingProcessors(stage, completions, []));
  }

  /**
   * Polled form, used by the CLI and the HTTP trigger to re-check a date.
   */
  async checkAll(businessDate: string, options: CheckAllOptions = {}): Promise<CheckSummary> {
    const checkId = uuidv4();
    let results: CheckResult[];

    if (options.hasActivity === false) {
      results = this.stages.map((stage) => ({
        key: stage.key,
        status: CheckStatus.NO_DATA,
        measuredValue: null,
        message: `${stage.key}: no activity scheduled for ${businessDate}`,
      }));
    } else {
      try {
        const completions = await this.recentCompletions(businessDate, this.clock.now());
        results = await Promise.all(
          this.stages.map((stage) =>
            this.evaluateStage(stage, businessDate, this.missingProcessors(stage, completions, []))
          )
        );
      } catch (error) {
        results = this.stages.map((stage) => ({
          key: stage.key,
          status: CheckStatus.ERROR,
          measuredValue: null,
          message: `${stage.key}: measurement failed: ${errorMessage(error)}`,
        }));
      }
    }

    const breaching = results.filter((result) => isBreach(result.status));
    const alerted = breaching.length > 0 && options.alert !== false ? await this.report(businessDate, breaching) : false;

    return {
      checkId,
      detector: this.name,
      businessDate,
      status: worstStatus(results.map((result) => result.status)),
      results,
      breaching: breaching.map((result) => result.key),
      alerted,
      checkedAt: this.clock.now(),
    };
  }

  private recentCompletions(businessDate: string, now: Date): Promise<CompletionRecord[]> {
    const since = new Date(now.getTime() - this.config.lookbackHours * HOUR_MS);
    return this.bounded(this.source.getCompletions(businessDate, since), 'read completions');
  }

  private missingProcessors(stage: StageConfig, completions: CompletionRecord[], extra: string[]): string[] {
    const succeeded = new Set(extra);
    for (const record of completions) {
      if (record.stageKey === stage.key && record.status === 'success') {
        succeeded.add(record.processorName);
      }
    }
    return stage.expectedProcessors.filter((processor) => !succeeded.has(processor));
  }

  private async evaluateStage(stage: StageConfig, businessDate: string, missing: string[]): Promise<CheckResult> {
    const expected = stage.expectedProcessors.length;

    if (missing.length > 0) {
      return {
        key: stage.key,
        status: CheckStatus.NO_DATA,
        measuredValue: null,
        message: `${stage.key}: ${expected - missing.length}/${expected} processors reported for ${businessDate}`,
        details: { missingProcessors: missing },
      };
    }
    if (!this.config.triggerStages.includes(stage.key)) {
      return {
        key: stage.key,
        status: CheckStatus.OK,
        measuredValue: 0,
        message: `${stage.key}: all ${expected} processors reported for ${businessDate}`,
      };
    }

    let games: MissingGames;
    try {
      games = await this.bounded(this.source.findMissingGames(this.config, businessDate), 'find missing games');
    } catch (error) {
      this.logger.warn('Missing games query failed', { stage: stage.key, businessDate, error: errorMessage(error) });
      return {
        key: stage.key,
        status: CheckStatus.ERROR,
        measuredValue: null,
        message: `${stage.key}: measurement failed: ${errorMessage(error)}`,
      };
    }

    if (games.scheduledGames === 0) {
      return {
        key: stage.key,
        status: CheckStatus.NO_DATA,
        measuredValue: null,
        message: `${stage.key}: no games scheduled for ${businessDate}`,
      };
    }
    if (games.missingGameIds.length === 0) {
      return {
        key: stage.key,
        status: CheckStatus.OK,
        measuredValue: 0,
        message: `${stage.key}: all ${games.scheduledGames} scheduled games present for ${businessDate}`,
      };
    }
    return {
      key: stage.key,
      status: CheckStatus.WARNING,
      measuredValue: games.missingGameIds.length,
      message:
        `${stage.key}: ${games.missingGameIds.length} of ${games.scheduledGames} scheduled games ` +
        `missing from ${this.config.observedTable} for ${businessDate}`,
      details: { missingGameIds: games.missingGameIds, scheduledGames: games.scheduledGames },
    };
  }

  private async report(businessDate: string, breaching: CheckResult[]): Promise<boolean> {
    const missingGameIds = breaching.flatMap((result) => {
      const ids = result.details?.missingGameIds;
      return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : [];
    });

    let alerted = false;
    try {
      alerted = await this.alerts.sendAlert({
        severity: Severity.WARNING,
        title: `Incomplete data for ${businessDate}: ${missingGameIds.length} game(s) missing`,
        message: breaching.map((result) => result.message).join('\n'),
        category: 'completeness',
        context: { businessDate, missingGameIds },
      });
    } catch (error) {
      this.logger.error('Failed to send completeness alert', { businessDate, error: errorMessage(error) });
    }

    if (this.gapSink && missingGameIds.length > 0) {
      try {
        await this.gapSink.handleGapSignal({
          gapType: this.config.missingGamesGapType,
          detectedAt: this.clock.now(),
          source: 'completeness_checker',
          severity: Severity.WARNING,
          gameIds: missingGameIds,
          gameDates: [businessDate],
          teamAbbrs: [],
        });
      } catch (error) {
        this.logger.error('Failed to publish missing games', { businessDate, error: errorMessage(error) });
      }
    }
    return alerted;
  }

  private bounded<T>(promise: Promise<T>, label: string): Promise<T> {
    return withTimeout(promise, this.fetchTimeoutMs, `completeness ${label}`);
  }
}
