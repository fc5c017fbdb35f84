import { systemClock, type Clock, type CompletionRecord } from '@sentinel/shared-types';
import type { StageConfig, StallCheckConfig } from '../config';
import {
  ThresholdDetector,
  type AlertSender,
  type DetectorOptions,
  type Measurement,
} from './ThresholdDetector';

const HOUR_MS = 60 * 60 * 1000;

export interface StallSource {
  getCompletions(businessDate: string): Promise<CompletionRecord[]>;
}

export function isStageComplete(stage: StageConfig, completions: CompletionRecord[]): boolean {
  const succeeded = new Set(
    completions
      .filter((record) => record.stageKey === stage.key && record.status === 'success')
      .map((record) => record.processorName)
  );
  return stage.expectedProcessors.every((processor) => succeeded.has(processor));
}

function latestCompletion(stageKey: string, completions: CompletionRecord[]): Date | null {
  let latest: Date | null = null;
  for (const record of completions) {
    if (record.stageKey === stageKey && (!latest || record.completedAt > latest)) {
      latest = record.completedAt;
    }
  }
  return latest;
}

/**
 * Hours a stage has gone without progress for a business date.
 *
 * - complete stage: 0
 * - stage has reported something: time since its latest report
 * - stage silent but upstream complete: time since upstream finished
 * - otherwise nothing to measure (null)
 */
export function measureStageLag(
  stage: StageConfig,
  upstream: StageConfig | undefined,
  completions: CompletionRecord[],
  now: Date
): Measurement | null {
  if (isStageComplete(stage, completions)) {
    return { value: 0, details: { state: 'complete' } };
  }

  const hoursSince = (date: Date): number => Math.max(0, now.getTime() - date.getTime()) / HOUR_MS;

  const latest = latestCompletion(stage.key, completions);
  if (latest) {
    return { value: hoursSince(latest), details: { state: 'in_progress', since: latest.toISOString() } };
  }

  if (upstream && isStageComplete(upstream, completions)) {
    const upstreamDone = latestCompletion(upstream.key, completions);
    if (upstreamDone) {
      return {
        value: hoursSince(upstreamDone),
        details: { state: 'not_started', since: upstreamDone.toISOString(), upstream: upstream.key },
      };
    }
  }
  return null;
}

export function createStallDetector(
  source: StallSource,
  alerts: AlertSender,
  checks: Record<string, StallCheckConfig>,
  stages: StageConfig[],
  options: DetectorOptions = {}
): ThresholdDetector<StallCheckConfig> {
  const clock: Clock = options.clock ?? systemClock;
  const stageByKey = new Map(stages.map((stage) => [stage.key, stage]));

  return new ThresholdDetector<StallCheckConfig>(
    {
      name: 'stalls',
      title: 'Pipeline stalled',
      category: 'stalls',
      unit: 'hours without progress',
      checks,
      fetch: async (key, config, businessDate) => {
        const stage = stageByKey.get(key);
        if (!stage) {
          return null;
        }
        const upstream = config.dependsOn ? stageByKey.get(config.dependsOn) : undefined;
        const completions = await source.getCompletions(businessDate);
        return measureStageLag(stage, upstream, completions, clock.now());
      },
      strategy: {
        kind: 'dependency',
        rule: (config) => config,
        upstreamOf: (_key, config) => config.dependsOn,
      },
    },
    alerts,
    { ...options, clock }
  );
}
