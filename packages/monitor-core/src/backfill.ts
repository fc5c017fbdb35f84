/**
 * BackfillTrigger - turns gap signals into at most one recovery call per
 * gap signature per cooldown window.
 *
 * request id = md5("<gapType>:<sorted identifiers>") truncated to 16 hex
 * chars. Identifiers are game ids when present, otherwise game dates, sorted
 * and capped before hashing. The dates sent for recovery are capped the same
 * way so an oversized signal maps to a bounded job.
 *
 * Lifecycle: pending -> triggered | failed. triggered -> completed is owned by
 * the processors being backfilled.
 */

import { createHash } from 'node:crypto';
import {
  BackfillRequest,
  Clock,
  GapSignal,
  Severity,
  systemClock,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { MonitoringConfig } from './config';
import type { BackfillStore, ListFilter } from './backfillStore';
import type { RecoveryTrigger } from './recovery';
import type { AlertSender } from './detectors/ThresholdDetector';

export type BackfillAction = 'triggered' | 'failed' | 'skipped' | 'rejected';

export interface BackfillOutcome {
  action: BackfillAction;
  requestId: string | null;
  gapType: string;
  identifiers: string[];
  reason?: string;
}

export function selectIdentifiers(signal: Pick<GapSignal, 'gameIds' | 'gameDates'>, max: number): string[] {
  const identifiers = signal.gameIds.length > 0 ? signal.gameIds : signal.gameDates;
  return [...identifiers].sort().slice(0, max);
}

export function selectGameDates(signal: Pick<GapSignal, 'gameDates'>, max: number): string[] {
  return [...signal.gameDates].sort().slice(0, max);
}

export function computeRequestId(gapType: string, identifiers: string[]): string {
  const signature = `${gapType}:${[...identifiers].sort().join(',')}`;
  return createHash('md5').update(signature).digest('hex').slice(0, 16);
}

export interface BackfillTriggerOptions {
  clock?: Clock;
  logger?: Logger;
}

export class BackfillTrigger {
  private clock: Clock;
  private logger: Logger;
  private cooldownMs: number;

  constructor(
    private readonly store: BackfillStore,
    private readonly recovery: RecoveryTrigger,
    private readonly alerts: AlertSender,
    private readonly config: MonitoringConfig['backfill'],
    options: BackfillTriggerOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('backfill');
    this.cooldownMs = config.cooldownHours * 60 * 60 * 1000;
  }

  knownGapTypes(): string[] {
    return Object.keys(this.config.actions);
  }

  async handleGapSignal(signal: GapSignal): Promise<BackfillOutcome> {
    const action = this.config.actions[signal.gapType];
    const identifiers = selectIdentifiers(signal, this.config.maxIdentifiersPerRequest);

    if (!action) {
      this.logger.warn('Gap signal with unknown gap type', { gapType: signal.gapType, source: signal.source });
      return { action: 'rejected', requestId: null, gapType: signal.gapType, identifiers, reason: 'unknown gap type' };
    }
    if (identifiers.length === 0) {
      return { action: 'rejected', requestId: null, gapType: signal.gapType, identifiers, reason: 'no identifiers' };
    }

    const gameDates = signal.gameIds.length > 0
      ? selectGameDates(signal, this.config.maxIdentifiersPerRequest)
      : identifiers;
    const truncated = signal.gameIds.length > identifiers.length ||
      signal.gameDates.length > gameDates.length;
    if (truncated) {
      this.logger.warn('Gap signal truncated', {
        gapType: signal.gapType,
        kept: identifiers.length,
        keptDates: gameDates.length,
        max: this.config.maxIdentifiersPerRequest,
      });
    }

    const requestId = computeRequestId(signal.gapType, identifiers);
    const now = this.clock.now();
    const claim = await this.store.claim(
      {
        requestId,
        gapType: signal.gapType,
        identifiers,
        gameDates,
        teamAbbrs: signal.teamAbbrs,
        source: signal.source,
        severity: signal.severity,
        detectedAt: signal.detectedAt,
      },
      this.cooldownMs,
      now
    );

    if (!claim.claimed) {
      const createdAt = claim.existing?.createdAt;
      this.logger.info('Backfill skipped, request in cooldown', {
        requestId,
        gapType: signal.gapType,
        createdAt: createdAt?.toISOString(),
        status: claim.existing?.status,
      });
      await this.notify(Severity.INFO, 'SKIPPED', signal, requestId, identifiers, {
        reason: 'cooldown',
        existingStatus: claim.existing?.status,
        existingCreatedAt: createdAt?.toISOString(),
        cooldownHours: this.config.cooldownHours,
      });
      return { action: 'skipped', requestId, gapType: signal.gapType, identifiers, reason: 'cooldown' };
    }

    const result = await this.recovery.trigger(action, claim.request.gameDates, requestId);
    if (result.ok) {
      await this.store.markTriggered(requestId, this.clock.now());
      this.logger.info('Backfill triggered', {
        requestId,
        gapType: signal.gapType,
        identifiers: identifiers.length,
        status: result.value.status,
      });
      await this.notify(Severity.INFO, 'TRIGGERED', signal, requestId, identifiers, {
        processors: action.processors,
        gameDates: claim.request.gameDates,
      });
      return { action: 'triggered', requestId, gapType: signal.gapType, identifiers };
    }

    const reason = result.error.message;
    await this.store.markFailed(requestId, reason, this.clock.now());
    this.logger.error('Backfill trigger failed', { requestId, gapType: signal.gapType, error: reason });
    await this.notify(signal.severity, 'FAILED', signal, requestId, identifiers, { error: reason });
    return { action: 'failed', requestId, gapType: signal.gapType, identifiers, reason };
  }

  /**
   * Operator-initiated backfill for explicit dates. Goes through the same
   * claim so it cannot double-fire with an automatic trigger.
   */
  async manualTrigger(gameDates: string[], gapType: string): Promise<BackfillOutcome> {
    return this.handleGapSignal({
      gapType,
      detectedAt: this.clock.now(),
      source: 'manual',
      severity: Severity.INFO,
      gameIds: [],
      gameDates,
      teamAbbrs: [],
    });
  }

  async listRequests(filter: Partial<ListFilter> = {}): Promise<BackfillRequest[]> {
    return this.store.list({ status: filter.status, limit: filter.limit ?? 50 });
  }

  async getRequest(requestId: string): Promise<BackfillRequest | null> {
    return this.store.get(requestId);
  }

  private async notify(
    severity: Severity,
    label: 'TRIGGERED' | 'FAILED' | 'SKIPPED',
    signal: GapSignal,
    requestId: string,
    identifiers: string[],
    extra: Record<string, unknown>
  ): Promise<void> {
    try {
      await this.alerts.sendAlert({
        severity,
        title: `Backfill ${label}: ${signal.gapType} (${identifiers.length} games)`,
        message: `Backfill request ${requestId} for ${signal.gapType} from ${signal.source}: ${label.toLowerCase()}`,
        category: `backfill_${signal.gapType}`,
        context: {
          requestId,
          gapType: signal.gapType,
          source: signal.source,
          identifiers,
          ...extra,
        },
      });
    } catch (error) {
      this.logger.error('Backfill notification failed', { requestId, error: errorMessage(error) });
    }
  }
}
