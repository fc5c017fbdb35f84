import { describe, it, expect, beforeEach } from 'vitest';
import { CheckStatus, Severity, type CompletionRecord, type GapSignal } from '@sentinel/shared-types';
import type { MissingGames } from '../clickhouse';
import type { MonitoringConfig } from '../config';
import { CompletenessChecker, type CompletenessSource } from '../detectors/completeness';
import { FakeClock, RecordingAlerts, STAGES, completion, silentLogger } from './helpers';

const DATE = '2024-03-09';

const config: MonitoringConfig['completeness'] = {
  lookbackHours: 36,
  triggerStages: ['phase3'],
  scheduleTable: 'raw.schedule',
  scheduleDateColumn: 'game_date',
  scheduleGameIdColumn: 'game_id',
  observedTable: 'analytics.player_game_summary',
  observedDateColumn: 'game_date',
  observedGameIdColumn: 'game_id',
  missingGamesGapType: 'player_game_summary',
};

class FakeCompletionStore implements CompletenessSource {
  records: CompletionRecord[] = [];
  missing: MissingGames = { scheduledGames: 8, missingGameIds: [] };
  missingGamesCalls = 0;
  // Simulates a warehouse that has not made the latest insert visible yet
  lagging = false;

  async recordCompletion(record: CompletionRecord): Promise<void> {
    if (!this.lagging) {
      this.records.push(record);
    }
  }

  async getCompletions(businessDate: string, since?: Date): Promise<CompletionRecord[]> {
    return this.records.filter(
      (record) => record.businessDate === businessDate && (!since || record.completedAt >= since)
    );
  }

  async findMissingGames(): Promise<MissingGames> {
    this.missingGamesCalls += 1;
    return this.missing;
  }
}

describe('CompletenessChecker', () => {
  let store: FakeCompletionStore;
  let alerts: RecordingAlerts;
  let signals: GapSignal[];
  let checker: CompletenessChecker;

  beforeEach(() => {
    store = new FakeCompletionStore();
    alerts = new RecordingAlerts();
    signals = [];
    checker = new CompletenessChecker(store, alerts, STAGES, config, {
      clock: new FakeClock('2024-03-10T12:00:00Z'),
      logger: silentLogger,
      gapSink: {
        handleGapSignal: async (signal: GapSignal) => {
          signals.push(signal);
        },
      },
    });
  });

  function signal(processorName: string, status: CompletionRecord['status'] = 'success') {
    return { processorName, gameDate: DATE, status, rowsProcessed: 25 };
  }

  it('records the completion under the processor stage', async () => {
    await checker.handleCompletion(signal('analytics_a'));

    expect(store.records).toEqual([
      {
        stageKey: 'phase3',
        businessDate: DATE,
        processorName: 'analytics_a',
        completedAt: new Date('2024-03-10T12:00:00Z'),
        status: 'success',
        rowsProcessed: 25,
      },
    ]);
  });

  it('waits while expected processors are still missing', async () => {
    const outcome = await checker.handleCompletion(signal('analytics_a'));

    expect(outcome.stageComplete).toBe(false);
    expect(outcome.missingProcessors).toEqual(['analytics_b']);
    expect(outcome.result.status).toBe(CheckStatus.NO_DATA);
    expect(outcome.result.message).toBe('phase3: 1/2 processors reported for 2024-03-09');
    expect(store.missingGamesCalls).toBe(0);
    expect(alerts.sent).toHaveLength(0);
  });

  it('cross-checks games as soon as the last processor reports', async () => {
    store.missing = { scheduledGames: 8, missingGameIds: ['g1', 'g2'] };
    await checker.handleCompletion(signal('analytics_a'));

    const outcome = await checker.handleCompletion(signal('analytics_b'));

    expect(outcome.stageComplete).toBe(true);
    expect(outcome.alerted).toBe(true);
    expect(outcome.result.status).toBe(CheckStatus.WARNING);
    expect(outcome.result.message).toBe(
      'phase3: 2 of 8 scheduled games missing from analytics.player_game_summary for 2024-03-09'
    );
    expect(alerts.sent).toHaveLength(1);
    expect(alerts.sent[0]).toMatchObject({
      severity: Severity.WARNING,
      title: 'Incomplete data for 2024-03-09: 2 game(s) missing',
      category: 'completeness',
    });
    expect(signals).toHaveLength(1);
    expect(signals[0]).toMatchObject({
      gapType: 'player_game_summary',
      source: 'completeness_checker',
      gameIds: ['g1', 'g2'],
      gameDates: [DATE],
    });
  });

  it('counts the processor that just reported even before the store shows it', async () => {
    store.records.push(completion('phase3', 'analytics_a', '2024-03-10T11:00:00Z'));
    store.lagging = true;

    const outcome = await checker.handleCompletion(signal('analytics_b'));

    expect(outcome.stageComplete).toBe(true);
    expect(store.missingGamesCalls).toBe(1);
    expect(outcome.result.status).toBe(CheckStatus.OK);
    expect(outcome.result.message).toBe('phase3: all 8 scheduled games present for 2024-03-09');
  });

  it('ignores successes older than the lookback window', async () => {
    store.records.push(completion('phase3', 'analytics_a', '2024-03-08T20:00:00Z'));

    const outcome = await checker.handleCompletion(signal('analytics_b'));

    expect(outcome.missingProcessors).toEqual(['analytics_a']);
  });

  it('does not count failed completions', async () => {
    await checker.handleCompletion(signal('analytics_a', 'failed'));

    const outcome = await checker.handleCompletion(signal('analytics_b'));

    expect(outcome.missingProcessors).toEqual(['analytics_a']);
  });

  it('stops at processor completeness for stages without a games cross-check', async () => {
    const outcome = await checker.handleCompletion(signal('raw_a'));

    expect(outcome.result.status).toBe(CheckStatus.OK);
    expect(outcome.result.message).toBe('phase2: all 1 processors reported for 2024-03-09');
    expect(store.missingGamesCalls).toBe(0);
  });

  it('treats a day without scheduled games as NO_DATA', async () => {
    store.missing = { scheduledGames: 0, missingGameIds: [] };
    await checker.handleCompletion(signal('analytics_a'));

    const outcome = await checker.handleCompletion(signal('analytics_b'));

    expect(outcome.result.status).toBe(CheckStatus.NO_DATA);
    expect(alerts.sent).toHaveLength(0);
  });

  it('records processors outside every stage as unassigned', async () => {
    const outcome = await checker.handleCompletion(signal('ad_hoc_job'));

    expect(outcome.stageKey).toBe('unassigned');
    expect(outcome.result.status).toBe(CheckStatus.NO_DATA);
    expect(store.records[0].stageKey).toBe('unassigned');
  });

  it('re-checks every stage for a date when polled', async () => {
    store.missing = { scheduledGames: 8, missingGameIds: ['g7'] };
    store.records.push(
      completion('phase2', 'raw_a', '2024-03-10T08:00:00Z'),
      completion('phase3', 'analytics_a', '2024-03-10T09:00:00Z'),
      completion('phase3', 'analytics_b', '2024-03-10T09:30:00Z')
    );

    const summary = await checker.checkAll(DATE);

    expect(summary.results.map((result) => result.status)).toEqual([
      CheckStatus.NO_DATA,
      CheckStatus.OK,
      CheckStatus.WARNING,
    ]);
    expect(summary.status).toBe(CheckStatus.WARNING);
    expect(summary.breaching).toEqual(['phase3']);
    expect(summary.alerted).toBe(true);
  });
});
