import { describe, it, expect, beforeEach } from 'vitest';
import { CheckStatus, type CompletionSignal, type GapSignal } from '@sentinel/shared-types';
import { createLogger } from '@sentinel/logger';
import type { BackfillOutcome, CompletionOutcome } from '@sentinel/monitor-core';
import { SignalConsumer } from '../consumer';
import { InMemorySignalQueue } from '../queue';

const logger = createLogger('test', { silent: true });

class FakeCompleteness {
  received: CompletionSignal[] = [];
  failures = 0;

  async handleCompletion(signal: CompletionSignal): Promise<CompletionOutcome> {
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error('clickhouse insert failed');
    }
    this.received.push(signal);
    return {
      stageKey: 'phase2',
      businessDate: signal.gameDate,
      stageComplete: true,
      missingProcessors: [],
      result: { key: 'phase2', status: CheckStatus.OK, measuredValue: null, message: 'phase2 complete' },
      alerted: false,
    };
  }
}

class FakeBackfill {
  received: GapSignal[] = [];

  knownGapTypes(): string[] {
    return ['boxscore', 'gamebook'];
  }

  async handleGapSignal(signal: GapSignal): Promise<BackfillOutcome> {
    this.received.push(signal);
    return { action: 'triggered', requestId: 'abc', gapType: signal.gapType, identifiers: signal.gameIds };
  }
}

const completionBody = {
  processor_name: 'bdl_player_boxscores',
  game_date: '2024-03-09',
  status: 'success',
  rows_processed: 240,
};

describe('SignalConsumer', () => {
  let queue: InMemorySignalQueue;
  let completeness: FakeCompleteness;
  let backfill: FakeBackfill;
  let consumer: SignalConsumer;

  beforeEach(() => {
    queue = new InMemorySignalQueue();
    completeness = new FakeCompleteness();
    backfill = new FakeBackfill();
    consumer = new SignalConsumer(queue, { completeness, backfill }, { batchSize: 10 }, logger);
  });

  it('routes each kind of signal to its handler and acks it', async () => {
    queue.add('completion', completionBody, 'c-1');
    queue.add('gap', {
      gap_type: 'boxscore',
      detected_at: '2024-03-10T06:00:00Z',
      source: 'gap_detector',
      game_ids: ['0022300001'],
    }, 'g-1');

    const result = await consumer.processBatch();

    expect(result).toEqual({ handled: 2, invalid: 0, failed: 0 });
    expect(queue.acknowledged).toEqual(['c-1', 'g-1']);
    expect(completeness.received).toEqual([
      { processorName: 'bdl_player_boxscores', gameDate: '2024-03-09', status: 'success', rowsProcessed: 240 },
    ]);
    expect(backfill.received.map((signal) => [signal.gapType, signal.gameIds])).toEqual([['boxscore', ['0022300001']]]);
  });

  it('dead-letters signals that fail validation', async () => {
    queue.add('completion', { ...completionBody, status: 'done' }, 'c-bad');
    queue.add('gap', { gap_type: 'odds', detected_at: '2024-03-10T06:00:00Z', game_dates: ['2024-03-09'] }, 'g-bad');
    queue.add('completion', null, 'c-garbled');

    const result = await consumer.processBatch();

    expect(result).toEqual({ handled: 0, invalid: 3, failed: 0 });
    expect(queue.deadLettered).toEqual(['c-bad', 'g-bad', 'c-garbled']);
    expect(queue.size()).toBe(0);
  });

  it('retries a failed handler once, then dead-letters', async () => {
    completeness.failures = 2;
    queue.add('completion', completionBody, 'c-1');

    expect(await consumer.processBatch()).toEqual({ handled: 0, invalid: 0, failed: 1 });
    expect(queue.size()).toBe(1);

    expect(await consumer.processBatch()).toEqual({ handled: 0, invalid: 0, failed: 1 });
    expect(queue.size()).toBe(0);
    expect(queue.deadLettered).toEqual(['c-1']);
    expect(queue.acknowledged).toEqual([]);
  });

  it('acks a signal that succeeds on redelivery', async () => {
    completeness.failures = 1;
    queue.add('completion', completionBody, 'c-1');

    await consumer.processBatch();
    const result = await consumer.processBatch();

    expect(result).toEqual({ handled: 1, invalid: 0, failed: 0 });
    expect(queue.acknowledged).toEqual(['c-1']);
  });

  it('honours the batch size', async () => {
    const small = new SignalConsumer(queue, { completeness, backfill }, { batchSize: 2 }, logger);
    for (let i = 0; i < 3; i++) {
      queue.add('completion', completionBody, `c-${i}`);
    }

    expect(await small.processBatch()).toEqual({ handled: 2, invalid: 0, failed: 0 });
    expect(queue.size()).toBe(1);
  });
});
