import { describe, it, expect } from 'vitest';
import { Severity } from '@sentinel/shared-types';
import { validateCompletionSignal, validateGapSignal, validateManualBackfill } from '../signals';

const KNOWN = ['boxscore', 'gamebook'];

describe('validateCompletionSignal', () => {
  it('maps a valid signal to the domain shape', () => {
    const result = validateCompletionSignal({
      processor_name: 'player_game_summary',
      game_date: '2024-03-09',
      status: 'success',
      rows_processed: 412,
    });

    expect(result).toEqual({
      success: true,
      data: { processorName: 'player_game_summary', gameDate: '2024-03-09', status: 'success', rowsProcessed: 412 },
    });
  });

  it('defaults rows_processed to zero', () => {
    const result = validateCompletionSignal({ processor_name: 'p', game_date: '2024-03-09', status: 'failed' });

    expect(result.data?.rowsProcessed).toBe(0);
  });

  it('rejects impossible dates', () => {
    const result = validateCompletionSignal({ processor_name: 'p', game_date: '2024-02-30', status: 'success' });

    expect(result.success).toBe(false);
    expect(result.details?.[0].path).toEqual(['game_date']);
  });
});

describe('validateGapSignal', () => {
  it('accepts a signal with game ids only and fills defaults', () => {
    const result = validateGapSignal(
      { gap_type: 'boxscore', detected_at: '2024-03-10T08:00:00Z', game_ids: ['g1'] },
      KNOWN
    );

    expect(result).toEqual({
      success: true,
      data: {
        gapType: 'boxscore',
        detectedAt: new Date('2024-03-10T08:00:00Z'),
        source: 'unknown',
        severity: Severity.WARNING,
        gameIds: ['g1'],
        gameDates: [],
        teamAbbrs: [],
      },
    });
  });

  it('requires game ids or game dates', () => {
    const result = validateGapSignal({ gap_type: 'boxscore', detected_at: '2024-03-10T08:00:00Z' }, KNOWN);

    expect(result.success).toBe(false);
    expect(result.details?.[0].message).toBe('at least one of game_ids or game_dates is required');
  });

  it('requires detected_at', () => {
    expect(validateGapSignal({ gap_type: 'boxscore', game_dates: ['2024-03-09'] }, KNOWN).success).toBe(false);
  });

  it('rejects unknown gap types', () => {
    const result = validateGapSignal(
      { gap_type: 'odds', detected_at: '2024-03-10T08:00:00Z', game_dates: ['2024-03-09'] },
      KNOWN
    );

    expect(result).toEqual({ success: false, error: 'Unknown gap_type: odds. Expected one of: boxscore, gamebook' });
  });

  it('rejects severities outside the known set', () => {
    const result = validateGapSignal(
      { gap_type: 'boxscore', detected_at: '2024-03-10T08:00:00Z', game_ids: ['g1'], severity: 'urgent' },
      KNOWN
    );

    expect(result.success).toBe(false);
  });
});

describe('validateManualBackfill', () => {
  it('needs at least one date', () => {
    expect(validateManualBackfill({ gap_type: 'boxscore', game_dates: [] }, KNOWN).success).toBe(false);
  });

  it('returns the gap type and dates', () => {
    expect(validateManualBackfill({ gap_type: 'gamebook', game_dates: ['2024-03-09'] }, KNOWN)).toEqual({
      success: true,
      data: { gapType: 'gamebook', gameDates: ['2024-03-09'] },
    });
  });
});
