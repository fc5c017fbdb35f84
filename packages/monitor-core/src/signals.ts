/**
 * Validation of inbound signals
 *
 * Signals arrive as snake_case JSON over HTTP or the message bus. Both entry
 * points validate through here and get the camelCase domain shape back.
 */

import { z } from 'zod';
import { CompletionSignal, GapSignal, Severity } from '@sentinel/shared-types';
import { isBusinessDate } from './dates';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: z.ZodIssue[];
}

const businessDate = z.string().refine(isBusinessDate, 'must be a YYYY-MM-DD date');

const CompletionSignalSchema = z.object({
  processor_name: z.string().min(1),
  game_date: businessDate,
  status: z.enum(['success', 'partial', 'failed']),
  rows_processed: z.number().int().nonnegative().default(0),
});

const GapSignalSchema = z
  .object({
    gap_type: z.string().min(1),
    detected_at: z.union([z.string().datetime({ offset: true }), z.date()]).transform((val) =>
      val instanceof Date ? val : new Date(val)
    ),
    source: z.string().min(1).default('unknown'),
    severity: z.nativeEnum(Severity).default(Severity.WARNING),
    game_ids: z.array(z.string().min(1)).optional(),
    game_dates: z.array(businessDate).optional(),
    team_abbrs: z.array(z.string().min(1)).optional(),
  })
  .refine(
    (signal) => (signal.game_ids?.length ?? 0) > 0 || (signal.game_dates?.length ?? 0) > 0,
    { message: 'at least one of game_ids or game_dates is required', path: ['game_ids'] }
  );

export const ManualBackfillSchema = z.object({
  gap_type: z.string().min(1),
  game_dates: z.array(businessDate).min(1),
});

export function validateCompletionSignal(data: unknown): ValidationResult<CompletionSignal> {
  const parsed = CompletionSignalSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: 'Validation failed', details: parsed.error.issues };
  }
  return {
    success: true,
    data: {
      processorName: parsed.data.processor_name,
      gameDate: parsed.data.game_date,
      status: parsed.data.status,
      rowsProcessed: parsed.data.rows_processed,
    },
  };
}

export function validateGapSignal(data: unknown, knownGapTypes: string[]): ValidationResult<GapSignal> {
  const parsed = GapSignalSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: 'Validation failed', details: parsed.error.issues };
  }
  if (!knownGapTypes.includes(parsed.data.gap_type)) {
    return {
      success: false,
      error: `Unknown gap_type: ${parsed.data.gap_type}. Expected one of: ${knownGapTypes.join(', ')}`,
    };
  }
  return {
    success: true,
    data: {
      gapType: parsed.data.gap_type,
      detectedAt: parsed.data.detected_at,
      source: parsed.data.source,
      severity: parsed.data.severity,
      gameIds: parsed.data.game_ids ?? [],
      gameDates: parsed.data.game_dates ?? [],
      teamAbbrs: parsed.data.team_abbrs ?? [],
    },
  };
}

export function validateManualBackfill(
  data: unknown,
  knownGapTypes: string[]
): ValidationResult<{ gapType: string; gameDates: string[] }> {
  const parsed = ManualBackfillSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: 'Validation failed', details: parsed.error.issues };
  }
  if (!knownGapTypes.includes(parsed.data.gap_type)) {
    return { success: false, error: `Unknown gap_type: ${parsed.data.gap_type}` };
  }
  return { success: true, data: { gapType: parsed.data.gap_type, gameDates: parsed.data.game_dates } };
}
