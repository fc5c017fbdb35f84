/**
 * Shared data model for the pipeline monitoring system
 *
 * Every package and service agrees on these shapes: completion records coming
 * out of the processors, the threshold table the detectors evaluate, alerts,
 * and the persisted backfill requests.
 */

/**
 * Severity - how loudly an alert should be routed
 *
 * - info: logged only
 * - warning: secondary channels (chat)
 * - critical: every channel (email + chat), also survives backfill mode
 */
export enum Severity {
  INFO = 'info',
  WARNING = 'warning',
  CRITICAL = 'critical',
}

/**
 * CheckStatus - outcome of evaluating one key against its thresholds
 *
 * OK < WARNING < CRITICAL are ordered. NO_DATA and ERROR are not part of that
 * order: NO_DATA means there was nothing to measure, ERROR means the
 * measurement itself failed. Neither may ever be reported as CRITICAL.
 */
export enum CheckStatus {
  OK = 'ok',
  WARNING = 'warning',
  CRITICAL = 'critical',
  NO_DATA = 'no_data',
  ERROR = 'error',
}

export type CompletionStatus = 'success' | 'partial' | 'failed';

/**
 * CompletionRecord - one processor reporting it finished a business date
 *
 * Append-only. Duplicates are harmless; readers take the latest record or the
 * set of processors seen inside a lookback window.
 */
export interface CompletionRecord {
  stageKey: string;
  businessDate: string; // YYYY-MM-DD
  processorName: string;
  completedAt: Date;
  status: CompletionStatus;
  rowsProcessed: number;
}

/**
 * 'above': higher is worse (age, lag). 'below': lower is worse (coverage).
 */
export type ThresholdDirection = 'above' | 'below';

/**
 * Hours of the day (UTC) in which a check is meaningful. A window that wraps
 * midnight has startHourUtc > endHourUtc.
 */
export interface ApplicabilityWindow {
  startHourUtc: number;
  endHourUtc: number;
}

export interface CheckConfig {
  description?: string;
  applicabilityWindow?: ApplicabilityWindow;
}

export interface ThresholdConfig extends CheckConfig {
  warningThreshold: number;
  criticalThreshold: number;
  direction: ThresholdDirection;
  /** Upstream key consulted when this key stalls */
  dependsOn?: string;
}

export interface AlertEvent {
  severity: Severity;
  title: string;
  message: string;
  category: string;
  context: Record<string, unknown>;
  timestamp: Date;
}

export interface AlertHistoryEntry {
  category: string;
  timestamp: Date;
}

export enum BackfillStatus {
  PENDING = 'pending',
  TRIGGERED = 'triggered',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * BackfillRequest - persisted record of one recovery attempt
 *
 * requestId is a content hash of the gap type and the sorted identifiers, so
 * the same gap reported twice maps to the same record.
 */
export interface BackfillRequest {
  requestId: string;
  gapType: string;
  status: BackfillStatus;
  createdAt: Date;
  updatedAt: Date;
  triggerAttempts: number;
  lastTriggerAt: Date | null;
  identifiers: string[];
  gameDates: string[];
  teamAbbrs: string[];
  source: string;
  severity: Severity;
  detectedAt: Date;
  completedAt: Date | null;
  error: string | null;
}

export interface CompletionSignal {
  processorName: string;
  gameDate: string;
  status: CompletionStatus;
  rowsProcessed: number;
}

export interface GapSignal {
  gapType: string;
  detectedAt: Date;
  source: string;
  severity: Severity;
  gameIds: string[];
  gameDates: string[];
  teamAbbrs: string[];
}

export interface CheckResult {
  key: string;
  status: CheckStatus;
  measuredValue: number | null;
  message: string;
  details?: Record<string, unknown>;
}

export interface CheckSummary {
  checkId: string;
  detector: string;
  businessDate: string;
  status: CheckStatus;
  results: CheckResult[];
  breaching: string[];
  alerted: boolean;
  checkedAt: Date;
}

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
