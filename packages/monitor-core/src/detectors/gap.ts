/**
 * GapDetector - raw files that never made it into the warehouse
 *
 * Compares the blob count under a date-scoped prefix with the warehouse row
 * count for the same date. Only "blob present, warehouse empty" is a real
 * processing gap; the reverse is usually blob retention cleanup.
 */

import {
  CheckResult,
  CheckStatus,
  CheckSummary,
  GapSignal,
  Severity,
  type Clock,
  systemClock,
} from '@sentinel/shared-types';
import { createLogger, errorMessage, type Logger } from '@sentinel/logger';
import type { GapSourceConfig } from '../config';
import { resolvePrefix } from '../s3';
import {
  ThresholdDetector,
  type AlertSender,
  type CheckAllOptions,
  type Classification,
  type Detector,
  type DetectorOptions,
} from './ThresholdDetector';

export enum GapKind {
  WAREHOUSE_MISSING = 'no_bq',
  BLOB_MISSING = 'no_gcs',
  BOTH_EMPTY = 'no_data',
  NONE = 'none',
}

export interface GapClassification {
  gapType: GapKind;
  hasGap: boolean;
}

export function classifyGap(blobCount: number, warehouseCount: number): GapClassification {
  if (blobCount > 0 && warehouseCount === 0) {
    return { gapType: GapKind.WAREHOUSE_MISSING, hasGap: true };
  }
  if (blobCount === 0 && warehouseCount > 0) {
    return { gapType: GapKind.BLOB_MISSING, hasGap: false };
  }
  if (blobCount === 0 && warehouseCount === 0) {
    return { gapType: GapKind.BOTH_EMPTY, hasGap: false };
  }
  return { gapType: GapKind.NONE, hasGap: false };
}

export interface GapSources {
  blobs: { countObjects(prefix: string): Promise<number> };
  warehouse: { countRowsForDate(table: string, dateColumn: string, businessDate: string): Promise<number> };
}

export interface GapSink {
  handleGapSignal(signal: GapSignal): Promise<unknown>;
}

function classifyPair(key: string, blobCount: number, warehouseCount: number, config: GapSourceConfig): Classification {
  const { gapType, hasGap } = classifyGap(blobCount, warehouseCount);
  const counts = `${blobCount} files, ${warehouseCount} rows`;
  const details = { gapType, hasGap, blobCount, warehouseCount, table: config.table };

  switch (gapType) {
    case GapKind.WAREHOUSE_MISSING:
      return {
        status: config.severity === Severity.CRITICAL ? CheckStatus.CRITICAL : CheckStatus.WARNING,
        message: `${key}: raw files not processed into ${config.table} (${counts})`,
        details,
      };
    case GapKind.BLOB_MISSING:
      return { status: CheckStatus.OK, message: `${key}: raw files already cleaned up (${counts})`, details };
    case GapKind.BOTH_EMPTY:
      return { status: CheckStatus.NO_DATA, message: `${key}: no files and no rows`, details };
    default:
      return { status: CheckStatus.OK, message: `${key}: ${counts}`, details };
  }
}

export interface GapDetectorOptions extends DetectorOptions {
  sink?: GapSink;
}

export class GapDetector implements Detector {
  readonly detector: ThresholdDetector<GapSourceConfig>;
  private clock: Clock;
  private logger: Logger;
  private sink?: GapSink;

  constructor(
    sources: GapSources,
    alerts: AlertSender,
    private readonly checks: Record<string, GapSourceConfig>,
    options: GapDetectorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('detector:gaps');
    this.sink = options.sink;

    this.detector = new ThresholdDetector<GapSourceConfig>(
      {
        name: 'gaps',
        title: 'Processing gaps',
        category: 'gaps',
        unit: 'files',
        checks,
        fetch: async (_key, config, businessDate) => ({
          value: await sources.blobs.countObjects(resolvePrefix(config.blobPrefix, businessDate)),
        }),
        strategy: {
          kind: 'two-source',
          fetchSecondary: async (_key, config, businessDate) => ({
            value: await sources.warehouse.countRowsForDate(config.table, config.dateColumn, businessDate),
          }),
          classify: (key, blobs, rows, config) => classifyPair(key, blobs.value, rows.value, config),
        },
      },
      alerts,
      { ...options, clock: this.clock, logger: this.logger }
    );
  }

  get name(): string {
    return this.detector.name;
  }

  keys(): string[] {
    return this.detector.keys();
  }

  checkOne(key: string, businessDate: string): Promise<CheckResult> {
    return this.detector.checkOne(key, businessDate);
  }

  /**
   * Runs every source and, when a sink is wired, hands each genuine gap to
   * it as a date-scoped gap signal.
   */
  async checkAll(businessDate: string, options: CheckAllOptions = {}): Promise<CheckSummary> {
    const summary = await this.detector.checkAll(businessDate, options);
    if (!this.sink) {
      return summary;
    }

    for (const result of summary.results) {
      if (result.details?.gapType !== GapKind.WAREHOUSE_MISSING) {
        continue;
      }
      const config = this.checks[result.key];
      if (!config) {
        continue;
      }
      try {
        await this.sink.handleGapSignal({
          gapType: config.gapType,
          detectedAt: this.clock.now(),
          source: 'gap_detector',
          severity: config.severity,
          gameIds: [],
          gameDates: [businessDate],
          teamAbbrs: [],
        });
      } catch (error) {
        this.logger.error('Failed to publish gap signal', {
          key: result.key,
          gapType: config.gapType,
          error: errorMessage(error),
        });
      }
    }
    return summary;
  }
}
