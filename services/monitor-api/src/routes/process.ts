/**
 * POST /process - run one detector, or all of them, for a business date
 *
 * Findings are a normal outcome and return 200 whatever their status. Only a
 * run that cannot complete (timeout, storage outage) is a 5xx.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { CheckSummary, worstStatus, type Clock } from '@sentinel/shared-types';
import {
  DETECTOR_NAMES,
  TimeoutError,
  isBusinessDate,
  isDetectorName,
  withTimeout,
  yesterday,
  type MonitorRuntime,
} from '@sentinel/monitor-core';
import type { Logger } from '@sentinel/logger';

export type DetectorRunner = Pick<MonitorRuntime, 'runDetector' | 'runAll'>;

const ProcessRequestSchema = z.object({
  detector: z
    .string()
    .refine((value) => value === 'all' || isDetectorName(value), {
      message: `must be "all" or one of: ${DETECTOR_NAMES.join(', ')}`,
    })
    .default('all'),
  date: z.string().refine(isBusinessDate, 'must be a YYYY-MM-DD date').optional(),
  alert: z.boolean().default(true),
});

export function createProcessRoutes(
  runner: DetectorRunner,
  runTimeoutMs: number,
  clock: Clock,
  logger: Logger
): Router {
  const router = Router();

  router.post('/process', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ProcessRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: 'Validation failed',
        details: parsed.error.issues,
      });
    }

    const { detector, alert } = parsed.data;
    const businessDate = parsed.data.date ?? yesterday(clock.now());

    try {
      if (detector === 'all') {
        const summaries = await withTimeout(runner.runAll(businessDate, { alert }), runTimeoutMs, 'run of all detectors');
        const status = worstStatus(summaries.map((summary) => summary.status));
        logger.info('Run finished', { detector, businessDate, status });
        return res.status(200).json({ success: true, status, businessDate, summary: summaries });
      }

      const summary: CheckSummary = await withTimeout(
        runner.runDetector(detector, businessDate, { alert }),
        runTimeoutMs,
        `${detector} run`
      );
      logger.info('Run finished', {
        detector,
        businessDate,
        status: summary.status,
        breaching: summary.breaching.length,
      });
      return res.status(200).json({ success: true, status: summary.status, businessDate, summary });
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.error('Run timed out', { detector, businessDate, timeoutMs: error.timeoutMs });
        return res.status(504).json({ success: false, error: error.message });
      }
      return next(error);
    }
  });

  return router;
}
