/**
 * Inbound signals over HTTP. The worker consumes the same payloads from the
 * message bus; both paths validate through monitor-core.
 */

import { Router, Request, Response, NextFunction } from 'express';
import {
  validateCompletionSignal,
  validateGapSignal,
  type BackfillTrigger,
  type CompletenessChecker,
} from '@sentinel/monitor-core';
import type { Logger } from '@sentinel/logger';

export type CompletionHandler = Pick<CompletenessChecker, 'handleCompletion'>;
export type GapHandler = Pick<BackfillTrigger, 'handleGapSignal' | 'knownGapTypes'>;

export function createSignalRoutes(completeness: CompletionHandler, backfill: GapHandler, logger: Logger): Router {
  const router = Router();

  router.post('/completion', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateCompletionSignal(req.body);
    if (!validation.success || !validation.data) {
      logger.warn('Invalid completion signal', { error: validation.error });
      return res.status(400).json({
        success: false,
        error: validation.error,
        details: validation.details,
      });
    }

    try {
      const outcome = await completeness.handleCompletion(validation.data);
      return res.status(200).json({ success: true, outcome });
    } catch (error) {
      return next(error);
    }
  });

  router.post('/gap', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateGapSignal(req.body, backfill.knownGapTypes());
    if (!validation.success || !validation.data) {
      logger.warn('Invalid gap signal', { error: validation.error });
      return res.status(400).json({
        success: false,
        error: validation.error,
        details: validation.details,
      });
    }

    try {
      const outcome = await backfill.handleGapSignal(validation.data);
      return res.status(200).json({ success: true, outcome });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
