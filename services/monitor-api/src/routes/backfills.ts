import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BackfillStatus } from '@sentinel/shared-types';
import { validateManualBackfill, type BackfillTrigger } from '@sentinel/monitor-core';
import type { Logger } from '@sentinel/logger';

export type BackfillAdmin = Pick<
  BackfillTrigger,
  'listRequests' | 'getRequest' | 'manualTrigger' | 'knownGapTypes'
>;

const ListQuerySchema = z.object({
  status: z.nativeEnum(BackfillStatus).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export function createBackfillRoutes(backfill: BackfillAdmin, logger: Logger): Router {
  const router = Router();

  /**
   * GET /backfills?status=failed&limit=20 - newest first
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = ListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        success: false,
        error: 'Validation failed',
        details: parsed.error.issues,
      });
    }

    try {
      const requests = await backfill.listRequests(parsed.data);
      return res.json({ success: true, count: requests.length, requests });
    } catch (error) {
      return next(error);
    }
  });

  router.get('/:requestId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = await backfill.getRequest(req.params.requestId);
      if (!request) {
        return res.status(404).json({
          success: false,
          error: `Backfill request not found: ${req.params.requestId}`,
        });
      }
      return res.json({ success: true, request });
    } catch (error) {
      return next(error);
    }
  });

  router.post('/manual', async (req: Request, res: Response, next: NextFunction) => {
    const validation = validateManualBackfill(req.body, backfill.knownGapTypes());
    if (!validation.success || !validation.data) {
      return res.status(400).json({
        success: false,
        error: validation.error,
        details: validation.details,
      });
    }

    try {
      const { gapType, gameDates } = validation.data;
      const outcome = await backfill.manualTrigger(gameDates, gapType);
      logger.info('Manual backfill requested', { gapType, gameDates, action: outcome.action });
      return res.status(200).json({ success: true, outcome });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
