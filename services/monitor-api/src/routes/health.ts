import { Router, Request, Response } from 'express';
import type { Clock } from '@sentinel/shared-types';

export function createHealthRoutes(clock: Clock): Router {
  const router = Router();

  router.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: clock.now().toISOString(),
    });
  });

  return router;
}
