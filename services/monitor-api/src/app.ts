/**
 * express application for the monitor API. Built from its collaborators so
 * tests can mount it over in-process fakes.
 */

import express from 'express';
import { systemClock, type Clock } from '@sentinel/shared-types';
import { createLogger, type Logger } from '@sentinel/logger';
import { createHealthRoutes } from './routes/health';
import { createProcessRoutes, type DetectorRunner } from './routes/process';
import { createSignalRoutes, type CompletionHandler, type GapHandler } from './routes/signals';
import { createBackfillRoutes, type BackfillAdmin } from './routes/backfills';

export interface AppDeps {
  runner: DetectorRunner;
  completeness: CompletionHandler;
  backfill: GapHandler & BackfillAdmin;
  runTimeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

export function createApp(deps: AppDeps): express.Express {
  const clock = deps.clock ?? systemClock;
  const logger = deps.logger ?? createLogger('monitor-api');
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    logger.debug('Incoming request', {
      method: req.method,
      path: req.path,
    });
    next();
  });

  app.use('/', createHealthRoutes(clock));
  app.use('/', createProcessRoutes(deps.runner, deps.runTimeoutMs, clock, logger));
  app.use('/signals', createSignalRoutes(deps.completeness, deps.backfill, logger));
  app.use('/backfills', createBackfillRoutes(deps.backfill, logger));

  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      logger.error('Unhandled error', {
        error: err.message,
        stack: err.stack,
        path: req.path,
      });

      res.status(500).json({
        success: false,
        error: 'Internal server error',
      });
    }
  );

  return app;
}
