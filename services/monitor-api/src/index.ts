/**
 * Monitor API service
 *
 * HTTP entry points for scheduled and ad hoc detector runs, inbound
 * completion and gap signals, and backfill administration.
 */

import { createServer } from 'node:http';
import { loadEnvConfig, loadMonitoringConfig, MonitorRuntime } from '@sentinel/monitor-core';
import { createLogger, errorMessage } from '@sentinel/logger';
import { createApp } from './app';

const logger = createLogger('monitor-api');

async function main() {
  const env = loadEnvConfig();
  const config = loadMonitoringConfig();

  const runtime = new MonitorRuntime(env, config, { logger });
  await runtime.initialize();

  const app = createApp({
    runner: runtime,
    completeness: runtime.completeness,
    backfill: runtime.backfill,
    runTimeoutMs: env.RUN_TIMEOUT_MS,
    logger,
  });

  const server = createServer(app);
  server.listen(env.PORT, () => {
    logger.info('Monitor API started', {
      port: env.PORT,
      env: process.env.NODE_ENV || 'development',
    });
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    logger.error('Server error', { error: err.message, code: err.code });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    server.close();
    runtime
      .close()
      .catch((error) => logger.error('Error during shutdown', { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error('Fatal error starting server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
