/**
 * Monitor worker service
 *
 * Runs the detectors on a fixed cadence and consumes completion and gap
 * signals from RabbitMQ.
 */

import { loadEnvConfig, loadMonitoringConfig, MonitorRuntime } from '@sentinel/monitor-core';
import { createLogger, errorMessage } from '@sentinel/logger';
import { createSignalQueue } from './queue';
import { SignalConsumer } from './consumer';
import { MonitorScheduler } from './scheduler';

const logger = createLogger('monitor-worker');

async function main() {
  logger.info('Starting monitor worker...');

  const env = loadEnvConfig();
  const config = loadMonitoringConfig();

  const runtime = new MonitorRuntime(env, config, { logger });
  await runtime.initialize();
  runtime.alerts.startAutoFlush(env.ALERT_FLUSH_INTERVAL_MS);

  const queue = createSignalQueue(env.SIGNAL_QUEUE, runtime.amqp, logger);
  logger.info('Signal queue initialized', { type: env.SIGNAL_QUEUE });

  const consumer = new SignalConsumer(
    queue,
    { completeness: runtime.completeness, backfill: runtime.backfill },
    { pollIntervalMs: env.SIGNAL_POLL_INTERVAL_MS },
    logger
  );
  const scheduler = new MonitorScheduler(
    runtime,
    runtime.alerts,
    { intervalMs: env.SCHEDULE_INTERVAL_MS, runTimeoutMs: env.RUN_TIMEOUT_MS },
    { logger }
  );

  consumer.start();
  scheduler.start();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully`);
    consumer.stop();
    scheduler.stop();
    queue
      .close()
      .then(() => runtime.close())
      .catch((error) => logger.error('Error during shutdown', { error: errorMessage(error) }))
      .finally(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error) => {
  logger.error('Fatal error starting worker', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
