/**
 * CLI entry point. Exit code: 0 healthy, 1 warning or error, 2 critical.
 */

import pc from 'picocolors';
import { loadEnvConfig, loadMonitoringConfig, MonitorRuntime } from '@sentinel/monitor-core';
import { createLogger, errorMessage } from '@sentinel/logger';
import { runCli } from './program';
import { EXIT_CRITICAL } from './report';

// Keep stdout for results; only warnings and errors are logged unless asked
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'warn';

const logger = createLogger('sentinel-cli');

runCli(process.argv.slice(2), {
  createRuntime: async (options) => {
    const runtime = new MonitorRuntime(loadEnvConfig(), loadMonitoringConfig(), { ...options, logger });
    await runtime.initialize();
    return runtime;
  },
  io: {
    out: (text) => process.stdout.write(text),
    err: (text) => process.stderr.write(text),
  },
  color: pc.isColorSupported,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Check run failed', { error: errorMessage(error) });
    process.exitCode = EXIT_CRITICAL;
  });
