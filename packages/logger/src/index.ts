/**
 * Structured logger shared by every service
 *
 * JSON lines in production so log shippers can index the metadata; a
 * colourised single line everywhere else. Call sites pass a message and a
 * metadata object: logger.info('Run finished', { detector, status }).
 */

import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  json?: boolean;
  silent?: boolean;
}

const devFormat = winston.format.printf(({ level, message, timestamp, service, ...meta }) => {
  const rest = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${rest}`;
});

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const json = options.json ?? process.env.NODE_ENV === 'production';

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    silent: options.silent ?? process.env.LOG_SILENT === 'true',
    defaultMeta: { service },
    format: json
      ? winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.json()
        )
      : winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
          winston.format.colorize(),
          devFormat
        ),
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
