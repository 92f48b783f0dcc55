// Structured logging with configurable level and format

import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  level?: string;
  format?: 'json' | 'simple';
  defaultMeta?: Record<string, unknown>;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const format = options.format ?? 'json';

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      format === 'json'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple())
    ),
    defaultMeta: {
      service: 'scrapeq',
      ...options.defaultMeta,
    },
    transports: [new winston.transports.Console()],
  });
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: process.env.LOG_FORMAT === 'simple' ? 'simple' : 'json',
});

/** Ends the logger and resolves once its transports have flushed. */
export function flushLogger(target: Logger): Promise<void> {
  return new Promise((resolve) => {
    target.on('finish', () => resolve());
    target.end();
  });
}

export default logger;
