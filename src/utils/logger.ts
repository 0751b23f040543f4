import winston from 'winston';
import type { LogLevel } from '../types/index.js';

const { combine, timestamp, json, printf, colorize } = winston.format;

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

const consoleFormat = logFormat === 'json'
  ? combine(timestamp(), json())
  : combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      printf(({ level, message, timestamp, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${level}]: ${message}${metaStr}`;
      })
    );

export const logger = winston.createLogger({
  level: logLevel,
  format: combine(timestamp(), json()),
  defaultMeta: { service: 'n8n-client' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
});

/**
 * Process-level logging setup, called by the CLI entry point only.
 * Applies the configured level and, in production, adds file transports
 * under logs/ in the working directory.
 */
export function configureLogger(
  level: LogLevel,
  env: NodeJS.ProcessEnv = process.env
): void {
  logger.level = level;

  if (env.NODE_ENV === 'production') {
    logger.add(
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error'
      })
    );
    logger.add(
      new winston.transports.File({
        filename: 'logs/combined.log'
      })
    );
  }
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

/**
 * Logger that drops every entry. Default hook of the API client and the
 * blueprint helpers.
 */
export function createSilentLogger(): winston.Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console()],
  });
}
