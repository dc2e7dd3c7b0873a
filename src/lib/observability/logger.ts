/**
 * Structured Logger using Winston
 * Supports correlation IDs, log levels, and file rotation
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { toError } from '../errors';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isProduction = nodeEnv === 'production';
const isTest = nodeEnv === 'test';
const level = process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug');

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
  isProduction
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, metadata }) => {
          const meta = (metadata ?? {}) as Record<string, unknown>;
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr}`;
        })
      )
);

const consoleTransport = new winston.transports.Console({
  level,
  silent: isTest,
});

// Rotated files only in production
const fileTransports: winston.transport[] = [];

if (isProduction) {
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d',
      format: winston.format.json(),
    })
  );

  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: winston.format.json(),
    })
  );
}

const logger = winston.createLogger({
  level,
  format: logFormat,
  transports: [consoleTransport, ...fileTransports],
  exitOnError: false,
});

export type LogContext = Record<string, unknown>;

/** Child logger tagging every line with the given correlation id (e.g. one per cycle). */
export function withCorrelationId(correlationId: string): winston.Logger {
  return logger.child({ correlationId });
}

export const logInfo = (message: string, context?: LogContext) => logger.info(message, context);

export const logWarn = (message: string, context?: LogContext) => logger.warn(message, context);

export const logError = (message: string, error?: unknown, context?: LogContext) => {
  const err = error === undefined ? undefined : toError(error);
  logger.error(message, {
    ...context,
    error: err
      ? {
          name: err.name,
          message: err.message,
          stack: err.stack,
        }
      : undefined,
  });
};

export const logDebug = (message: string, context?: LogContext) => logger.debug(message, context);

export default logger;
