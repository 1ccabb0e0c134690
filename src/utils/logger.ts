import winston from 'winston';
import { config } from '../config/environment';

// Keys whose values never reach a log line
const SENSITIVE_FIELDS = ['password', 'token', 'secret', 'authorization', 'apikey'];

export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const lowered = key.toLowerCase();
    if (SENSITIVE_FIELDS.some(field => lowered.includes(field))) {
      sanitized[key] = '[REDACTED]';
    } else if (value instanceof Date || Array.isArray(value)) {
      sanitized[key] = value;
    } else if (typeof value === 'object' && value !== null) {
      sanitized[key] = sanitizeLogData(Object.fromEntries(Object.entries(value)));
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

const upperCaseLevel = winston.format(info => {
  info.level = info.level.toUpperCase();
  return info;
});

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
    let line = `${timestamp} [${level}]: ${message}`;

    const sanitizedMeta = sanitizeLogData(meta);
    if (Object.keys(sanitizedMeta).length > 0) {
      line += ` ${JSON.stringify(sanitizedMeta)}`;
    }
    if (stack) {
      line += `\n${stack}`;
    }
    return line;
  })
);

// Level is upper-cased before colorize wraps it in escape codes
export const consoleFormat = winston.format.combine(upperCaseLevel(), winston.format.colorize(), logFormat);

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.isTest,
  transports: [new winston.transports.Console({ format: consoleFormat })]
});

export const logInfo = (message: string, meta?: Record<string, unknown>) =>
  logger.info(message, meta);

export const logWarn = (message: string, meta?: Record<string, unknown>) =>
  logger.warn(message, meta);

export const logError = (message: string, error?: unknown) => {
  if (error instanceof Error) {
    logger.error(message, { error: error.message, stack: error.stack });
  } else {
    logger.error(message, { error });
  }
};
