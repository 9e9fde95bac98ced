/**
 * =============================================================================
 * LOGGER SERVICE
 * =============================================================================
 *
 * Centralized logging service using Winston.
 *
 * SECURITY:
 * - Never logs sensitive data (bot token, webhook secret)
 * - Sanitizes metadata before logging
 * - Level and file transports come from the loaded configuration
 * =============================================================================
 */

import winston from 'winston';
import type { AppConfig } from '../../config/environment';

// Level is upper-cased before colorize so the escape codes stay intact
const upperCaseLevel = winston.format((info) => {
  info.level = info.level.toUpperCase();
  return info;
});

const lineFormat = winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  // Add metadata if present (excluding sensitive fields)
  const sanitizedMeta = sanitizeLogData(meta);
  if (Object.keys(sanitizedMeta).length > 0) {
    log += ` ${JSON.stringify(sanitizedMeta)}`;
  }

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  return log;
});

// Plain format (files)
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  upperCaseLevel(),
  lineFormat
);

export const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  upperCaseLevel(),
  winston.format.colorize(),
  lineFormat
);

// Sensitive fields to never log
const SENSITIVE_FIELDS = [
  'token',
  'secret',
  'authorization',
  'password'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Remove sensitive fields from log data
 */
export function sanitizeLogData(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const isSensitive = SENSITIVE_FIELDS.some(field =>
      key.toLowerCase().includes(field)
    );

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeLogData(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

// Create logger instance
export const logger = winston.createLogger({
  level: 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({ format: consoleFormat })
  ]
});

/**
 * Apply the loaded configuration: log level, and file transports in production
 */
export function configureLogger(config: Pick<AppConfig, 'logLevel' | 'isProduction'>): void {
  logger.level = config.logLevel;

  if (config.isProduction) {
    logger.add(new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }));
    logger.add(new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: 5242880,
      maxFiles: 5
    }));
  }
}
