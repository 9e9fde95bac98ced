/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * The configuration is read once at process start, frozen, and handed to the
 * application context. Nothing reads it from a module-level global.
 *
 * SECURITY:
 * - BOT_TOKEN and TELEGRAM_WEBHOOK_SECRET are never logged
 * - Invalid configuration fails fast with a ConfigurationError
 * =============================================================================
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_GOAL_PER_KM } from '../core/constants';
import { ConfigurationError } from '../core/errors/AppError';

// Load .env file
dotenv.config();

// =============================================================================
// SCHEMA
// =============================================================================

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

/** Treat blank values as unset so `.default()` applies */
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
  NODE_ENV: z.preprocess(
    blankAsUndefined,
    z.enum(['development', 'test', 'production']).default('development')
  ),
  PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().min(1).max(65535).default(3000)
  ),
  LOG_LEVEL: z.preprocess(blankAsUndefined, z.enum(LOG_LEVELS).default('info')),
  BOT_TOKEN: z.preprocess(
    blankAsUndefined,
    z.string({ required_error: 'BOT_TOKEN is required' }).trim()
  ),
  TELEGRAM_WEBHOOK_SECRET: z.preprocess(
    blankAsUndefined,
    z.string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, 'TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and - (max 256)')
      .optional()
  ),
  DATABASE_PATH: z.preprocess(
    blankAsUndefined,
    z.string().trim().default('data/trip_tracker.db')
  ),
  GOAL_PER_KM: z.preprocess(
    blankAsUndefined,
    z.coerce.number()
      .finite('GOAL_PER_KM must be a number')
      .positive('GOAL_PER_KM must be greater than 0')
      .default(DEFAULT_GOAL_PER_KM)
  )
});

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export type NodeEnv = 'development' | 'test' | 'production';
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly isProduction: boolean;

  readonly telegram: {
    readonly botToken: string;
    readonly webhookSecret?: string;
  };

  readonly database: {
    readonly path: string;
  };

  /** Fare-per-km threshold used to flag trips and aggregates */
  readonly goalPerKm: number;
}

/**
 * Build the application configuration from an environment map.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigurationError(
      `Configuration Errors:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      { variables: parsed.error.errors.map(err => err.path.join('.')) }
    );
  }

  const values = parsed.data;

  return Object.freeze({
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    isProduction: values.NODE_ENV === 'production',
    telegram: Object.freeze({
      botToken: values.BOT_TOKEN,
      webhookSecret: values.TELEGRAM_WEBHOOK_SECRET
    }),
    database: Object.freeze({
      path: values.DATABASE_PATH
    }),
    goalPerKm: values.GOAL_PER_KM
  });
}
