/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Easy to find and modify values
 * - Type safety with enums
 *
 * =============================================================================
 */

// =============================================================================
// PROFITABILITY DEFAULTS
// =============================================================================

/** Default fare-per-km goal when GOAL_PER_KM is not configured */
export const DEFAULT_GOAL_PER_KM = 350;

export const MINUTES_PER_HOUR = 60;

/** Trailing window for /week, today included */
export const WEEK_WINDOW_DAYS = 7;

/** Literal argument that unlocks /reset */
export const RESET_CONFIRMATION_TOKEN = 'confirm';

// =============================================================================
// BOT COMMANDS
// =============================================================================

export enum BotCommand {
  START = 'start',
  ADD = 'add',
  STATS = 'stats',
  WEEK = 'week',
  RESET = 'reset'
}

// =============================================================================
// HTTP STATUS CODES (for consistency)
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  NOT_FOUND: 404,
  INTERNAL_ERROR: 500,
  SERVICE_UNAVAILABLE: 503
} as const;

// =============================================================================
// ERROR CODES (Hierarchical Structure)
// =============================================================================
/**
 * Application-specific error codes
 *
 * - 1xxx: Authentication (webhook secret)
 * - 2xxx: Validation & command parsing
 * - 9xxx: System/Infrastructure errors
 */
export enum ErrorCode {
  // =============================================================================
  // AUTHENTICATION (1xxx)
  // =============================================================================
  AUTH_WEBHOOK_SECRET_INVALID = 'AUTH_1001',

  // =============================================================================
  // VALIDATION & PARSING (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',
  VALIDATION_INVALID_INPUT = 'VAL_2002',
  VALIDATION_UPDATE_INVALID = 'VAL_2003',
  COMMAND_PARSE_ERROR = 'CMD_2101',
  COMMAND_UNKNOWN = 'CMD_2102',

  // =============================================================================
  // SYSTEM & INFRASTRUCTURE (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001',
  DATABASE_ERROR = 'SYS_9004',
  CONFIGURATION_ERROR = 'SYS_9101'
}

/**
 * Error category for grouping in logs
 */
export enum ErrorCategory {
  AUTH = 'authentication',
  VALIDATION = 'validation',
  SYSTEM = 'system'
}

export const ERROR_CATEGORY_MAP: Record<string, ErrorCategory> = {
  'AUTH_': ErrorCategory.AUTH,
  'VAL_': ErrorCategory.VALIDATION,
  'CMD_': ErrorCategory.VALIDATION,
  'SYS_': ErrorCategory.SYSTEM
};

/**
 * Get error category from error code
 */
export function getErrorCategory(errorCode: ErrorCode): ErrorCategory {
  const prefix = errorCode.split('_')[0] + '_';
  return ERROR_CATEGORY_MAP[prefix] || ErrorCategory.SYSTEM;
}
