/**
 * =============================================================================
 * APPLICATION ERROR CLASSES
 * =============================================================================
 *
 * Standardized error handling for the entire application.
 *
 * USAGE:
 * ```typescript
 * // In a calculator
 * throw new InvalidInputError('distance must be greater than 0', { distance });
 *
 * // In a store
 * throw new PersistenceError('Failed to insert trip', error);
 * ```
 *
 * Command handlers convert every one of these into a structured failure
 * result; only ConfigurationError is allowed to stop the process.
 *
 * =============================================================================
 */

import { ErrorCode, HTTP_STATUS } from '../constants';

/**
 * Base Application Error
 * All custom errors extend this class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode | string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = HTTP_STATUS.INTERNAL_ERROR,
    code: ErrorCode | string = ErrorCode.INTERNAL_ERROR,
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);

    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);

    // Set prototype explicitly (TypeScript issue with extending Error)
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

// =============================================================================
// USER INPUT ERRORS
// =============================================================================

/**
 * Malformed command arguments (wrong token count, non-numeric token)
 */
export class ParseError extends AppError {
  constructor(
    message: string = 'Could not parse command arguments',
    details?: Record<string, unknown>
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.COMMAND_PARSE_ERROR, true, details);
  }
}

/**
 * Well-formed but semantically invalid values
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(
    message: string = 'Validation failed',
    errors: ValidationErrorDetail[] = [],
    code: ErrorCode | string = ErrorCode.VALIDATION_ERROR
  ) {
    super(message, HTTP_STATUS.BAD_REQUEST, code, true, { errors });
    this.errors = errors;
  }

  static fromZodError(zodError: { errors: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    const errors = zodError.errors.map(err => ({
      field: err.path.join('.'),
      message: err.message
    }));
    return new ValidationError(errors[0]?.message ?? 'Validation failed', errors);
  }
}

/**
 * A calculator was handed a divisor it cannot divide by
 */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.BAD_REQUEST, ErrorCode.VALIDATION_INVALID_INPUT, true, details);
  }
}

/**
 * 401 Unauthorized - webhook secret header missing or wrong
 */
export class UnauthorizedError extends AppError {
  constructor(
    message: string = 'Unauthorized',
    code: ErrorCode | string = ErrorCode.AUTH_WEBHOOK_SECRET_INVALID
  ) {
    super(message, HTTP_STATUS.UNAUTHORIZED, code, true);
  }
}

// =============================================================================
// SYSTEM ERRORS
// =============================================================================

/**
 * Storage layer failure (I/O, permissions, corruption)
 */
export class PersistenceError extends AppError {
  constructor(message: string = 'Storage operation failed', cause?: unknown) {
    super(
      message,
      HTTP_STATUS.INTERNAL_ERROR,
      ErrorCode.DATABASE_ERROR,
      true,
      cause instanceof Error ? { reason: cause.message } : undefined
    );
    this.cause = cause;
  }
}

/**
 * Missing or invalid configuration, detected at startup only
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, HTTP_STATUS.INTERNAL_ERROR, ErrorCode.CONFIGURATION_ERROR, false, details);
  }
}

// =============================================================================
// ERROR TYPE GUARDS
// =============================================================================

/**
 * Check if error is an operational (expected) error
 */
export function isOperationalError(error: unknown): error is AppError {
  return error instanceof AppError && error.isOperational;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isValidationError(error: unknown): error is ValidationError | InvalidInputError {
  return error instanceof ValidationError || error instanceof InvalidInputError;
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError;
}
