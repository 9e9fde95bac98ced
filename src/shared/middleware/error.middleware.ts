/**
 * =============================================================================
 * ERROR HANDLING MIDDLEWARE
 * =============================================================================
 *
 * Centralized error handling for all routes.
 *
 * SECURITY:
 * - Stack traces never reach clients
 * - Internal error messages are hidden in production
 * - All errors are logged server-side
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { ErrorCode, HTTP_STATUS, getErrorCategory } from '../../core/constants';
import { AppError, isOperationalError } from '../../core/errors/AppError';
import { logger } from '../services/logger.service';

const GENERIC_MESSAGE = 'An unexpected error occurred. Please try again later.';

const ERROR_CODES = new Set<string>(Object.values(ErrorCode));

function isErrorCode(code: string): code is ErrorCode {
  return ERROR_CODES.has(code);
}

export interface ErrorResponseBody {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Status code and JSON body for an error that reached the end of the chain
 */
export function buildErrorResponse(
  error: Error,
  options: { exposeMessages: boolean }
): { statusCode: number; body: ErrorResponseBody } {
  if (error instanceof AppError) {
    return {
      statusCode: error.statusCode,
      body: {
        success: false,
        error: {
          code: error.code,
          message: isOperationalError(error) || options.exposeMessages ? error.message : GENERIC_MESSAGE,
          ...(error.details && { details: error.details })
        }
      }
    };
  }

  // body-parser rejects malformed JSON with a `status` of 400
  const statusCode = 'status' in error && error.status === HTTP_STATUS.BAD_REQUEST
    ? HTTP_STATUS.BAD_REQUEST
    : HTTP_STATUS.INTERNAL_ERROR;

  return {
    statusCode,
    body: {
      success: false,
      error: {
        code: statusCode === HTTP_STATUS.BAD_REQUEST ? ErrorCode.VALIDATION_ERROR : ErrorCode.INTERNAL_ERROR,
        message: options.exposeMessages ? error.message : GENERIC_MESSAGE
      }
    }
  };
}

/**
 * Global error handler middleware
 * Must be the last middleware in the chain
 */
export function createErrorHandler(options: { exposeMessages: boolean }) {
  return function errorHandler(
    error: Error,
    req: Request,
    res: Response,
    _next: NextFunction
  ): void {
    logger.error('Request error', {
      error: error.message,
      stack: error.stack,
      path: req.path,
      method: req.method,
      requestId: req.headers['x-request-id'],
      ...(error instanceof AppError && isErrorCode(error.code) ? { category: getErrorCategory(error.code) } : {})
    });

    const response = buildErrorResponse(error, options);
    res.status(response.statusCode).json(response.body);
  };
}

/**
 * Not found error handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(HTTP_STATUS.NOT_FOUND).json({
    success: false,
    error: {
      code: 'NOT_FOUND',
      message: `Cannot ${req.method} ${req.path}`
    }
  });
}
