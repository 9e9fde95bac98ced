/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Helmet security headers
 * - Request ID tracking
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

/**
 * Generate and attach request ID for tracking
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const requestId = req.get('x-request-id')?.trim() || uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Security headers using Helmet. The API serves JSON only.
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'no-referrer' },
});
