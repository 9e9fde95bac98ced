/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per finished request. Webhook requests carry the Telegram
 * update_id so a reply can be traced back to the update that caused it.
 *
 * SECURITY:
 * - Does not log request bodies (chat messages)
 * - Does not log the webhook secret header
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

export interface FinishedRequest {
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  requestId?: string | string[];
  ip?: string;
  body: unknown;
}

export interface RequestLogEntry {
  level: 'error' | 'warn' | 'info';
  message: string;
  data: Record<string, unknown>;
}

function telegramUpdateId(body: unknown): number | undefined {
  if (typeof body !== 'object' || body === null || !('update_id' in body)) {
    return undefined;
  }
  return typeof body.update_id === 'number' ? body.update_id : undefined;
}

export function buildRequestLogEntry(request: FinishedRequest): RequestLogEntry {
  const updateId = telegramUpdateId(request.body);
  const data: Record<string, unknown> = {
    method: request.method,
    path: request.path,
    status: request.statusCode,
    duration: `${request.durationMs}ms`,
    requestId: request.requestId,
    ip: request.ip,
    ...(updateId === undefined ? {} : { updateId })
  };

  if (request.statusCode >= 500) {
    return { level: 'error', message: 'Request failed', data };
  }
  if (request.statusCode >= 400) {
    return { level: 'warn', message: 'Request error', data };
  }
  return {
    level: 'info',
    message: updateId === undefined ? 'Request completed' : 'Telegram update handled',
    data
  };
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const entry = buildRequestLogEntry({
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: Date.now() - startTime,
      requestId: req.headers['x-request-id'],
      ip: req.ip,
      body: req.body
    });

    logger.log(entry.level, entry.message, entry.data);
  });

  next();
}
