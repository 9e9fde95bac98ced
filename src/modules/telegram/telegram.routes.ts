import { timingSafeEqual } from 'crypto';
import { Router, Request, Response } from 'express';
import { ErrorCode, HTTP_STATUS } from '../../core/constants';
import type { AppContext } from '../../core/context';
import { AppError, UnauthorizedError, ValidationError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { telegramUpdateSchema, type SendMessageReply } from './telegram.schema';
import { telegramService } from './telegram.service';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';
export const SECRET_TOKEN_HEADER = 'x-telegram-bot-api-secret-token';

interface WebhookRequest {
  ctx: AppContext;
  payload: unknown;
  secretHeader: string | undefined;
  webhookSecret: string | undefined;
}

export type WebhookResponse =
  | { statusCode: 200; body: SendMessageReply | null }
  | { statusCode: number; body: { success: false; error: { code: string; message: string } } };

function secretMatches(expected: string, received: string | undefined): boolean {
  if (received === undefined) return false;

  const expectedBuffer = Buffer.from(expected);
  const receivedBuffer = Buffer.from(received);
  return expectedBuffer.length === receivedBuffer.length && timingSafeEqual(expectedBuffer, receivedBuffer);
}

function errorResponse(error: AppError): WebhookResponse {
  return {
    statusCode: error.statusCode,
    body: { success: false, error: { code: error.code, message: error.message } }
  };
}

/**
 * Check the secret header, validate the update, run the command.
 * Kept free of Express so it can be exercised directly.
 */
export function processWebhookRequest({ ctx, payload, secretHeader, webhookSecret }: WebhookRequest): WebhookResponse {
  if (webhookSecret !== undefined && !secretMatches(webhookSecret, secretHeader)) {
    logger.warn('[TELEGRAM] Webhook call with missing or wrong secret token');
    return errorResponse(new UnauthorizedError('Invalid webhook secret token'));
  }

  const parsed = telegramUpdateSchema.safeParse(payload);
  if (!parsed.success) {
    const error = ValidationError.fromZodError(parsed.error);
    return errorResponse(new ValidationError(error.message, error.errors, ErrorCode.VALIDATION_UPDATE_INVALID));
  }

  return {
    statusCode: HTTP_STATUS.OK,
    body: telegramService.handleUpdate(ctx, parsed.data)
  };
}

// =============================================================================
// POST /telegram/webhook — Telegram delivers one Update per request
// =============================================================================
export function createTelegramRouter(ctx: AppContext, options: { webhookSecret?: string }): Router {
  const router = Router();

  router.post(TELEGRAM_WEBHOOK_PATH, (req: Request, res: Response) => {
    const result = processWebhookRequest({
      ctx,
      payload: req.body,
      secretHeader: req.get(SECRET_TOKEN_HEADER),
      webhookSecret: options.webhookSecret
    });

    if (result.body === null) {
      res.sendStatus(result.statusCode);
      return;
    }

    res.status(result.statusCode).json(result.body);
  });

  return router;
}
