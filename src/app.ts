/**
 * =============================================================================
 * EXPRESS APPLICATION
 * =============================================================================
 *
 * Middleware chain and routes. No listening, no globals: everything comes in
 * through the application context and the loaded configuration.
 * =============================================================================
 */

import express from 'express';
import type { AppConfig } from './config/environment';
import type { AppContext } from './core/context';
import { createTelegramRouter } from './modules/telegram/telegram.routes';
import { createErrorHandler, notFoundHandler } from './shared/middleware/error.middleware';
import { requestLogger } from './shared/middleware/request-logger.middleware';
import { requestIdMiddleware, securityHeaders } from './shared/middleware/security.middleware';
import { createHealthRouter } from './shared/routes/health.routes';

interface CreateAppDeps {
  ctx: AppContext;
  config: Pick<AppConfig, 'isProduction' | 'telegram'>;
  uptimeSec: () => number;
}

export function createApp({ ctx, config, uptimeSec }: CreateAppDeps): express.Express {
  const app = express();

  // Trust the reverse proxy in front of the webhook (for req.ip)
  app.set('trust proxy', 1);

  app.use(requestIdMiddleware);
  app.use(securityHeaders);

  // Telegram updates are small; cap the body anyway
  app.use(express.json({ limit: '256kb' }));

  app.use(requestLogger);

  app.use('/', createHealthRouter({ store: ctx.store, now: ctx.clock, uptimeSec }));
  app.use('/', createTelegramRouter(ctx, { webhookSecret: config.telegram.webhookSecret }));

  app.use(notFoundHandler);
  app.use(createErrorHandler({ exposeMessages: !config.isProduction }));

  return app;
}
