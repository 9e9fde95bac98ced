/**
 * Register the bot's webhook with the Telegram Bot API.
 *
 * Usage:
 *   WEBHOOK_URL=https://bot.example.com/telegram/webhook npm run set-webhook   (after npm run build)
 *
 * Reads BOT_TOKEN and TELEGRAM_WEBHOOK_SECRET through the same configuration
 * loader as the server.
 */

import { loadConfig } from '../config/environment';
import { TELEGRAM_WEBHOOK_PATH } from '../modules/telegram/telegram.routes';

const webhookUrl = (process.env.WEBHOOK_URL || '').trim();

if (!webhookUrl) {
  throw new Error('WEBHOOK_URL is required');
}

if (!webhookUrl.startsWith('https://')) {
  throw new Error('WEBHOOK_URL must use https');
}

if (!new URL(webhookUrl).pathname.endsWith(TELEGRAM_WEBHOOK_PATH)) {
  console.warn(`[set-webhook] WEBHOOK_URL does not end with ${TELEGRAM_WEBHOOK_PATH}; updates may not reach the bot`);
}

async function main(): Promise<void> {
  const config = loadConfig();

  const response = await fetch(`https://api.telegram.org/bot${config.telegram.botToken}/setWebhook`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({
      url: webhookUrl,
      allowed_updates: ['message'],
      drop_pending_updates: false,
      ...(config.telegram.webhookSecret ? { secret_token: config.telegram.webhookSecret } : {})
    })
  });

  const body = await response.text();
  if (!response.ok) {
    console.error(`[set-webhook] failed (${response.status}): ${body}`);
    process.exit(1);
  }

  console.log(`[set-webhook] webhook set to ${webhookUrl}: ${body}`);
}

main().catch((error: unknown) => {
  console.error('[set-webhook] failed', error);
  process.exit(1);
});
