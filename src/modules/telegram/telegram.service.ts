/**
 * =============================================================================
 * TELEGRAM MODULE - SERVICE
 * =============================================================================
 *
 * Turns a Telegram update into a command invocation and the command result
 * into a sendMessage reply. Storage failures are logged here, the user only
 * sees a generic message.
 * =============================================================================
 */

import type { AppContext } from '../../core/context';
import { logger } from '../../shared/services/logger.service';
import { commandService } from '../commands/commands.service';
import { formatCommandResult } from '../commands/commands.formatter';
import { parseCommandText, type SendMessageReply, type TelegramUpdate } from './telegram.schema';

export const telegramService = {

  /**
   * Handle one update. Returns null when there is nothing to answer
   * (no message, no sender, or plain text that is not a command).
   */
  handleUpdate(ctx: AppContext, update: TelegramUpdate): SendMessageReply | null {
    const message = update.message;
    if (!message?.text || !message.from) {
      return null;
    }

    const command = parseCommandText(message.text);
    if (!command) {
      return null;
    }

    const sender = message.from;
    const result = commandService.execute(ctx, command.name, {
      userId: sender.id,
      userName: sender.username ?? sender.first_name,
      args: command.args
    });

    if (!result.ok && (result.error.kind === 'persistence' || result.error.kind === 'internal')) {
      logger.error('[TELEGRAM] Command failed', {
        command: command.name,
        userId: sender.id,
        updateId: update.update_id,
        code: result.error.code,
        error: result.error.message,
        stack: result.cause instanceof Error ? result.cause.stack?.substring(0, 300) : undefined
      });
    } else {
      logger.debug('[TELEGRAM] Command handled', {
        command: command.name,
        userId: sender.id,
        ok: result.ok
      });
    }

    return {
      method: 'sendMessage',
      chat_id: message.chat.id,
      text: formatCommandResult(result),
      parse_mode: 'Markdown'
    };
  }
};
