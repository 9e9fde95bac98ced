import { z } from 'zod';

// =============================================================================
// TELEGRAM UPDATE SCHEMAS
// =============================================================================
// Only the fields the bot reads. Unknown keys are stripped.

export const telegramUserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().optional(),
  first_name: z.string(),
  username: z.string().optional()
});

export const telegramMessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({
    id: z.number().int()
  }),
  from: telegramUserSchema.optional(),
  text: z.string().optional()
});

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: telegramMessageSchema.optional()
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;
export type TelegramMessage = z.infer<typeof telegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

/**
 * Webhook reply: a Bot API method call returned as the response body
 */
export interface SendMessageReply {
  method: 'sendMessage';
  chat_id: number;
  text: string;
  parse_mode: 'Markdown';
}

// =============================================================================
// COMMAND TEXT
// =============================================================================

/** "/add@SomeBot 5200 14 28" -> name "add", args "5200 14 28" */
const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/;

export interface ParsedCommandText {
  name: string;
  args: string;
}

export function parseCommandText(text: string): ParsedCommandText | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) return null;

  return {
    name: match[1].toLowerCase(),
    args: (match[2] ?? '').trim()
  };
}
