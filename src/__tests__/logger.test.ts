/**
 * =============================================================================
 * LOGGER SERVICE — Format & Sanitization Tests
 * =============================================================================
 */

import { configureLogger, consoleFormat, logger, sanitizeLogData } from '../shared/services/logger.service';

const LEVEL = Symbol.for('level');
const MESSAGE = Symbol.for('message');

/** Run the console format the way a winston logger would and return the printed line */
function renderConsoleLine(level: string, message: string, meta: Record<string, unknown> = {}): unknown {
  const info = { ...meta, level, message };
  Reflect.set(info, LEVEL, level);

  const output = consoleFormat.transform(info);
  if (typeof output === 'boolean') {
    throw new Error('console format dropped the entry');
  }
  return Reflect.get(output, MESSAGE);
}

describe('sanitizeLogData', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(sanitizeLogData({
      botToken: 'test-token',
      userId: 42,
      telegram: { webhookSecret: 'test-secret', chatId: 7 },
      headers: { Authorization: 'Bearer test-token' }
    })).toEqual({
      botToken: '[REDACTED]',
      userId: 42,
      telegram: { webhookSecret: '[REDACTED]', chatId: 7 },
      headers: { Authorization: '[REDACTED]' }
    });
  });

  it('leaves arrays and primitives untouched', () => {
    expect(sanitizeLogData({ ids: [1, 2], note: 'ok', missing: null })).toEqual({ ids: [1, 2], note: 'ok', missing: null });
  });
});

describe('consoleFormat', () => {
  it('colors the upper-cased level without altering the escape codes', () => {
    expect(renderConsoleLine('info', 'Trip recorded')).toEqual(
      expect.stringContaining('[\u001b[32mINFO\u001b[39m]: Trip recorded')
    );
    expect(renderConsoleLine('error', 'Database ping failed')).toEqual(
      expect.stringContaining('[\u001b[31mERROR\u001b[39m]: Database ping failed')
    );
  });

  it('appends sanitized metadata as JSON', () => {
    expect(renderConsoleLine('warn', 'Webhook rejected', { botToken: 'test-token', userId: 7 })).toEqual(
      expect.stringMatching(/\]: Webhook rejected \{"botToken":"\[REDACTED\]","userId":7\}$/)
    );
  });
});

describe('configureLogger', () => {
  it('applies the configured level', () => {
    configureLogger({ logLevel: 'warn', isProduction: false });

    expect(logger.level).toBe('warn');
  });
});
