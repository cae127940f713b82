import { describe, expect, it } from 'vitest';

import { parseConfig } from '../env';

describe('parseConfig', () => {
  it('applies defaults', () => {
    const config = parseConfig({ BOT_TOKEN: 'test-token' });

    expect(config).toEqual({
      BOT_TOKEN: 'test-token',
      WEBHOOK_URL: undefined,
      WEBHOOK_SECRET: undefined,
      PORT: 8000,
      LOG_LEVEL: 'info',
      RELAY_DIRECT_URL: true,
      BOT_API_ROOT: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('parses every option', () => {
    const config = parseConfig({
      BOT_TOKEN: 'test-token',
      WEBHOOK_URL: 'https://bot.example.com/webhook',
      WEBHOOK_SECRET: 'test-secret',
      PORT: '9000',
      LOG_LEVEL: 'DEBUG',
      RELAY_DIRECT_URL: 'no',
    });

    expect(config).toMatchObject({
      WEBHOOK_URL: 'https://bot.example.com/webhook',
      WEBHOOK_SECRET: 'test-secret',
      PORT: 9000,
      LOG_LEVEL: 'debug',
      RELAY_DIRECT_URL: false,
    });
  });

  it('treats empty strings as unset', () => {
    expect(parseConfig({ BOT_TOKEN: 'test-token', WEBHOOK_URL: '', WEBHOOK_SECRET: '  ' })).toMatchObject({
      WEBHOOK_URL: undefined,
      WEBHOOK_SECRET: undefined,
    });
  });

  it('requires the bot token', () => {
    expect(() => parseConfig({})).toThrow('BOT_TOKEN missing in environment');
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ BOT_TOKEN: 'test-token', LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/);
    expect(() => parseConfig({ BOT_TOKEN: 'test-token', WEBHOOK_URL: 'not a url' })).toThrow(/WEBHOOK_URL/);
    expect(() => parseConfig({ BOT_TOKEN: 'test-token', PORT: 'abc' })).toThrow(/PORT/);
  });
});
