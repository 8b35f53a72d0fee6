import { validateEnv } from './env.schema';

const VALID_ENV = {
  TELEGRAM_BOT_TOKEN: 'test-token',
  WEBHOOK_BASE_URL: 'https://relay.example.com',
  RELAY_AUTHORIZED_CHAT_ID: '1001',
  RELAY_CHANNEL_ID: '@test_channel',
};

describe('validateEnv', () => {
  test('accepts a complete environment', () => {
    const env = validateEnv({ ...VALID_ENV, RELAY_PACING_MS: '500' });

    expect(env.TELEGRAM_BOT_TOKEN).toBe('test-token');
    expect(env.RELAY_PACING_MS).toBe('500');
  });

  test('keeps unrelated variables', () => {
    const env = validateEnv({ ...VALID_ENV, HOME: '/root' });

    expect(env.HOME).toBe('/root');
  });

  test('accepts numeric channel ids', () => {
    expect(() =>
      validateEnv({ ...VALID_ENV, RELAY_CHANNEL_ID: '-1001234567890' }),
    ).not.toThrow();
  });

  test('rejects a missing bot token', () => {
    const { TELEGRAM_BOT_TOKEN: _omitted, ...env } = VALID_ENV;

    expect(() => validateEnv(env)).toThrow('TELEGRAM_BOT_TOKEN: Required');
  });

  test('rejects a non-numeric authorized chat id', () => {
    expect(() =>
      validateEnv({ ...VALID_ENV, RELAY_AUTHORIZED_CHAT_ID: 'owner' }),
    ).toThrow('RELAY_AUTHORIZED_CHAT_ID: Expected an integer');
  });

  test('rejects a channel that is neither @name nor numeric', () => {
    expect(() =>
      validateEnv({ ...VALID_ENV, RELAY_CHANNEL_ID: 'test_channel' }),
    ).toThrow('RELAY_CHANNEL_ID: Expected @channelname or a numeric chat id');
  });

  test('lists every problem in one error', () => {
    expect(() => validateEnv({})).toThrow(
      'Invalid environment configuration: TELEGRAM_BOT_TOKEN: Required; WEBHOOK_BASE_URL: Required; RELAY_AUTHORIZED_CHAT_ID: Required; RELAY_CHANNEL_ID: Required',
    );
  });
});
