import { publicChannelUrl, validateEnv } from './env.validation';

const base = {
  BOT_TOKEN: 'test-token',
  PRIVATE_CHANNEL_ID: '-1001234567890',
  PUBLIC_CHANNEL: 'https://t.me/example_books',
  WEBHOOK_URL: 'https://relay.example.com/webhook',
};

describe('validateEnv', () => {
  it('applies defaults for optional settings', () => {
    const env = validateEnv(base);

    expect(env.PORT).toBe(8000);
    expect(env.REGISTER_WEBHOOK).toBe(true);
    expect(env.DROP_PENDING_UPDATES).toBe(true);
    expect(env.TELEGRAM_API_URL).toBe('https://api.telegram.org');
    expect(env.TELEGRAM_MAX_ATTEMPTS).toBe(3);
    expect(env.MULTI_INSTANCE).toBe(false);
    expect(env.WEBHOOK_SECRET).toBeUndefined();
  });

  it('coerces numbers and booleans from strings', () => {
    const env = validateEnv({
      ...base,
      PORT: '3000',
      REGISTER_WEBHOOK: 'false',
      MULTI_INSTANCE: '1',
      TELEGRAM_RETRY_BASE_MS: '250',
    });

    expect(env.PORT).toBe(3000);
    expect(env.REGISTER_WEBHOOK).toBe(false);
    expect(env.MULTI_INSTANCE).toBe(true);
    expect(env.TELEGRAM_RETRY_BASE_MS).toBe(250);
  });

  it('treats empty optional values as unset', () => {
    const env = validateEnv({ ...base, KEEP_ALIVE_URL: '', REDIS_URL: '', WEBHOOK_SECRET: '' });

    expect(env.KEEP_ALIVE_URL).toBeUndefined();
    expect(env.REDIS_URL).toBeUndefined();
    expect(env.WEBHOOK_SECRET).toBeUndefined();
  });

  it('accepts an @username for both channels', () => {
    const env = validateEnv({
      ...base,
      PRIVATE_CHANNEL_ID: '@private_books',
      PUBLIC_CHANNEL: '@example_books',
    });

    expect(env.PRIVATE_CHANNEL_ID).toBe('@private_books');
    expect(env.PUBLIC_CHANNEL).toBe('@example_books');
  });

  it('rejects a plain-http webhook URL', () => {
    expect(() =>
      validateEnv({ ...base, WEBHOOK_URL: 'http://relay.example.com/webhook' }),
    ).toThrow('WEBHOOK_URL must be an https URL');
  });

  it('rejects a channel name without @', () => {
    expect(() => validateEnv({ ...base, PRIVATE_CHANNEL_ID: 'private_books' })).toThrow(
      'PRIVATE_CHANNEL_ID must be a numeric chat id or an @username',
    );
  });

  it('names every missing required variable in one error', () => {
    let message = '';
    try {
      validateEnv({});
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }

    expect(message).toMatch(/^Invalid environment: /);
    for (const name of ['BOT_TOKEN', 'PRIVATE_CHANNEL_ID', 'PUBLIC_CHANNEL', 'WEBHOOK_URL']) {
      expect(message).toContain(name);
    }
  });
});

describe('publicChannelUrl', () => {
  it('expands an @username to its t.me link', () => {
    expect(publicChannelUrl('@example_books')).toBe('https://t.me/example_books');
  });

  it('keeps URLs as they are', () => {
    expect(publicChannelUrl('https://t.me/+AbCdEf')).toBe('https://t.me/+AbCdEf');
  });
});
