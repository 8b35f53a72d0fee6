import { redactWebhookToken } from './logging.module';

describe('redactWebhookToken', () => {
  test('hides the token in webhook paths', () => {
    expect(redactWebhookToken('/webhook/test-token')).toBe(
      '/webhook/[REDACTED]',
    );
  });

  test('leaves other paths alone', () => {
    expect(redactWebhookToken('/health/readiness')).toBe('/health/readiness');
    expect(redactWebhookToken(undefined)).toBeUndefined();
  });
});
