import { z } from 'zod';

/** Telegram channel reference: `@username` or a numeric chat id */
const ChannelIdSchema = z
  .string()
  .regex(
    /^(@[A-Za-z0-9_]{4,}|-?\d+)$/,
    'Expected @channelname or a numeric chat id',
  );

const IntegerString = z.string().regex(/^-?\d+$/, 'Expected an integer');

const PositiveMsString = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative number of milliseconds');

/**
 * Environment variables the process needs before it may serve traffic.
 * Unknown variables pass through untouched.
 */
export const EnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string().min(1),
    WEBHOOK_BASE_URL: z.string().url(),
    RELAY_AUTHORIZED_CHAT_ID: IntegerString,
    RELAY_CHANNEL_ID: ChannelIdSchema,
    RELAY_QUIET_INTERVAL_MS: PositiveMsString.optional(),
    RELAY_PACING_MS: PositiveMsString.optional(),
    PORT: z.string().regex(/^\d+$/).optional(),
  })
  .passthrough();

export type Env = z.infer<typeof EnvSchema>;

/**
 * `ConfigModule` validate hook. Throws with every failing variable listed so
 * a misconfigured deployment stops before the webhook is registered.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
