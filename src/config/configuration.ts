/** Quiet period that must pass with no new audio before a batch is relayed */
const DEFAULT_QUIET_INTERVAL_MS = 3000;
/** Delay between consecutive channel posts within one batch */
const DEFAULT_PACING_MS = 1000;

export const configuration = () => ({
  telegram: {
    botToken: process.env.TELEGRAM_BOT_TOKEN,
    webhookBaseUrl: process.env.WEBHOOK_BASE_URL,
  },
  relay: {
    authorizedChatId: Number.parseInt(
      process.env.RELAY_AUTHORIZED_CHAT_ID || '',
      10,
    ),
    channelId: process.env.RELAY_CHANNEL_ID,
    quietIntervalMs: Number.parseInt(
      process.env.RELAY_QUIET_INTERVAL_MS || `${DEFAULT_QUIET_INTERVAL_MS}`,
      10,
    ),
    pacingMs: Number.parseInt(
      process.env.RELAY_PACING_MS || `${DEFAULT_PACING_MS}`,
      10,
    ),
  },
});
