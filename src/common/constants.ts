/** Controller path for inbound Telegram updates */
export const WEBHOOK_ROUTE = 'webhook';

/** Request path prefix of the webhook; the bot token follows it */
export const WEBHOOK_ROUTE_PREFIX = `/${WEBHOOK_ROUTE}/`;

/** Body returned to Telegram for every accepted webhook call */
export const WEBHOOK_ACK = 'OK';

/** Body served at the root route for liveness pings */
export const INDEX_BODY = 'Hi there';

/**
 * Commands the bot answers directly, bypassing the relay queue.
 * Matched against the full message text.
 */
export const BOT_COMMANDS = {
  '/start': 'start',
  '/help': 'help',
} as const;

export type BotCommandText = keyof typeof BOT_COMMANDS;
export type BotCommand = (typeof BOT_COMMANDS)[BotCommandText];

export const BOT_MESSAGES = {
  start: `👋 Hi! Send or forward me audio files and I'll post them to the channel.

Files that arrive in quick succession are collected and posted together, in the order you sent them.`,

  help: `📚 Available Commands:

/start - Get a welcome message
/help - Show this help message

🎵 Anything else: send audio and it gets relayed to the channel. Your original message is removed once it's been picked up.`,

  unauthorized: (name: string) =>
    `Sorry ${name}, this bot only accepts uploads from its owner.`,
} as const;

/** Command list published to Telegram on startup */
export const BOT_COMMAND_DESCRIPTIONS = [
  { command: 'start', description: 'Welcome message' },
  { command: 'help', description: 'Show available commands' },
];
