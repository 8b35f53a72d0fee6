import { Injectable, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import {
  BOT_COMMAND_DESCRIPTIONS,
  WEBHOOK_ROUTE_PREFIX,
} from '../../common/constants';

/**
 * Builds the public webhook URL for a bot token.
 * A trailing slash on the base URL is ignored.
 */
export function buildWebhookUrl(baseUrl: string, botToken: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${WEBHOOK_ROUTE_PREFIX}${botToken}`;
}

/**
 * Points Telegram at this server once the application has started.
 * The service is useless without the webhook, so a failure aborts startup.
 */
@Injectable()
export class WebhookRegistrar implements OnApplicationBootstrap {
  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
    @InjectBot() private readonly bot: Telegraf,
  ) {
    this.logger.setContext(WebhookRegistrar.name);
  }

  get webhookUrl(): string {
    return buildWebhookUrl(
      this.configService.getOrThrow<string>('telegram.webhookBaseUrl'),
      this.configService.getOrThrow<string>('telegram.botToken'),
    );
  }

  async onApplicationBootstrap(): Promise<void> {
    const baseUrl = this.configService.getOrThrow<string>(
      'telegram.webhookBaseUrl',
    );

    try {
      await this.bot.telegram.setWebhook(this.webhookUrl);
    } catch (error) {
      this.logger.fatal({ err: error, baseUrl }, 'Failed to register webhook');
      throw error;
    }
    this.logger.info({ baseUrl }, 'Webhook registered');

    try {
      await this.bot.telegram.setMyCommands(BOT_COMMAND_DESCRIPTIONS);
      this.logger.info({}, 'Bot commands registered');
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to register bot commands');
    }
  }
}
