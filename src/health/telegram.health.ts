import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import { WebhookRegistrar } from '../transport/telegram/webhook.registrar';

@Injectable()
export class TelegramHealthIndicator {
  constructor(
    private readonly healthIndicatorService: HealthIndicatorService,
    private readonly webhookRegistrar: WebhookRegistrar,
    @InjectBot() private readonly bot: Telegraf,
  ) {}

  /**
   * Asks Telegram where it is delivering updates.
   * Healthy only when the webhook still points at this server. The URL
   * contains the bot token, so it is never echoed in the result.
   */
  async isHealthy(key: string) {
    const indicator = this.healthIndicatorService.check(key);

    try {
      const info = await this.bot.telegram.getWebhookInfo();
      if (info.url !== this.webhookRegistrar.webhookUrl) {
        return indicator.down({ message: 'Webhook is not registered' });
      }
      return indicator.up({ pendingUpdates: info.pending_update_count });
    } catch (error) {
      return indicator.down({ message: `Telegram request failed: ${error}` });
    }
  }
}
