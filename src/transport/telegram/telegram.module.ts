import { Module } from '@nestjs/common';
import { AdmissionModule } from '../../admission';
import { TelegramClientModule } from './telegram-client.module';
import { WebhookController } from './webhook.controller';
import { WebhookRegistrar } from './webhook.registrar';

/**
 * Inbound side of the Telegram integration.
 *
 * Updates arrive over the webhook and go straight to `AdmissionService`;
 * `WebhookRegistrar` tells Telegram where to deliver them on startup.
 * Outbound calls live in `BroadcastModule`.
 */
@Module({
  imports: [TelegramClientModule, AdmissionModule],
  controllers: [WebhookController],
  providers: [WebhookRegistrar],
  exports: [WebhookRegistrar],
})
export class TelegramModule {}
