import { Module } from '@nestjs/common';
import { BroadcastService } from './broadcast.service';
import { TelegramClientModule } from './telegram-client.module';

/**
 * Outbound Bot API calls via Telegram.
 *
 * Kept apart from `TelegramModule` so the relay and admission modules can
 * send without depending on the webhook controller that feeds them.
 */
@Module({
  imports: [TelegramClientModule],
  providers: [BroadcastService],
  exports: [BroadcastService],
})
export class BroadcastModule {}
