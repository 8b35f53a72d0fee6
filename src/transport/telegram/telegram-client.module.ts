import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getBotToken } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';

/**
 * Provides the Telegraf bot under the `@InjectBot()` token.
 *
 * Updates arrive through `WebhookController`, so the bot is never launched
 * and only its `telegram` client is used. `TelegrafModule.forRoot` is not used
 * here because its shutdown hook stops the bot unconditionally, which throws
 * for a bot that was never launched.
 */
@Global()
@Module({
  providers: [
    {
      provide: getBotToken(),
      useFactory: (configService: ConfigService) =>
        new Telegraf(configService.getOrThrow<string>('telegram.botToken')),
      inject: [ConfigService],
    },
  ],
  exports: [getBotToken()],
})
export class TelegramClientModule {}
