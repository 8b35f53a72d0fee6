import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { TelegramModule } from '../transport/telegram/telegram.module';
import { HealthController } from './health.controller';
import { IndexController } from './index.controller';
import { TelegramHealthIndicator } from './telegram.health';

@Module({
  imports: [TerminusModule, TelegramModule],
  controllers: [IndexController, HealthController],
  providers: [TelegramHealthIndicator],
})
export class HealthModule {}
