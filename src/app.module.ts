import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AdmissionModule } from './admission';
import { configuration } from './config/configuration';
import { validateEnv } from './config/env.schema';
import { HealthModule } from './health/health.module';
import { LoggingModule } from './logging/logging.module';
import { RelayModule } from './relay';
import { TelegramClientModule } from './transport/telegram/telegram-client.module';
import { TelegramModule } from './transport/telegram/telegram.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnv,
    }),
    LoggingModule,
    TelegramClientModule,
    RelayModule,
    AdmissionModule,
    TelegramModule,
    HealthModule,
  ],
})
export class AppModule {}
