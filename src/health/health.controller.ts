import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { TelegramHealthIndicator } from './telegram.health';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly telegram: TelegramHealthIndicator,
  ) {}

  /**
   * Liveness probe: is the process alive and accepting HTTP requests?
   * No dependency checks; returns 200 if NestJS is running.
   */
  @Get('liveness')
  @HealthCheck()
  liveness() {
    return this.health.check([]);
  }

  /**
   * Readiness probe: is Telegram delivering updates to us?
   */
  @Get('readiness')
  @HealthCheck()
  readiness() {
    return this.health.check([() => this.telegram.isHealthy('telegram')]);
  }
}
