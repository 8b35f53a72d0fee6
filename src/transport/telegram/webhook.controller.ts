import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AdmissionService } from '../../admission';
import { WEBHOOK_ACK, WEBHOOK_ROUTE } from '../../common/constants';

/**
 * Receives Telegram updates at `/webhook/<bot token>`.
 *
 * The update is handed to the admission gate as its own unit of work and the
 * acknowledgment goes back before any of it completes, so a slow relay never
 * makes Telegram retry the delivery.
 */
@Controller(WEBHOOK_ROUTE)
export class WebhookController {
  private readonly botToken: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly admissionService: AdmissionService,
  ) {
    this.botToken = this.configService.getOrThrow<string>('telegram.botToken');
  }

  @Post(':token')
  @HttpCode(HttpStatus.OK)
  handleUpdate(@Param('token') token: string, @Body() update: unknown): string {
    if (token !== this.botToken) {
      throw new NotFoundException();
    }

    this.admissionService.submit(update);
    return WEBHOOK_ACK;
  }
}
