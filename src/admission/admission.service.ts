import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { BOT_MESSAGES } from '../common/constants';
import { RelayQueueService } from '../relay';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import type { AdmissionOutcome, MessageEvent } from './admission.types';
import { classifyUpdate } from './classify-update';
import type { TelegramMessage } from './update.schemas';

/**
 * Decides what happens to each inbound update.
 *
 * Only messages from the configured chat are acted on. Commands get a canned
 * reply, audio goes to the relay queue, and in all three authorized cases
 * (command, audio, anything else) the source message is deleted afterwards.
 * Everyone else gets a rejection notice and their message is left alone.
 */
@Injectable()
export class AdmissionService {
  private readonly authorizedChatId: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
    private readonly relayQueue: RelayQueueService,
    private readonly broadcastService: BroadcastService,
  ) {
    this.logger.setContext(AdmissionService.name);
    this.authorizedChatId = this.configService.getOrThrow<number>(
      'relay.authorizedChatId',
    );
  }

  /**
   * Starts handling an update without waiting for it. Used by the webhook
   * controller so Telegram gets its acknowledgment straight away.
   */
  submit(payload: unknown): void {
    this.handle(payload).catch(error => {
      this.logger.error({ err: error }, 'Unhandled error processing update');
    });
  }

  async handle(payload: unknown): Promise<AdmissionOutcome> {
    const event = classifyUpdate(payload);
    if (event.kind === 'non-message') {
      this.logger.debug({}, 'Ignoring non-message update');
      return 'ignored';
    }

    const { message } = event;
    if (message.chat.id !== this.authorizedChatId) {
      await this.reject(message);
      return 'rejected';
    }

    const outcome = await this.route(event);
    await this.broadcastService.deleteMessage(
      message.chat.id,
      message.message_id,
    );
    return outcome;
  }

  private async route(event: MessageEvent): Promise<AdmissionOutcome> {
    switch (event.kind) {
      case 'command':
        await this.broadcastService.sendMessage(
          event.message.chat.id,
          BOT_MESSAGES[event.command],
        );
        return 'command';

      case 'audio':
        this.relayQueue.admit(event.audio.file_id, event.message.message_id);
        return 'queued';

      case 'other':
        return 'discarded';
    }
  }

  private async reject(message: TelegramMessage): Promise<void> {
    const name =
      message.from?.first_name ??
      message.from?.username ??
      message.chat.first_name ??
      message.chat.username ??
      String(message.chat.id);

    this.logger.warn(
      { chatId: message.chat.id, messageId: message.message_id },
      'Rejected message from unauthorized chat',
    );
    await this.broadcastService.sendMessage(
      message.chat.id,
      BOT_MESSAGES.unauthorized(name),
    );
  }
}
