import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { InjectBot } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';

/** Channel and chat ids accepted by the Bot API: numeric id or `@username` */
export type ChatRef = number | string;

/**
 * Thin wrapper over the Telegraf client for every outbound Bot API call.
 *
 * Replies and cleanup calls report failure as `false` and log it. Posting
 * audio throws instead, because the caller has to know which item was lost.
 */
@Injectable()
export class BroadcastService {
  constructor(
    private readonly logger: PinoLogger,
    @InjectBot() private readonly bot: Telegraf,
  ) {
    this.logger.setContext(BroadcastService.name);
  }

  /**
   * Posts an audio file by `file_id` with a Markdown caption.
   *
   * @returns The message id Telegram assigned to the new post
   */
  async sendAudio(
    chatId: ChatRef,
    fileId: string,
    caption: string,
  ): Promise<number> {
    const message = await this.bot.telegram.sendAudio(chatId, fileId, {
      caption,
      parse_mode: 'Markdown',
    });
    return message.message_id;
  }

  async editCaption(
    chatId: ChatRef,
    messageId: number,
    caption: string,
  ): Promise<boolean> {
    try {
      await this.bot.telegram.editMessageCaption(
        chatId,
        messageId,
        undefined,
        caption,
        { parse_mode: 'Markdown' },
      );
      return true;
    } catch (error) {
      this.logger.error(
        { err: error, chatId, messageId },
        'Failed to edit caption',
      );
      return false;
    }
  }

  async sendMessage(chatId: ChatRef, message: string): Promise<boolean> {
    try {
      await this.bot.telegram.sendMessage(chatId, message);
      return true;
    } catch (error) {
      this.logger.error({ err: error, chatId }, 'Failed to send message');
      return false;
    }
  }

  async deleteMessage(chatId: ChatRef, messageId: number): Promise<boolean> {
    try {
      await this.bot.telegram.deleteMessage(chatId, messageId);
      return true;
    } catch (error) {
      this.logger.error(
        { err: error, chatId, messageId },
        'Failed to delete message',
      );
      return false;
    }
  }
}
