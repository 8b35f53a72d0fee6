import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { sleep } from '../common/sleep';
import { BroadcastService } from '../transport/telegram/broadcast.service';
import { relayCaption } from './channel-link';
import type { DispatchReport, QueuedItem } from './relay.types';
import { SequenceTracker } from './sequence-tracker';

type RelayOutcome = 'sent' | 'corrected' | 'failed';

/**
 * Posts a drained batch to the destination channel, one item at a time.
 *
 * Each caption links to the post's own public URL. Telegram only reveals the
 * message id after the send, so the caption is written against a predicted
 * id (`last + 1`) and edited once if the actual id turns out different.
 * Other posts in the channel are what make the prediction miss.
 */
@Injectable()
export class RelayDispatcherService {
  private readonly channelId: string;
  private readonly pacingMs: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
    private readonly broadcastService: BroadcastService,
    private readonly tracker: SequenceTracker,
  ) {
    this.logger.setContext(RelayDispatcherService.name);
    this.channelId = this.configService.getOrThrow<string>('relay.channelId');
    this.pacingMs = this.configService.getOrThrow<number>('relay.pacingMs');
  }

  /**
   * Relays every item in order, waiting `pacingMs` between sends.
   * Sends are strictly sequential; the prediction for item N+1 depends on
   * the id confirmed for item N.
   */
  async dispatch(batch: readonly QueuedItem[]): Promise<DispatchReport> {
    const report: DispatchReport = { sent: 0, corrected: 0, failed: 0 };

    for (const [index, item] of batch.entries()) {
      const outcome = await this.relay(item);
      if (outcome === 'failed') {
        report.failed++;
      } else {
        report.sent++;
        if (outcome === 'corrected') report.corrected++;
      }

      if (index < batch.length - 1) {
        await sleep(this.pacingMs);
      }
    }

    this.logger.info(
      { batchSize: batch.length, ...report, lastMessageId: this.tracker.last },
      'Batch relayed',
    );
    return report;
  }

  private async relay(item: QueuedItem): Promise<RelayOutcome> {
    const predicted = this.tracker.predictNext();

    let actual: number;
    try {
      actual = await this.broadcastService.sendAudio(
        this.channelId,
        item.contentRef,
        relayCaption(this.channelId, predicted),
      );
    } catch (error) {
      // Already drained from the queue; the item is dropped
      this.logger.error(
        {
          err: error,
          sequenceKey: item.sequenceKey,
          contentRef: item.contentRef,
        },
        'Failed to relay audio',
      );
      return 'failed';
    }

    if (actual === predicted) {
      this.tracker.confirm(actual);
      this.logger.debug(
        { sequenceKey: item.sequenceKey, messageId: actual },
        'Audio relayed',
      );
      return 'sent';
    }

    this.logger.info(
      { sequenceKey: item.sequenceKey, predicted, actual },
      'Predicted message id missed, correcting caption',
    );

    const corrected = await this.broadcastService.editCaption(
      this.channelId,
      actual,
      relayCaption(this.channelId, actual),
    );
    if (!corrected) {
      this.logger.warn(
        { sequenceKey: item.sequenceKey, messageId: actual, predicted },
        'Caption still links to the predicted id',
      );
    }

    // Tracked regardless of the edit so later predictions start from here
    this.tracker.confirm(actual);
    return 'corrected';
  }
}
