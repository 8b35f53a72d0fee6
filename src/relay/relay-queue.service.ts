import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { sleep } from '../common/sleep';
import { RelayDispatcherService } from './relay-dispatcher.service';
import type { QueuedItem } from './relay.types';

/**
 * In-memory queue that coalesces bursts of audio into one ordered batch.
 *
 * Items are kept sorted by sequence key with at most one entry per key. The
 * first admission into an idle queue starts a drain worker, which waits until
 * `quietIntervalMs` has passed since the latest admission, drains everything
 * and hands the batch to the dispatcher, then exits.
 *
 * The worker makes a single pass. Audio admitted while a pass is dispatching
 * stays queued until the next admission starts a fresh worker.
 *
 * Every state change below happens in synchronous code with no `await` in
 * between, so concurrent webhook handlers cannot interleave inside one.
 * Nothing is persisted; pending items are lost on restart.
 */
@Injectable()
export class RelayQueueService implements OnApplicationShutdown {
  private readonly items: QueuedItem[] = [];
  private lastArrivalAt = 0;
  private worker: Promise<void> | null = null;
  private readonly quietIntervalMs: number;

  constructor(
    private readonly logger: PinoLogger,
    private readonly configService: ConfigService,
    private readonly dispatcher: RelayDispatcherService,
  ) {
    this.logger.setContext(RelayQueueService.name);
    this.quietIntervalMs = this.configService.getOrThrow<number>(
      'relay.quietIntervalMs',
    );
  }

  /**
   * Inserts or replaces the item for `sequenceKey`, refreshes the arrival
   * time and starts a drain worker if none is running.
   */
  admit(contentRef: string, sequenceKey: number): void {
    const item: QueuedItem = { contentRef, sequenceKey };
    const index = this.lowerBound(sequenceKey);

    if (this.items[index]?.sequenceKey === sequenceKey) {
      this.items[index] = item;
    } else {
      this.items.splice(index, 0, item);
    }
    this.lastArrivalAt = Date.now();

    this.logger.debug(
      { sequenceKey, pending: this.items.length },
      'Audio admitted',
    );

    if (this.worker) return;

    this.worker = this.runDrainWorker()
      .catch(error => {
        this.logger.error({ err: error }, 'Drain worker crashed');
      })
      .finally(() => {
        this.worker = null;
      });
  }

  get size(): number {
    return this.items.length;
  }

  get isDraining(): boolean {
    return this.worker !== null;
  }

  pendingKeys(): number[] {
    return this.items.map(item => item.sequenceKey);
  }

  /**
   * Lets a dispatch pass that already started finish before shutdown.
   * Anything still queued is reported and discarded.
   */
  async onApplicationShutdown(): Promise<void> {
    if (this.worker) {
      await this.worker;
    }
    if (this.items.length > 0) {
      this.logger.warn(
        { count: this.items.length, dropped: this.pendingKeys() },
        'Shutting down with undelivered audio',
      );
    }
  }

  private async runDrainWorker(): Promise<void> {
    for (;;) {
      await sleep(this.quietIntervalMs);

      // Still inside a burst
      if (Date.now() - this.lastArrivalAt < this.quietIntervalMs) continue;

      if (this.items.length === 0) return;

      const batch = this.items.splice(0, this.items.length);
      this.logger.info(
        { batchSize: batch.length, keys: batch.map(item => item.sequenceKey) },
        'Draining relay queue',
      );
      await this.dispatcher.dispatch(batch);
      return;
    }
  }

  /** First index whose key is >= `sequenceKey` */
  private lowerBound(sequenceKey: number): number {
    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.items[mid].sequenceKey < sequenceKey) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
