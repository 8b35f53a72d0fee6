import { Module } from '@nestjs/common';
import { BroadcastModule } from '../transport/telegram/broadcast.module';
import { RelayDispatcherService } from './relay-dispatcher.service';
import { RelayQueueService } from './relay-queue.service';
import { SequenceTracker } from './sequence-tracker';

/**
 * Debounced relay of audio to the destination channel.
 *
 * `RelayQueueService` collects admitted audio and drains it in bursts;
 * `RelayDispatcherService` posts each batch, keeping `SequenceTracker` in step
 * with the channel's message ids. All three are process-wide singletons.
 */
@Module({
  imports: [BroadcastModule],
  providers: [SequenceTracker, RelayDispatcherService, RelayQueueService],
  exports: [RelayQueueService],
})
export class RelayModule {}
