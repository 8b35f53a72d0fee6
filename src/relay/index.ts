export { RelayModule } from './relay.module';
export { RelayQueueService } from './relay-queue.service';
export type { DispatchReport, QueuedItem } from './relay.types';
