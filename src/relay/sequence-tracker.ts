import { Injectable } from '@nestjs/common';

/**
 * Last channel message id confirmed by Telegram.
 *
 * Only `RelayDispatcherService` writes here, and only after a send completes.
 * The tracker has no locking of its own: `predictNext()` is valid because
 * exactly one drain worker dispatches at a time and it awaits each send before
 * predicting the next. Dispatching two batches concurrently would break the
 * `predicted = last + 1` relation no matter how this value is stored.
 */
@Injectable()
export class SequenceTracker {
  private lastConfirmed = 0;

  get last(): number {
    return this.lastConfirmed;
  }

  predictNext(): number {
    return this.lastConfirmed + 1;
  }

  confirm(messageId: number): void {
    this.lastConfirmed = messageId;
  }
}
