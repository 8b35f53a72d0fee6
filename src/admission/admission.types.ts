import type { BotCommand } from '../common/constants';
import type { TelegramAudio, TelegramMessage } from './update.schemas';

/**
 * An inbound update, classified once at the edge of the admission gate.
 */
export type InboundEvent =
  | { kind: 'command'; message: TelegramMessage; command: BotCommand }
  | { kind: 'audio'; message: TelegramMessage; audio: TelegramAudio }
  | { kind: 'other'; message: TelegramMessage }
  | { kind: 'non-message' };

/** Inbound events that carry a message */
export type MessageEvent = Exclude<InboundEvent, { kind: 'non-message' }>;

/**
 * What the gate did with one update. Returned for logging and tests.
 */
export type AdmissionOutcome =
  | 'ignored'
  | 'rejected'
  | 'command'
  | 'queued'
  | 'discarded';
