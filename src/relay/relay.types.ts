/**
 * An audio file waiting to be posted to the channel.
 * Replaced wholesale when a later admission reuses the same sequence key.
 */
export interface QueuedItem {
  /** Telegram `file_id` of the audio, reused when posting to the channel */
  readonly contentRef: string;
  /** `message_id` of the source message; orders and deduplicates the queue */
  readonly sequenceKey: number;
}

/**
 * Outcome counts for one dispatch pass.
 */
export interface DispatchReport {
  /** Items posted to the channel, corrected or not */
  sent: number;
  /** Posts whose caption had to be edited to the actual message id */
  corrected: number;
  /** Items whose send call failed and were dropped */
  failed: number;
}
