import { BOT_COMMANDS, type BotCommandText } from '../common/constants';
import type { InboundEvent } from './admission.types';
import { UpdateSchema } from './update.schemas';

function isCommandText(text: string): text is BotCommandText {
  return Object.hasOwn(BOT_COMMANDS, text);
}

/**
 * Maps a raw webhook payload to an `InboundEvent`.
 *
 * Payloads that fail validation and updates other than `message` (edits,
 * channel posts, callbacks) become `non-message`. A message whose text is
 * exactly a known command is a command even if it also carries audio.
 */
export function classifyUpdate(payload: unknown): InboundEvent {
  const parsed = UpdateSchema.safeParse(payload);
  if (!parsed.success || !parsed.data.message) {
    return { kind: 'non-message' };
  }

  const message = parsed.data.message;

  if (message.text !== undefined && isCommandText(message.text)) {
    return { kind: 'command', message, command: BOT_COMMANDS[message.text] };
  }

  if (message.audio) {
    return { kind: 'audio', message, audio: message.audio };
  }

  return { kind: 'other', message };
}
