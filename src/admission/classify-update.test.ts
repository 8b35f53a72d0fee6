import {
  buildAudio,
  buildMessageUpdate,
} from '../test/fixtures/updates';
import { classifyUpdate } from './classify-update';

describe('classifyUpdate', () => {
  test('classifies exact command text as a command', () => {
    const event = classifyUpdate(buildMessageUpdate({ text: '/help' }));

    expect(event.kind).toBe('command');
    expect(event.kind === 'command' && event.command).toBe('help');
  });

  test('treats command text with arguments as an ordinary message', () => {
    const event = classifyUpdate(buildMessageUpdate({ text: '/start now' }));

    expect(event.kind).toBe('other');
  });

  test('classifies a message with audio as audio', () => {
    const event = classifyUpdate(buildMessageUpdate({ audio: buildAudio() }));

    expect(event.kind).toBe('audio');
    expect(event.kind === 'audio' && event.audio.file_id).toBe('audio-file-1');
  });

  test('classifies plain text as other', () => {
    const event = classifyUpdate(buildMessageUpdate({ text: 'hello' }));

    expect(event.kind).toBe('other');
  });

  test('ignores updates that are not messages', () => {
    const event = classifyUpdate({
      update_id: 7,
      edited_message: buildMessageUpdate({ text: 'edited' }).message,
    });

    expect(event).toEqual({ kind: 'non-message' });
  });

  test('ignores payloads that are not updates', () => {
    expect(classifyUpdate('garbage')).toEqual({ kind: 'non-message' });
    expect(classifyUpdate(null)).toEqual({ kind: 'non-message' });
    expect(classifyUpdate({ update_id: 'x', message: {} })).toEqual({
      kind: 'non-message',
    });
  });

  test('ignores messages missing required fields', () => {
    expect(
      classifyUpdate({ update_id: 1, message: { message_id: 3, text: 'hi' } }),
    ).toEqual({ kind: 'non-message' });
  });

  test('does not treat inherited object keys as commands', () => {
    const event = classifyUpdate(buildMessageUpdate({ text: 'toString' }));

    expect(event.kind).toBe('other');
  });
});
