import { NotFoundException } from '@nestjs/common';
import { AdmissionService } from '../../admission';
import { createMockConfigService } from '../../test/mocks/config.mock';
import { createMockLogger } from '../../test/mocks/pino-logger.mock';
import { createMockTelegraf } from '../../test/mocks/telegraf.mock';
import { buildAudio, buildMessageUpdate } from '../../test/fixtures/updates';
import { BroadcastService } from './broadcast.service';
import { WebhookController } from './webhook.controller';

describe('WebhookController', () => {
  let controller: WebhookController;
  let mockAdmission: { submit: jest.Mock<void, [unknown]> };

  beforeEach(() => {
    mockAdmission = { submit: jest.fn<void, [unknown]>() };
    controller = new WebhookController(
      createMockConfigService(),
      mockAdmission as never,
    );
  });

  test('acknowledges and submits updates sent to the token path', () => {
    const update = buildMessageUpdate({ text: 'hello' });

    expect(controller.handleUpdate('test-token', update)).toBe('OK');
    expect(mockAdmission.submit).toHaveBeenCalledWith(update);
  });

  test('accepts payloads the admission gate will ignore', () => {
    expect(controller.handleUpdate('test-token', { foo: 'bar' })).toBe('OK');
    expect(mockAdmission.submit).toHaveBeenCalledWith({ foo: 'bar' });
  });

  test('returns 404 for any other token', () => {
    expect(() => controller.handleUpdate('wrong-token', {})).toThrow(
      NotFoundException,
    );
    expect(mockAdmission.submit).not.toHaveBeenCalled();
  });

  test('does not wait for outbound calls to finish', () => {
    const mockBot = createMockTelegraf();
    mockBot.telegram.deleteMessage.mockImplementation(
      () => new Promise<boolean>(() => {}),
    );
    const mockQueue = { admit: jest.fn() };
    const admission = new AdmissionService(
      createMockLogger(),
      createMockConfigService(),
      mockQueue as never,
      new BroadcastService(createMockLogger(), mockBot as never),
    );
    const wired = new WebhookController(createMockConfigService(), admission);

    const ack = wired.handleUpdate(
      'test-token',
      buildMessageUpdate({ audio: buildAudio() }),
    );

    expect(ack).toBe('OK');
    expect(mockQueue.admit).toHaveBeenCalledWith('audio-file-1', 10);
    expect(mockBot.deletedMessages).toEqual([]);
  });
});
