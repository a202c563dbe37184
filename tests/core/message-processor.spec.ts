import { describe, expect, it, vi } from 'vitest';
import { HELP_TEXT, MessageProcessor, formatUptime } from '../../src/core/message-processor.js';
import { createCanonicalMessage, type CanonicalMessageInit } from '../../src/core/models.js';
import type { ResponseGenerator } from '../../src/types/messaging.js';

const START = new Date('2024-05-01T12:00:00.000Z');

function fixedClock(start: Date = START) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance: (ms: number) => {
      current += ms;
    },
  };
}

function message(overrides: Partial<CanonicalMessageInit> = {}) {
  return createCanonicalMessage({
    id: 'msg-1',
    clientType: 'web',
    messageType: 'text',
    content: 'hello',
    userId: 'user-1',
    timestamp: START,
    ...overrides,
  });
}

describe('formatUptime', () => {
  it('renders hours, minutes and seconds', () => {
    expect(formatUptime(3725.9)).toBe('1h 2m 5s');
    expect(formatUptime(-3)).toBe('0h 0m 0s');
  });
});

describe('MessageProcessor', () => {
  it('delegates plain text to the response generator and echoes the message id', async () => {
    const generator: ResponseGenerator = { generate: vi.fn().mockResolvedValue('generated') };
    const processor = new MessageProcessor({ generator });

    const response = await processor.process(message());

    expect(generator.generate).toHaveBeenCalledTimes(1);
    expect(response).toEqual({
      messageId: 'msg-1',
      clientType: 'web',
      content: 'generated',
      responseType: 'text',
      metadata: {},
    });
  });

  it('uses the echo generator by default', async () => {
    const processor = new MessageProcessor();
    const response = await processor.process(message({ content: 'ping' }));

    expect(response.content.startsWith('Received message: ping\n\n')).toBe(true);
  });

  it('answers built-in commands without calling the generator', async () => {
    const generator: ResponseGenerator = { generate: vi.fn().mockResolvedValue('unused') };
    const processor = new MessageProcessor({ generator });

    const start = await processor.process(
      message({ messageType: 'command', content: '/start', userName: 'Ada Lovelace', clientType: 'telegram' }),
    );
    const unknown = await processor.process(message({ messageType: 'command', content: '/dance' }));

    expect(start.content).toBe(
      'Hello, Ada Lovelace! I am the gateway bot that unifies the CLI, Web and Telegram interfaces.',
    );
    expect(unknown.content).toBe('Unknown command: /dance');
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('greets by user id when no user name is known', async () => {
    const processor = new MessageProcessor();
    const response = await processor.process(message({ messageType: 'command', content: '/start' }));

    expect(response.content).toBe(
      'Hello, user-1! I am the gateway bot that unifies the CLI, Web and Telegram interfaces.',
    );
  });

  it('answers help and status prefixes in text messages', async () => {
    const clock = fixedClock();
    const processor = new MessageProcessor({ now: clock.now });

    const help = await processor.process(message({ content: '/HELP me' }));
    clock.advance(3_723_000);
    const status = await processor.process(message({ content: '/status', clientType: 'cli' }));

    expect(help.content).toBe(HELP_TEXT);
    expect(status.content).toBe(
      [
        'Gateway status:',
        '• Uptime: 1h 2m 3s',
        '• Total messages: 2',
        '• Errors: 0',
        '• Messages by client:',
        '  - Telegram: 0',
        '  - Web: 1',
        '  - CLI: 1',
      ].join('\n'),
    );
  });

  it('turns a generator failure into an error response and counts it', async () => {
    const generator: ResponseGenerator = { generate: vi.fn().mockRejectedValue(new Error('model timed out')) };
    const processor = new MessageProcessor({ generator });

    const response = await processor.process(message());

    expect(response.messageId).toBe('msg-1');
    expect(response.content).toBe('An error occurred while processing the message: model timed out');
    expect(response.metadata).toEqual({ errorKind: 'processing_failure', error: 'model timed out' });
    expect(processor.getStats()).toMatchObject({ totalMessages: 1, errors: 1 });
  });

  it('counts a message before processing so failures still appear in totals', async () => {
    const generator: ResponseGenerator = {
      generate: vi.fn().mockRejectedValueOnce(new Error('boom')).mockResolvedValue('fine'),
    };
    const processor = new MessageProcessor({ generator });

    await processor.process(message({ clientType: 'telegram' }));
    await processor.process(message({ clientType: 'web' }));
    await processor.process(message({ clientType: 'web' }));

    const stats = processor.getStats();
    expect(stats.totalMessages).toBe(3);
    expect(stats.messagesByClientType).toEqual({ telegram: 1, web: 2, cli: 0 });
    expect(stats.errors).toBe(1);
  });

  it('computes uptime at call time and reads active sessions from the attached source', () => {
    const clock = fixedClock();
    const processor = new MessageProcessor({ now: clock.now });

    expect(processor.getStats().activeSessions).toBe(0);

    processor.attachSessionSource({ activeSessionCount: 4 });
    clock.advance(90_000);

    const stats = processor.getStats();
    expect(stats.uptimeSeconds).toBe(90);
    expect(stats.activeSessions).toBe(4);
    expect(stats.startTime).toBe('2024-05-01T12:00:00.000Z');
  });
});
