import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';
import type TelegramBot from 'node-telegram-bot-api';
import { TelegramHandler, toBotPayload, type BotDispatcher } from '../../src/interfaces/telegram_handler.js';
import { TelegramAdapter } from '../../src/adapters/telegram-adapter.js';
import { HELP_TEXT, MessageProcessor } from '../../src/core/message-processor.js';

interface FakeBotShape {
  token: string;
  listeners: Map<string, (arg: unknown) => void>;
  sendMessage: Mock;
  stopPolling: Mock;
}

const bots = vi.hoisted(() => {
  const instances: FakeBotShape[] = [];
  return { instances };
});

vi.mock('node-telegram-bot-api', () => {
  class FakeBot implements FakeBotShape {
    token: string;
    listeners = new Map<string, (arg: unknown) => void>();
    sendMessage = vi.fn().mockResolvedValue({});
    stopPolling = vi.fn().mockResolvedValue(undefined);

    constructor(token: string) {
      this.token = token;
      bots.instances.push(this);
    }

    on(event: string, listener: (arg: unknown) => void): this {
      this.listeners.set(event, listener);
      return this;
    }
  }
  return { default: FakeBot };
});

function telegramMessage(overrides: Partial<TelegramBot.Message> = {}): TelegramBot.Message {
  return {
    message_id: 31,
    date: 1714564800,
    chat: { id: 99, type: 'private' },
    from: { id: 7, is_bot: false, first_name: 'Ada', last_name: 'Lovelace' },
    text: 'hello bot',
    ...overrides,
  };
}

function lastBot(): FakeBotShape {
  const bot = bots.instances[bots.instances.length - 1];
  if (!bot) throw new Error('no bot constructed');
  return bot;
}

describe('toBotPayload', () => {
  it('maps a text update onto a bot payload', () => {
    const now = new Date('2024-05-01T12:00:00.000Z');
    const payload = toBotPayload(telegramMessage(), now);

    expect(payload).toMatchObject({
      timestamp: now,
      clientType: 'telegram',
      messageType: 'text',
      content: 'hello bot',
      userId: '7',
      userName: 'Ada Lovelace',
      metadata: { chatId: 99, messageId: 31 },
    });
    expect(payload?.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('marks only the processor\'s bot commands as commands', () => {
    expect(toBotPayload(telegramMessage({ text: '/stats' }))?.messageType).toBe('command');
    expect(toBotPayload(telegramMessage({ text: '/start' }))?.messageType).toBe('command');
    expect(toBotPayload(telegramMessage({ text: '/help' }))?.messageType).toBe('text');
    expect(toBotPayload(telegramMessage({ text: '/status now' }))?.messageType).toBe('text');
  });

  it('ignores updates without text or sender', () => {
    expect(toBotPayload(telegramMessage({ text: undefined }))).toBeNull();
    expect(toBotPayload(telegramMessage({ from: undefined }))).toBeNull();
  });
});

describe('TelegramHandler', () => {
  afterEach(() => {
    bots.instances.length = 0;
    vi.restoreAllMocks();
  });

  it('starts polling with the configured token and registers listeners', () => {
    const dispatcher: BotDispatcher = { dispatch: vi.fn() };
    new TelegramHandler('test-secret', dispatcher);

    const bot = lastBot();
    expect(bot.token).toBe('test-secret');
    expect([...bot.listeners.keys()]).toEqual(['message', 'polling_error']);
  });

  it('answers an update through the bot adapter', async () => {
    const adapter = new TelegramAdapter(new MessageProcessor());
    await adapter.initialize();
    const handler = new TelegramHandler('test-secret', adapter);

    await handler.handleUpdate(telegramMessage({ text: '/start' }));

    expect(lastBot().sendMessage).toHaveBeenCalledWith(
      99,
      'Hello, Ada Lovelace! I am the gateway bot that unifies the CLI, Web and Telegram interfaces.',
    );
    expect(adapter.status.messageCount).toBe(1);
  });

  it('answers /help from the bot with the help text', async () => {
    const adapter = new TelegramAdapter(new MessageProcessor());
    await adapter.initialize();
    const handler = new TelegramHandler('test-secret', adapter);

    await handler.handleUpdate(telegramMessage({ text: '/help' }));

    expect(lastBot().sendMessage).toHaveBeenCalledWith(99, HELP_TEXT);
  });

  it('sends the failure text when the adapter is not ready', async () => {
    const handler = new TelegramHandler('test-secret', new TelegramAdapter(new MessageProcessor()));

    await handler.handleUpdate(telegramMessage());

    expect(lastBot().sendMessage).toHaveBeenCalledWith(99, 'Telegram adapter is not ready');
  });

  it('does not dispatch updates it cannot handle', async () => {
    const dispatcher: BotDispatcher = { dispatch: vi.fn() };
    const handler = new TelegramHandler('test-secret', dispatcher);

    await handler.handleUpdate(telegramMessage({ text: undefined }));

    expect(dispatcher.dispatch).not.toHaveBeenCalled();
    expect(lastBot().sendMessage).not.toHaveBeenCalled();
  });

  it('logs and swallows a failed send', async () => {
    const dispatcher: BotDispatcher = {
      dispatch: vi.fn().mockResolvedValue({ success: true, messageId: 'm', chatId: 99, text: 'hi' }),
    };
    const handler = new TelegramHandler('test-secret', dispatcher);
    lastBot().sendMessage.mockRejectedValueOnce(new Error('chat not found'));

    await expect(handler.handleUpdate(telegramMessage())).resolves.toBeUndefined();
  });

  it('stops polling on stop', async () => {
    const handler = new TelegramHandler('test-secret', { dispatch: vi.fn() });

    await handler.stop();

    expect(lastBot().stopPolling).toHaveBeenCalledTimes(1);
  });
});
