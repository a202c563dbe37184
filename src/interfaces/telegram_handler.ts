import TelegramBot from 'node-telegram-bot-api';
import { randomUUID } from 'node:crypto';
import type { BotPayload, BotReply } from '../types/messaging.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('telegram');

/** Slash commands the processor answers in its command branch; other text keeps its prefix handling. */
const BOT_COMMANDS: ReadonlySet<string> = new Set(['/start', '/stats']);

function isBotCommand(text: string): boolean {
  const [first = ''] = text.trim().split(/\s+/);
  return BOT_COMMANDS.has(first);
}

/** The part of the bot adapter the transport needs. */
export interface BotDispatcher {
  dispatch(raw: unknown): Promise<BotReply>;
}

/**
 * Build the bot payload for a Telegram text message, or `null` for updates the
 * gateway does not handle (no sender, no text).
 */
export function toBotPayload(msg: TelegramBot.Message, now: Date = new Date()): BotPayload | null {
  if (!msg.from || typeof msg.text !== 'string') {
    return null;
  }

  const fullName = [msg.from.first_name, msg.from.last_name].filter(Boolean).join(' ');

  return {
    id: randomUUID(),
    timestamp: now,
    clientType: 'telegram',
    messageType: isBotCommand(msg.text) ? 'command' : 'text',
    content: msg.text,
    userId: String(msg.from.id),
    ...(fullName ? { userName: fullName } : {}),
    metadata: {
      chatId: msg.chat.id,
      messageId: msg.message_id,
    },
  };
}

/**
 * Wraps the Telegram Bot API polling loop:
 *   - normalizes text updates into bot payloads,
 *   - dispatches them through the bot adapter,
 *   - sends the reply text back to the originating chat.
 */
export class TelegramHandler {
  readonly #bot: TelegramBot;
  readonly #dispatcher: BotDispatcher;

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string, dispatcher: BotDispatcher) {
    this.#bot = new TelegramBot(token, { polling: true });
    this.#dispatcher = dispatcher;
    this.#registerListeners();
  }

  /** Normalize, dispatch and answer one update. Resolves once the reply is sent. */
  async handleUpdate(msg: TelegramBot.Message): Promise<void> {
    const payload = toBotPayload(msg);
    if (!payload) return;

    const reply = await this.#dispatcher.dispatch(payload);
    const chatId = reply.chatId ?? msg.chat.id;

    try {
      await this.sendText(chatId, reply.text);
    } catch (err) {
      log.error({ err, chatId, messageId: reply.messageId }, 'Failed to send Telegram reply');
    }
  }

  #registerListeners(): void {
    this.#bot.on('message', (msg) => {
      this.handleUpdate(msg).catch((err: unknown) => {
        log.error({ err }, 'Unhandled error processing Telegram update');
      });
    });

    this.#bot.on('polling_error', (err) => {
      log.error({ err: err.message }, 'Telegram polling error');
    });
  }

  /** Send a plain-text reply to a chat. */
  async sendText(chatId: number | string, text: string): Promise<void> {
    await this.#bot.sendMessage(chatId, text);
  }

  /** Gracefully stop the polling loop. */
  async stop(): Promise<void> {
    await this.#bot.stopPolling();
  }
}
