import { createCanonicalMessage, parseBotPayload } from '../core/models.js';
import type { GatewayError } from '../core/errors.js';
import type { MessageProcessor } from '../core/message-processor.js';
import type { BotPayload, BotReply, CanonicalMessage } from '../types/messaging.js';
import {
  BaseAdapter,
  type AdapterOptions,
  type FailureContext,
  type HandledRequest,
  type ReplySummary,
} from './base-adapter.js';

/**
 * Bot-protocol adapter. Payloads arrive already shaped like canonical messages
 * (the bot transport builds them), so normalization is validation plus the
 * `metadata.chatId` the reply must be routed to.
 */
export class TelegramAdapter extends BaseAdapter<BotPayload, BotReply> {
  readonly clientType = 'telegram' as const;

  constructor(processor: MessageProcessor, options: AdapterOptions = {}) {
    super(processor, 'Telegram', options);
  }

  protected parseRequest(raw: unknown): BotPayload {
    return parseBotPayload(raw);
  }

  protected fromCanonical(message: CanonicalMessage): BotPayload {
    return parseBotPayload({ ...message, metadata: { ...message.metadata } });
  }

  protected async handle(payload: BotPayload): Promise<HandledRequest<BotReply>> {
    const message = createCanonicalMessage(payload);
    const response = await this.processor.process(message);

    return {
      reply: {
        success: true,
        messageId: response.messageId,
        chatId: payload.metadata.chatId,
        text: response.content,
      },
      activityAt: message.timestamp,
    };
  }

  protected toFailure(error: GatewayError, context: FailureContext<BotPayload>): BotReply {
    const text =
      error.kind === 'adapter_not_ready'
        ? error.message
        : `An error occurred while processing the message: ${error.message}`;

    return {
      success: false,
      messageId: context.request?.id ?? context.correlationId ?? '',
      chatId: context.request?.metadata.chatId ?? null,
      text,
      error: error.message,
      errorKind: error.kind,
    };
  }

  protected summarize(reply: BotReply): ReplySummary {
    return reply.success
      ? { ok: true, content: reply.text }
      : { ok: false, error: reply.error, errorKind: reply.errorKind };
  }
}
