import { randomUUID } from 'node:crypto';
import { createCanonicalMessage, parseWebRequest } from '../core/models.js';
import type { GatewayError } from '../core/errors.js';
import type { MessageProcessor } from '../core/message-processor.js';
import { SessionStore, type SessionStoreOptions } from '../services/session-store.js';
import type { CanonicalMessage, MessageMetadata, WebReply, WebRequest } from '../types/messaging.js';
import {
  BaseAdapter,
  type AdapterOptions,
  type FailureContext,
  type HandledRequest,
  type ReplySummary,
} from './base-adapter.js';

export interface WebAdapterOptions extends AdapterOptions {
  sessions?: SessionStore | Partial<Omit<SessionStoreOptions, 'now'>>;
}

/** A web request, plus the canonical message it was reshaped from when routed. */
export type WebAdapterRequest = WebRequest & { routed?: CanonicalMessage };

export interface WebStatus {
  healthy: boolean;
  activeSessions: number;
  lastActivity: string | null;
  messageCount: number;
  errorCount: number;
  sessions: Record<string, { userId: string; lastActivity: string }>;
}

/**
 * Web session adapter. Owns the gateway's only session table and registers it
 * with the processor as the source of the `activeSessions` statistic.
 */
export class WebAdapter extends BaseAdapter<WebAdapterRequest, WebReply> {
  readonly clientType = 'web' as const;
  readonly #sessions: SessionStore;

  constructor(processor: MessageProcessor, options: WebAdapterOptions = {}) {
    super(processor, 'Web', options);
    this.#sessions =
      options.sessions instanceof SessionStore
        ? options.sessions
        : new SessionStore({ ...options.sessions, now: this.now });
    processor.attachSessionSource(this.#sessions);
  }

  get sessions(): SessionStore {
    return this.#sessions;
  }

  getStatus(): WebStatus {
    const health = this.healthCheck();
    const sessions: WebStatus['sessions'] = {};
    for (const [sessionId, record] of this.#sessions.entries()) {
      sessions[sessionId] = {
        userId: record.userId,
        lastActivity: record.lastActivity.toISOString(),
      };
    }

    return {
      healthy: health.healthy,
      activeSessions: Object.keys(sessions).length,
      lastActivity: health.lastActivity,
      messageCount: health.messageCount,
      errorCount: health.errorCount,
      sessions,
    };
  }

  protected async onShutdown(): Promise<void> {
    this.#sessions.clear();
  }

  protected parseRequest(raw: unknown): WebRequest {
    return parseWebRequest(raw);
  }

  protected fromCanonical(message: CanonicalMessage): WebAdapterRequest {
    const sessionId = message.metadata.sessionId;
    const request = parseWebRequest({
      content: message.content,
      userId: message.userId,
      messageType: message.messageType,
      ...(typeof sessionId === 'string' && sessionId.length > 0 ? { sessionId } : {}),
    });
    return { ...request, routed: message };
  }

  protected async handle(request: WebAdapterRequest, correlationId?: string): Promise<HandledRequest<WebReply>> {
    const { routed } = request;
    const metadata: MessageMetadata = { userAgent: 'web_client', ...routed?.metadata };
    if (request.sessionId) {
      metadata.sessionId = request.sessionId;
    }

    const message = createCanonicalMessage({
      id: correlationId ?? randomUUID(),
      clientType: 'web',
      messageType: request.messageType,
      content: request.content,
      userId: request.userId,
      ...(routed?.userName !== undefined ? { userName: routed.userName } : {}),
      timestamp: routed?.timestamp ?? this.now(),
      metadata,
    });

    const response = await this.processor.process(message);

    // Sessions age on the gateway clock so eviction order follows arrival.
    if (request.sessionId) {
      this.#sessions.touch(request.sessionId, request.userId, this.now());
    }

    return {
      reply: {
        success: true,
        response: {
          content: response.content,
          type: response.responseType,
          timestamp: this.now().toISOString(),
        },
      },
      activityAt: message.timestamp,
    };
  }

  protected toFailure(error: GatewayError, _context: FailureContext<WebAdapterRequest>): WebReply {
    return { success: false, error: error.message, errorKind: error.kind };
  }

  protected summarize(reply: WebReply): ReplySummary {
    return reply.success
      ? { ok: true, content: reply.response.content }
      : { ok: false, error: reply.error, errorKind: reply.errorKind };
  }

  protected healthExtras(): Record<string, unknown> {
    return { activeSessions: this.#sessions.activeSessionCount };
  }
}
