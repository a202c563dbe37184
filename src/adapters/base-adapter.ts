import type { Logger } from 'pino';
import type { MessageProcessor } from '../core/message-processor.js';
import {
  AdapterNotReadyError,
  errorMessage,
  isGatewayError,
  ProcessingFailureError,
  type GatewayError,
} from '../core/errors.js';
import { createLogger, scrubSensitiveText } from '../utils/logger.js';
import type {
  AdapterHealth,
  AdapterStatus,
  CanonicalMessage,
  ClientType,
  RouterReply,
} from '../types/messaging.js';

export interface AdapterOptions {
  now?: () => Date;
}

/** What a variant hands back after a request was handled successfully. */
export interface HandledRequest<TReply> {
  reply: TReply;
  /** Timestamp recorded as the adapter's `lastActivity`. */
  activityAt: Date;
}

export interface FailureContext<TRequest> {
  request?: TRequest;
  correlationId?: string;
}

export type ReplySummary =
  | { ok: true; content: string }
  | { ok: false; error: string; errorKind: string };

/**
 * Shared adapter lifecycle and bookkeeping.
 *
 * Variants only describe how their protocol is parsed, handled and rendered;
 * health gating, counters and error containment live here so that every
 * client surface behaves identically at the boundary.
 */
export abstract class BaseAdapter<TRequest, TReply> {
  abstract readonly clientType: ClientType;

  protected readonly processor: MessageProcessor;
  protected readonly now: () => Date;
  protected readonly log: Logger;
  readonly #label: string;
  readonly #status: AdapterStatus = {
    isHealthy: false,
    lastActivity: null,
    errorCount: 0,
    messageCount: 0,
  };

  protected constructor(processor: MessageProcessor, label: string, options: AdapterOptions = {}) {
    this.processor = processor;
    this.now = options.now ?? (() => new Date());
    this.#label = label;
    this.log = createLogger(`adapter:${label.toLowerCase()}`);
  }

  get label(): string {
    return this.#label;
  }

  get status(): Readonly<AdapterStatus> {
    return { ...this.#status };
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────────

  /** Mark the adapter ready. Never rejects; a failing start-up hook leaves it unhealthy. */
  async initialize(): Promise<void> {
    if (this.#status.isHealthy) return;

    try {
      await this.onInitialize();
      this.#status.isHealthy = true;
      this.log.info(`${this.#label} adapter initialized`);
    } catch (err) {
      this.#status.isHealthy = false;
      this.log.error({ err }, `${this.#label} adapter failed to initialize`);
    }
  }

  /** Drop ephemeral state. Health flag and counters are left as they are. */
  async shutdown(): Promise<void> {
    try {
      await this.onShutdown();
    } catch (err) {
      this.log.error({ err }, `${this.#label} adapter shutdown hook failed`);
    }
    this.log.info(`${this.#label} adapter stopped`);
  }

  protected async onInitialize(): Promise<void> {}

  protected async onShutdown(): Promise<void> {}

  // ── Dispatch ─────────────────────────────────────────────────────────────────

  /** Handle a protocol-native request. Always resolves with exactly one reply. */
  dispatch(raw: unknown): Promise<TReply> {
    return this.#run(() => this.parseRequest(raw));
  }

  /** Router entry point: the message keeps its id for correlation. */
  async dispatchCanonical(message: CanonicalMessage): Promise<RouterReply> {
    const reply = await this.#run(() => this.fromCanonical(message), message.id);
    const summary = this.summarize(reply);

    return summary.ok
      ? { status: 'ok', messageId: message.id, response: summary.content }
      : { status: 'error', messageId: message.id, response: summary.error, errorKind: summary.errorKind };
  }

  healthCheck(): AdapterHealth {
    return {
      healthy: this.#status.isHealthy,
      lastActivity: this.#status.lastActivity?.toISOString() ?? null,
      messageCount: this.#status.messageCount,
      errorCount: this.#status.errorCount,
      ...this.healthExtras(),
    };
  }

  async #run(build: () => TRequest, correlationId?: string): Promise<TReply> {
    if (!this.#status.isHealthy) {
      const notReady = new AdapterNotReadyError(this.#label);
      this.log.warn({ correlationId }, notReady.message);
      return this.toFailure(notReady, { correlationId });
    }

    let request: TRequest | undefined;
    try {
      request = build();
      const handled = await this.handle(request, correlationId);
      this.#recordSuccess(handled.activityAt);
      return handled.reply;
    } catch (err) {
      this.#recordFailure();
      const failure: GatewayError = isGatewayError(err)
        ? err
        : new ProcessingFailureError(scrubSensitiveText(errorMessage(err)), { cause: err });
      this.log.error({ correlationId, kind: failure.kind, err: failure }, `${this.#label} request failed`);
      return this.toFailure(failure, { request, correlationId });
    }
  }

  // Counter updates are synchronous so interleaved dispatches cannot lose increments.
  #recordSuccess(at: Date): void {
    this.#status.messageCount += 1;
    this.#status.lastActivity = at;
  }

  #recordFailure(): void {
    this.#status.errorCount += 1;
  }

  // ── Variant hooks ────────────────────────────────────────────────────────────

  /** Validate an untrusted payload; throws ValidationError. */
  protected abstract parseRequest(raw: unknown): TRequest;

  /** Reshape a routed canonical message into this protocol's request. */
  protected abstract fromCanonical(message: CanonicalMessage): TRequest;

  protected abstract handle(request: TRequest, correlationId?: string): Promise<HandledRequest<TReply>>;

  protected abstract toFailure(error: GatewayError, context: FailureContext<TRequest>): TReply;

  protected abstract summarize(reply: TReply): ReplySummary;

  protected healthExtras(): Record<string, unknown> {
    return {};
  }
}
