import { createCanonicalResponse } from './models.js';
import { errorMessage, ProcessingFailureError } from './errors.js';
import { EchoResponseGenerator } from './response-generator.js';
import { createLogger } from '../utils/logger.js';
import {
  CLIENT_TYPES,
  type CanonicalMessage,
  type CanonicalResponse,
  type ClientType,
  type GatewayStatsSnapshot,
  type ResponseGenerator,
  type SessionSource,
} from '../types/messaging.js';

const PREVIEW_LENGTH = 50;

const CLIENT_LABELS: Record<ClientType, string> = {
  telegram: 'Telegram',
  web: 'Web',
  cli: 'CLI',
};

export const HELP_TEXT = `
Available commands:
/help - show this help
/start - greeting
/status - system status
/stats - gateway statistics

Any other text message is passed on for processing.
`.trim();

export function formatUptime(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m ${seconds % 60}s`;
}

/**
 * Aggregate counters for every message that reaches the processor.
 * Mutated only through the `record*` methods; read through `snapshot()`.
 */
export class GatewayStats {
  readonly startTime: Date;
  #totalMessages = 0;
  #errors = 0;
  readonly #byClientType: Record<ClientType, number>;

  constructor(startTime: Date) {
    this.startTime = startTime;
    this.#byClientType = { telegram: 0, web: 0, cli: 0 };
  }

  recordMessage(clientType: ClientType): void {
    this.#totalMessages += 1;
    this.#byClientType[clientType] += 1;
  }

  recordError(): void {
    this.#errors += 1;
  }

  snapshot(now: Date, activeSessions: number): GatewayStatsSnapshot {
    return Object.freeze({
      totalMessages: this.#totalMessages,
      messagesByClientType: Object.freeze({ ...this.#byClientType }),
      errors: this.#errors,
      startTime: this.startTime.toISOString(),
      uptimeSeconds: Math.max(0, (now.getTime() - this.startTime.getTime()) / 1000),
      activeSessions,
    });
  }
}

export interface MessageProcessorOptions {
  generator?: ResponseGenerator;
  now?: () => Date;
  sessionSource?: SessionSource;
}

/**
 * Central processor. Every canonical message from every adapter flows through
 * `process`, which always resolves with exactly one CanonicalResponse.
 */
export class MessageProcessor {
  readonly #stats: GatewayStats;
  readonly #generator: ResponseGenerator;
  readonly #now: () => Date;
  readonly #log = createLogger('processor');
  #sessionSource?: SessionSource;

  constructor(options: MessageProcessorOptions = {}) {
    this.#now = options.now ?? (() => new Date());
    this.#generator = options.generator ?? new EchoResponseGenerator();
    this.#sessionSource = options.sessionSource;
    this.#stats = new GatewayStats(this.#now());
  }

  /** Register the component that owns client sessions (the web adapter). */
  attachSessionSource(source: SessionSource): void {
    this.#sessionSource = source;
  }

  async process(message: CanonicalMessage): Promise<CanonicalResponse> {
    // Counted before anything can fail so stats reflect attempted work.
    this.#stats.recordMessage(message.clientType);
    this.#log.info(
      {
        messageId: message.id,
        clientType: message.clientType,
        preview: message.content.slice(0, PREVIEW_LENGTH),
      },
      'Processing message',
    );

    try {
      const content = await this.#resolveContent(message);
      return createCanonicalResponse({
        messageId: message.id,
        clientType: message.clientType,
        content,
        responseType: 'text',
      });
    } catch (err) {
      const failure =
        err instanceof ProcessingFailureError
          ? err
          : new ProcessingFailureError(errorMessage(err), { cause: err });
      this.#stats.recordError();
      this.#log.error({ messageId: message.id, err: failure }, 'Message processing failed');

      const response: CanonicalResponse = {
        messageId: message.id,
        clientType: message.clientType,
        content: `An error occurred while processing the message: ${failure.message}`,
        responseType: 'text',
        metadata: Object.freeze({ errorKind: failure.kind, error: failure.message }),
      };
      return Object.freeze(response);
    }
  }

  getStats(): GatewayStatsSnapshot {
    return this.#stats.snapshot(this.#now(), this.#sessionSource?.activeSessionCount ?? 0);
  }

  async #resolveContent(message: CanonicalMessage): Promise<string> {
    if (message.messageType === 'command') {
      return this.#handleCommand(message);
    }

    const lowered = message.content.toLowerCase();
    if (lowered.startsWith('/help')) {
      return HELP_TEXT;
    }
    if (lowered.startsWith('/status')) {
      return this.#statusText();
    }

    try {
      return await this.#generator.generate(message);
    } catch (err) {
      throw new ProcessingFailureError(errorMessage(err), { cause: err });
    }
  }

  #handleCommand(message: CanonicalMessage): string {
    const command = message.content.trim();

    switch (command) {
      case '/start':
        return `Hello, ${message.userName ?? message.userId}! I am the gateway bot that unifies the CLI, Web and Telegram interfaces.`;
      case '/stats':
        return this.#statusText();
      default:
        return `Unknown command: ${command}`;
    }
  }

  #statusText(): string {
    const stats = this.getStats();
    const perClient = CLIENT_TYPES.map(
      (clientType) => `  - ${CLIENT_LABELS[clientType]}: ${stats.messagesByClientType[clientType]}`,
    );

    return [
      'Gateway status:',
      `• Uptime: ${formatUptime(stats.uptimeSeconds)}`,
      `• Total messages: ${stats.totalMessages}`,
      `• Errors: ${stats.errors}`,
      '• Messages by client:',
      ...perClient,
    ].join('\n');
  }
}
