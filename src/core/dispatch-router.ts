import type { TelegramAdapter } from '../adapters/telegram-adapter.js';
import type { WebAdapter } from '../adapters/web-adapter.js';
import type { CliAdapter } from '../adapters/cli-adapter.js';
import { parseCanonicalMessage, clientTypeSchema } from './models.js';
import { UnsupportedClientTypeError } from './errors.js';
import { createLogger } from '../utils/logger.js';
import type { AdapterHealth, CanonicalMessage, ClientType, RouterReply } from '../types/messaging.js';

export interface GatewayAdapters {
  telegram: TelegramAdapter;
  web: WebAdapter;
  cli: CliAdapter;
}

type LifecycleAdapter = GatewayAdapters[keyof GatewayAdapters];

function readClientTag(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('clientType' in raw)) {
    return undefined;
  }
  const tag = raw.clientType;
  return typeof tag === 'string' ? tag : undefined;
}

/**
 * Routes a canonical message to the adapter that owns its client type and
 * fans adapter lifecycle calls out to all of them.
 */
export class DispatchRouter {
  readonly #adapters: GatewayAdapters;
  readonly #log = createLogger('router');

  constructor(adapters: GatewayAdapters) {
    this.#adapters = adapters;
  }

  get adapters(): Readonly<GatewayAdapters> {
    return this.#adapters;
  }

  /**
   * Validate an untrusted body and route it. An unknown client tag surfaces as
   * UnsupportedClientTypeError rather than a generic validation failure.
   */
  async routeRaw(raw: unknown): Promise<RouterReply> {
    const tag = readClientTag(raw);
    if (tag !== undefined && !clientTypeSchema.safeParse(tag).success) {
      throw new UnsupportedClientTypeError(tag);
    }
    return this.route(parseCanonicalMessage(raw));
  }

  async route(message: CanonicalMessage): Promise<RouterReply> {
    const clientType: ClientType = message.clientType;
    this.#log.debug({ messageId: message.id, clientType }, 'Routing message');

    switch (clientType) {
      case 'telegram':
        return this.#adapters.telegram.dispatchCanonical(message);
      case 'web':
        return this.#adapters.web.dispatchCanonical(message);
      case 'cli':
        return this.#adapters.cli.dispatchCanonical(message);
      default: {
        const unsupported: never = clientType;
        throw new UnsupportedClientTypeError(String(unsupported));
      }
    }
  }

  /** Start every adapter concurrently; one failure never cancels the others. */
  async initializeAll(): Promise<void> {
    await this.#fanOut('initialize', (adapter) => adapter.initialize());
  }

  async shutdownAll(): Promise<void> {
    await this.#fanOut('shutdown', (adapter) => adapter.shutdown());
  }

  healthSnapshot(): Record<ClientType, AdapterHealth> {
    return {
      telegram: this.#adapters.telegram.healthCheck(),
      web: this.#adapters.web.healthCheck(),
      cli: this.#adapters.cli.healthCheck(),
    };
  }

  async #fanOut(phase: string, run: (adapter: LifecycleAdapter) => Promise<void>): Promise<void> {
    const adapters: LifecycleAdapter[] = [this.#adapters.telegram, this.#adapters.web, this.#adapters.cli];
    const results = await Promise.allSettled(adapters.map((adapter) => run(adapter)));

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.#log.error({ adapter: adapters[index]?.label, err: result.reason }, `Adapter ${phase} rejected`);
      }
    });
  }
}
