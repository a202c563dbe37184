import { MessageProcessor } from './message-processor.js';
import { DispatchRouter } from './dispatch-router.js';
import { TelegramAdapter } from '../adapters/telegram-adapter.js';
import { WebAdapter } from '../adapters/web-adapter.js';
import { CliAdapter } from '../adapters/cli-adapter.js';
import type { ResponseGenerator } from '../types/messaging.js';

export interface GatewayOptions {
  generator?: ResponseGenerator;
  now?: () => Date;
  sessions?: { capacity?: number; ttlMs?: number };
  cliHistoryCapacity?: number;
}

export interface Gateway {
  processor: MessageProcessor;
  router: DispatchRouter;
}

/** Wire the processor, the three adapters and the router together. */
export function createGateway(options: GatewayOptions = {}): Gateway {
  const processor = new MessageProcessor({ generator: options.generator, now: options.now });
  const router = new DispatchRouter({
    telegram: new TelegramAdapter(processor, { now: options.now }),
    web: new WebAdapter(processor, { now: options.now, sessions: options.sessions }),
    cli: new CliAdapter(processor, { now: options.now, historyCapacity: options.cliHistoryCapacity }),
  });

  return { processor, router };
}
