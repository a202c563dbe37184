import type { CanonicalMessage, ResponseGenerator } from '../types/messaging.js';

/**
 * Placeholder generator that echoes the inbound text. Swap in a model-backed
 * implementation through `MessageProcessorOptions.generator`.
 */
export class EchoResponseGenerator implements ResponseGenerator {
  async generate(message: CanonicalMessage): Promise<string> {
    return (
      `Received message: ${message.content}\n\n` +
      'This is a demo reply from the gateway; plug a ResponseGenerator in to produce real answers.'
    );
  }
}
