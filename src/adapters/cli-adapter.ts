import { randomUUID } from 'node:crypto';
import { createCanonicalMessage, parseCommandRequest } from '../core/models.js';
import { ValidationError, type GatewayError } from '../core/errors.js';
import type { MessageProcessor } from '../core/message-processor.js';
import { RingBuffer } from '../utils/ring-buffer.js';
import type {
  CanonicalMessage,
  CliReply,
  CommandHistoryEntry,
  CommandRequest,
  GatewayStatsSnapshot,
} from '../types/messaging.js';
import {
  BaseAdapter,
  type AdapterOptions,
  type FailureContext,
  type HandledRequest,
  type ReplySummary,
} from './base-adapter.js';

export const BUILTIN_COMMANDS = {
  help: 'Show command help',
  status: 'Show system status',
  stats: 'Show gateway statistics',
  send: 'Send a message for processing',
  history: 'Show command history',
  clear: 'Clear command history',
} as const;

export type BuiltinCommand = keyof typeof BUILTIN_COMMANDS;

export const DEFAULT_HISTORY_CAPACITY = 100;
export const HISTORY_RENDER_LIMIT = 10;

export interface CliAdapterOptions extends AdapterOptions {
  historyCapacity?: number;
}

/** A command request, plus the canonical message it was reshaped from when routed. */
export type CliAdapterRequest = CommandRequest & { routed?: CanonicalMessage };

export interface CliHelp {
  commands: Record<BuiltinCommand, string>;
  usage: string;
  examples: Array<{ command: string; args: string[]; description: string }>;
}

function isBuiltinCommand(command: string): command is BuiltinCommand {
  return Object.prototype.hasOwnProperty.call(BUILTIN_COMMANDS, command);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatClock(date: Date): string {
  return date.toISOString().slice(11, 19);
}

export function formatHelp(): string {
  const lines = ['Available commands:', ''];
  for (const [command, description] of Object.entries(BUILTIN_COMMANDS)) {
    lines.push(`  ${command.padEnd(12)} - ${description}`);
  }
  lines.push('', 'Examples:', '  send Hello, how are you?', '  status', '  history');
  return lines.join('\n');
}

export function formatStatus(stats: GatewayStatsSnapshot): string {
  return [
    'Gateway status:',
    `  Uptime: ${(stats.uptimeSeconds / 3600).toFixed(1)} hours`,
    `  Total messages: ${stats.totalMessages}`,
    `  Active sessions: ${stats.activeSessions}`,
    `  Errors: ${stats.errors}`,
  ].join('\n');
}

export function formatStats(stats: GatewayStatsSnapshot): string {
  const byClient = stats.messagesByClientType;
  return [
    'Detailed gateway statistics:',
    `  Total messages: ${stats.totalMessages}`,
    '',
    '  By client type:',
    `    Telegram: ${byClient.telegram}`,
    `    Web: ${byClient.web}`,
    `    CLI: ${byClient.cli}`,
    '',
    `  Active sessions: ${stats.activeSessions}`,
    `  Errors: ${stats.errors}`,
    `  Uptime: ${stats.uptimeSeconds.toFixed(1)} seconds`,
  ].join('\n');
}

export function formatHistory(entries: CommandHistoryEntry[]): string {
  if (entries.length === 0) {
    return 'Command history is empty';
  }

  const lines = entries.map((entry, index) => {
    const line = `  ${String(index + 1).padStart(2)}. [${formatClock(entry.timestamp)}] ${entry.command} ${entry.args.join(' ')}`;
    return line.trimEnd();
  });
  return ['Command history:', '', ...lines].join('\n');
}

/**
 * Command-line adapter. Built-ins run locally; `send` and anything unrecognized
 * go through the processor.
 */
export class CliAdapter extends BaseAdapter<CliAdapterRequest, CliReply> {
  readonly clientType = 'cli' as const;
  readonly #history: RingBuffer<CommandHistoryEntry>;

  constructor(processor: MessageProcessor, options: CliAdapterOptions = {}) {
    super(processor, 'CLI', options);
    this.#history = new RingBuffer(options.historyCapacity ?? DEFAULT_HISTORY_CAPACITY);
  }

  get historySize(): number {
    return this.#history.size;
  }

  history(): CommandHistoryEntry[] {
    return this.#history.toArray().map((entry) => ({ ...entry, args: [...entry.args] }));
  }

  getHelp(): CliHelp {
    return {
      commands: { ...BUILTIN_COMMANDS },
      usage:
        'POST /cli/execute with JSON: {"command": "<command>", "args": ["<arg>"], "userId": "<id>"}',
      examples: [
        { command: 'help', args: [], description: 'Show command help' },
        { command: 'send', args: ['Hello', 'world'], description: 'Send a message' },
        { command: 'status', args: [], description: 'Show system status' },
      ],
    };
  }

  protected async onShutdown(): Promise<void> {
    this.#history.clear();
  }

  protected parseRequest(raw: unknown): CommandRequest {
    return parseCommandRequest(raw);
  }

  /**
   * Routed `command` messages are tokenized into a command line. Anything else
   * is forwarded unchanged through `send`.
   */
  protected fromCanonical(message: CanonicalMessage): CliAdapterRequest {
    const tokens = message.content.trim().split(/\s+/).filter((token) => token.length > 0);

    if (message.messageType !== 'command') {
      return { command: 'send', args: tokens, userId: message.userId, options: {}, routed: message };
    }

    const options = message.metadata.options;
    const request = parseCommandRequest({
      command: tokens[0] ?? '',
      args: tokens.slice(1),
      userId: message.userId,
      options: isRecord(options) ? options : {},
    });
    return { ...request, routed: message };
  }

  protected async handle(request: CliAdapterRequest, correlationId?: string): Promise<HandledRequest<CliReply>> {
    const { routed } = request;
    const issuedAt = routed?.timestamp ?? this.now();
    this.#history.push({
      command: request.command,
      args: [...request.args],
      timestamp: issuedAt,
      userId: request.userId,
    });

    if (isBuiltinCommand(request.command)) {
      return this.#runBuiltin(request.command, request, issuedAt, correlationId);
    }

    const message = createCanonicalMessage({
      id: correlationId ?? randomUUID(),
      clientType: 'cli',
      messageType: 'command',
      content: `${request.command} ${request.args.join(' ')}`.trim(),
      userId: request.userId,
      ...(routed?.userName !== undefined ? { userName: routed.userName } : {}),
      timestamp: issuedAt,
      metadata: {
        ...routed?.metadata,
        command: request.command,
        args: [...request.args],
        options: { ...request.options },
      },
    });
    const response = await this.processor.process(message);

    return {
      reply: {
        success: true,
        output: response.content,
        command: request.command,
        timestamp: this.now().toISOString(),
      },
      activityAt: message.timestamp,
    };
  }

  async #runBuiltin(
    command: BuiltinCommand,
    request: CliAdapterRequest,
    issuedAt: Date,
    correlationId?: string,
  ): Promise<HandledRequest<CliReply>> {
    const local = (output: string): HandledRequest<CliReply> => ({
      reply: { success: true, output },
      activityAt: issuedAt,
    });

    switch (command) {
      case 'help':
        return local(formatHelp());
      case 'status':
        return local(formatStatus(this.processor.getStats()));
      case 'stats':
        return local(formatStats(this.processor.getStats()));
      case 'history':
        return local(formatHistory(this.#history.recent(HISTORY_RENDER_LIMIT)));
      case 'clear':
        this.#history.clear();
        return local('Command history cleared');
      case 'send': {
        if (request.args.length === 0) {
          throw new ValidationError('Usage: send <message>');
        }
        const { routed } = request;
        const passthrough = routed !== undefined && routed.messageType !== 'command' ? routed : undefined;
        const message = createCanonicalMessage({
          id: correlationId ?? randomUUID(),
          clientType: 'cli',
          messageType: passthrough?.messageType ?? 'text',
          content: passthrough?.content ?? request.args.join(' '),
          userId: request.userId,
          ...(routed?.userName !== undefined ? { userName: routed.userName } : {}),
          timestamp: issuedAt,
          metadata: { ...routed?.metadata, viaCli: true },
        });
        const response = await this.processor.process(message);
        return { reply: { success: true, output: response.content }, activityAt: message.timestamp };
      }
      default: {
        const unreachable: never = command;
        throw new ValidationError(`Unknown command: ${String(unreachable)}`);
      }
    }
  }

  protected toFailure(error: GatewayError, _context: FailureContext<CliAdapterRequest>): CliReply {
    return { success: false, error: error.message, errorKind: error.kind };
  }

  protected summarize(reply: CliReply): ReplySummary {
    return reply.success
      ? { ok: true, content: reply.output }
      : { ok: false, error: reply.error, errorKind: reply.errorKind };
  }

  protected healthExtras(): Record<string, unknown> {
    return { commandHistorySize: this.#history.size };
  }
}
