import { describe, expect, it, vi } from 'vitest';
import {
  CliAdapter,
  formatHelp,
  formatHistory,
  formatStatus,
  HISTORY_RENDER_LIMIT,
} from '../../src/adapters/cli-adapter.js';
import { MessageProcessor } from '../../src/core/message-processor.js';
import type { GatewayStatsSnapshot, ResponseGenerator } from '../../src/types/messaging.js';

const NOW = new Date('2024-05-01T08:05:09.000Z');

async function readyAdapter(generator: ResponseGenerator = { generate: async (m) => `cli:${m.content}` }) {
  const processor = new MessageProcessor({ now: () => NOW, generator });
  const adapter = new CliAdapter(processor, { now: () => NOW, historyCapacity: 20 });
  await adapter.initialize();
  return { adapter, processor };
}

describe('CLI formatters', () => {
  it('lists every built-in command in help output', () => {
    const lines = formatHelp().split('\n');

    expect(lines[0]).toBe('Available commands:');
    expect(lines).toContain('  help         - Show command help');
    expect(lines).toContain('  send         - Send a message for processing');
    expect(lines).toContain('  clear        - Clear command history');
  });

  it('renders uptime in hours with one decimal', () => {
    const stats: GatewayStatsSnapshot = {
      totalMessages: 5,
      messagesByClientType: { telegram: 1, web: 2, cli: 2 },
      errors: 1,
      startTime: '2024-05-01T00:00:00.000Z',
      uptimeSeconds: 5400,
      activeSessions: 3,
    };

    expect(formatStatus(stats)).toBe(
      [
        'Gateway status:',
        '  Uptime: 1.5 hours',
        '  Total messages: 5',
        '  Active sessions: 3',
        '  Errors: 1',
      ].join('\n'),
    );
  });

  it('numbers history entries with their UTC time', () => {
    expect(formatHistory([])).toBe('Command history is empty');
    expect(
      formatHistory([
        { command: 'send', args: ['hi'], timestamp: NOW, userId: 'u' },
        { command: 'status', args: [], timestamp: NOW, userId: 'u' },
      ]),
    ).toBe('Command history:\n\n   1. [08:05:09] send hi\n   2. [08:05:09] status');
  });
});

describe('CliAdapter', () => {
  it('sends joined arguments through the processor as text', async () => {
    const generate = vi.fn(async (m: { content: string; messageType: string }) => `cli:${m.content}`);
    const { adapter, processor } = await readyAdapter({ generate });

    const reply = await adapter.dispatch({ command: 'send', args: ['hello', 'world'], userId: 'u1' });

    expect(reply).toEqual({ success: true, output: 'cli:hello world' });
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0].messageType).toBe('text');
    expect(processor.getStats().messagesByClientType.cli).toBe(1);
  });

  it('rejects send without a message', async () => {
    const { adapter } = await readyAdapter();

    const reply = await adapter.dispatch({ command: 'send', userId: 'u1' });

    expect(reply).toEqual({ success: false, error: 'Usage: send <message>', errorKind: 'validation' });
    expect(adapter.status.errorCount).toBe(1);
    expect(adapter.historySize).toBe(1);
  });

  it('forwards unknown commands as command messages', async () => {
    const { adapter } = await readyAdapter();

    const reply = await adapter.dispatch({ command: 'deploy', args: ['--now'], userId: 'u1' });

    expect(reply).toEqual({
      success: true,
      output: 'Unknown command: deploy --now',
      command: 'deploy',
      timestamp: NOW.toISOString(),
    });
  });

  it('runs status locally without counting the message in the processor', async () => {
    const { adapter, processor } = await readyAdapter();

    const reply = await adapter.dispatch({ command: 'status', userId: 'u1' });

    expect(reply).toEqual({
      success: true,
      output: [
        'Gateway status:',
        '  Uptime: 0.0 hours',
        '  Total messages: 0',
        '  Active sessions: 0',
        '  Errors: 0',
      ].join('\n'),
    });
    expect(adapter.status.messageCount).toBe(1);
    expect(processor.getStats().totalMessages).toBe(0);
  });

  it('records history, renders the most recent entries and clears on request', async () => {
    const { adapter } = await readyAdapter();

    for (let i = 0; i < HISTORY_RENDER_LIMIT + 2; i += 1) {
      await adapter.dispatch({ command: 'send', args: [`m${i}`], userId: 'u1' });
    }
    const history = await adapter.dispatch({ command: 'history', userId: 'u1' });

    expect(history.success).toBe(true);
    if (history.success) {
      const lines = history.output.split('\n');
      expect(lines).toHaveLength(2 + HISTORY_RENDER_LIMIT);
      expect(lines[2]).toBe('   1. [08:05:09] send m3');
      expect(lines[lines.length - 1]).toBe('  10. [08:05:09] history');
    }

    const cleared = await adapter.dispatch({ command: 'clear', userId: 'u1' });
    expect(cleared).toEqual({ success: true, output: 'Command history cleared' });
    expect(adapter.historySize).toBe(0);
    expect(adapter.history()).toEqual([]);
  });

  it('keeps at most the configured number of history entries', async () => {
    const processor = new MessageProcessor();
    const adapter = new CliAdapter(processor, { historyCapacity: 3 });
    await adapter.initialize();

    for (const command of ['help', 'status', 'stats', 'help']) {
      await adapter.dispatch({ command, userId: 'u1' });
    }

    expect(adapter.history().map((entry) => entry.command)).toEqual(['status', 'stats', 'help']);
    expect(adapter.healthCheck().commandHistorySize).toBe(3);
  });

  it('describes its commands for the help endpoint', async () => {
    const { adapter } = await readyAdapter();
    const help = adapter.getHelp();

    expect(Object.keys(help.commands)).toEqual(['help', 'status', 'stats', 'send', 'history', 'clear']);
    expect(help.examples[1]).toEqual({ command: 'send', args: ['Hello', 'world'], description: 'Send a message' });
  });

  it('drops command history on shutdown', async () => {
    const { adapter } = await readyAdapter();
    await adapter.dispatch({ command: 'help', userId: 'u1' });

    await adapter.shutdown();

    expect(adapter.historySize).toBe(0);
  });
});
