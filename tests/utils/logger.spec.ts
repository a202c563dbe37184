import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { scrubSensitiveText } from '../../src/utils/logger.js';

describe('scrubSensitiveText', () => {
  const envName = 'TELEGRAM_BOT_TOKEN';
  let previousEnvValue: string | undefined;

  beforeEach(() => {
    previousEnvValue = process.env[envName];
    process.env[envName] = 'test-secret-token-123';
  });

  afterEach(() => {
    if (previousEnvValue === undefined) {
      delete process.env[envName];
    } else {
      process.env[envName] = previousEnvValue;
    }
  });

  it('redacts configured secret values wherever they appear', () => {
    expect(scrubSensitiveText('polling failed for bot test-secret-token-123 (401)')).toBe(
      'polling failed for bot [REDACTED] (401)',
    );
  });

  it('redacts key=value style credentials', () => {
    expect(scrubSensitiveText('retrying with api_key=placeholder-value next')).toBe(
      'retrying with api_key=[REDACTED] next',
    );
    expect(scrubSensitiveText('password: "hunter"')).toBe('password=[REDACTED]');
  });

  it('leaves ordinary text alone', () => {
    expect(scrubSensitiveText('Web adapter is not ready')).toBe('Web adapter is not ready');
  });
});
