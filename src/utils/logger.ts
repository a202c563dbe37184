import pino, { type Logger } from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const SENSITIVE_KEY_PATTERN = /(API_KEY|TOKEN|SECRET|PASSWORD)/i;
const MIN_SECRET_LENGTH = 6;
const REDACTED = '[REDACTED]';

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

function shouldPrettyPrint(level: LogLevel): boolean {
  if (level === 'silent' || process.env.NO_COLOR === '1') {
    return false;
  }
  return process.stdout.isTTY === true;
}

const initialLevel = resolveLevel(process.env.LOG_LEVEL);

export const logger: Logger = pino({
  level: initialLevel,
  ...(shouldPrettyPrint(initialLevel)
    ? { transport: { target: 'pino-pretty', options: { colorize: true } } }
    : {}),
});

/** Child logger tagged with the emitting component. */
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export function configureLogger(level?: string): void {
  const normalized = (level ?? '').trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, 'Invalid log level; keeping current level');
}

function collectSecretValues(): string[] {
  return Object.entries(process.env)
    .filter(([key, value]) => SENSITIVE_KEY_PATTERN.test(key) && typeof value === 'string')
    .map(([, value]) => (value ?? '').trim())
    .filter((value) => value.length >= MIN_SECRET_LENGTH)
    .sort((a, b) => b.length - a.length);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove configured secret values and `key=value` style credentials from text
 * before it is logged or returned to a caller.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text;
  for (const secret of collectSecretValues()) {
    scrubbed = scrubbed.replace(new RegExp(escapeRegExp(secret), 'g'), REDACTED);
  }
  return scrubbed.replace(
    /\b([A-Za-z0-9_-]*(?:api[_-]?key|token|secret|password)[A-Za-z0-9_-]*)\s*[=:]\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi,
    (_match, key: string) => `${key}=${REDACTED}`,
  );
}
