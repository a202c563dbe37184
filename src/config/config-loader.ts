import { validateRuntimeConfig } from './env-validator.js';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_SESSION_CAPACITY, DEFAULT_SESSION_TTL_MS } from '../services/session-store.js';
import { DEFAULT_HISTORY_CAPACITY } from '../adapters/cli-adapter.js';

export interface GatewayConfig {
  apiPort: number;
  corsOrigins: string[];
  apiKeys: {
    telegram: string | null;
    web: string | null;
    cli: string | null;
  };
  telegramBotToken: string | null;
  sessions: {
    capacity: number;
    ttlMs: number;
  };
  cliHistoryCapacity: number;
  logLevel: string;
}

export const DEFAULT_API_PORT = 8000;

type Env = Record<string, string | undefined>;

/** Trimmed value of a key, or null when unset or blank. */
export function getConfigValue(key: string, env: Env = process.env): string | null {
  const raw = env[key]?.trim();
  return raw ? raw : null;
}

function intOr(env: Env, key: string, fallback: number): number {
  const raw = getConfigValue(key, env);
  return raw === null ? fallback : Number(raw);
}

/**
 * Read and validate the gateway configuration.
 *
 * @throws ConfigError listing every issue (never secret values) when validation fails.
 */
export function loadGatewayConfig(env: Env = process.env): GatewayConfig {
  const validation = validateRuntimeConfig(env);
  if (!validation.ok) {
    throw new ConfigError(validation.issues.map((issue) => issue.message));
  }

  const corsOrigins = (getConfigValue('CORS_ORIGINS', env) ?? '*')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    apiPort: intOr(env, 'API_PORT', DEFAULT_API_PORT),
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : ['*'],
    apiKeys: {
      telegram: getConfigValue('TELEGRAM_API_KEY', env),
      web: getConfigValue('WEB_API_KEY', env),
      cli: getConfigValue('CLI_API_KEY', env),
    },
    telegramBotToken: getConfigValue('TELEGRAM_BOT_TOKEN', env),
    sessions: {
      capacity: intOr(env, 'SESSION_CAPACITY', DEFAULT_SESSION_CAPACITY),
      ttlMs: intOr(env, 'SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS),
    },
    cliHistoryCapacity: intOr(env, 'CLI_HISTORY_CAPACITY', DEFAULT_HISTORY_CAPACITY),
    logLevel: (getConfigValue('LOG_LEVEL', env) ?? 'info').toLowerCase(),
  };
}

export function listApiKeys(config: GatewayConfig): string[] {
  return [config.apiKeys.telegram, config.apiKeys.web, config.apiKeys.cli].filter(
    (key): key is string => key !== null,
  );
}
