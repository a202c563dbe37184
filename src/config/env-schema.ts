/**
 * Registry of every environment key the gateway reads.
 *
 * Each entry declares:
 *   - `key`         The exact env variable name.
 *   - `type`        Whether the value is a sensitive secret or a plain env var.
 *   - `class`       'required' | 'optional' | 'conditional'.
 *   - `scope`       Subsystem that owns the key.
 *   - `condition`   Group a conditional key belongs to.
 *   - `description` Human-readable purpose.
 *   - `remediation` Hint shown when the key is missing or invalid.
 */

export type ConfigKeyClass = 'required' | 'optional' | 'conditional';

export type ConfigKeyType = 'secret' | 'env';

export type ConfigKeyScope = 'runtime' | 'auth' | 'messaging' | 'sessions';

/** At least one key of a condition group must be present. */
export type ConfigCondition = 'auth:api_key';

export interface ConfigKeySpec {
  key: string;
  type: ConfigKeyType;
  class: ConfigKeyClass;
  scope: ConfigKeyScope;
  condition?: ConfigCondition;
  description: string;
  remediation: string;
}

export const CONFIG_SCHEMA: readonly ConfigKeySpec[] = [
  // ── Runtime ─────────────────────────────────────────────────────────────────
  {
    key: 'API_PORT',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'Listening port for the HTTP gateway (default: 8000).',
    remediation: 'Set API_PORT to an integer in range 1-65535, e.g. API_PORT=8080.',
  },
  {
    key: 'CORS_ORIGINS',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: "Comma-separated list of allowed CORS origins (default: '*').",
    remediation: 'Set CORS_ORIGINS=https://app.example.com,https://admin.example.com to restrict origins.',
  },
  {
    key: 'LOG_LEVEL',
    type: 'env',
    class: 'optional',
    scope: 'runtime',
    description: 'pino log level: fatal, error, warn, info, debug, trace or silent (default: info).',
    remediation: 'Set LOG_LEVEL to one of fatal, error, warn, info, debug, trace, silent.',
  },

  // ── Auth ────────────────────────────────────────────────────────────────────
  {
    key: 'TELEGRAM_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'auth:api_key',
    scope: 'auth',
    description: 'API key presented by the bot transport in the X-API-Key header.',
    remediation: 'Set at least one of TELEGRAM_API_KEY, WEB_API_KEY or CLI_API_KEY.',
  },
  {
    key: 'WEB_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'auth:api_key',
    scope: 'auth',
    description: 'API key presented by web clients in the X-API-Key header.',
    remediation: 'Set at least one of TELEGRAM_API_KEY, WEB_API_KEY or CLI_API_KEY.',
  },
  {
    key: 'CLI_API_KEY',
    type: 'secret',
    class: 'conditional',
    condition: 'auth:api_key',
    scope: 'auth',
    description: 'API key presented by command-line clients in the X-API-Key header.',
    remediation: 'Set at least one of TELEGRAM_API_KEY, WEB_API_KEY or CLI_API_KEY.',
  },

  // ── Messaging ───────────────────────────────────────────────────────────────
  {
    key: 'TELEGRAM_BOT_TOKEN',
    type: 'secret',
    class: 'optional',
    scope: 'messaging',
    description: 'Bot token from @BotFather. When set, the gateway polls Telegram for updates.',
    remediation: 'Set TELEGRAM_BOT_TOKEN to enable the Telegram bot transport.',
  },

  // ── Sessions ────────────────────────────────────────────────────────────────
  {
    key: 'SESSION_CAPACITY',
    type: 'env',
    class: 'optional',
    scope: 'sessions',
    description: 'Maximum number of tracked web sessions (default: 1000).',
    remediation: 'Set SESSION_CAPACITY to a positive integer.',
  },
  {
    key: 'SESSION_TTL_MS',
    type: 'env',
    class: 'optional',
    scope: 'sessions',
    description: 'Idle time in ms after which a web session is dropped; 0 disables expiry (default: 1800000).',
    remediation: 'Set SESSION_TTL_MS to a non-negative integer.',
  },
  {
    key: 'CLI_HISTORY_CAPACITY',
    type: 'env',
    class: 'optional',
    scope: 'sessions',
    description: 'Number of CLI commands kept in history (default: 100).',
    remediation: 'Set CLI_HISTORY_CAPACITY to a positive integer.',
  },
];
