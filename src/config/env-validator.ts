/**
 * Runtime configuration validator.
 *
 * Produces structured, redaction-safe diagnostics for:
 *   - Missing required keys.
 *   - Condition groups where none of the alternative keys is set.
 *   - Format/type violations on plain env vars.
 *
 * No secret values are ever included in the output.
 */

import { CONFIG_SCHEMA } from './env-schema.js';
import type { ConfigCondition, ConfigKeySpec } from './env-schema.js';
import { LOG_LEVELS } from '../utils/logger.js';

// ── Public types ──────────────────────────────────────────────────────────────

export type ConfigIssueClass = 'missing_required' | 'missing_conditional' | 'format_error';

export interface ConfigIssue {
  key: string;
  class: ConfigIssueClass;
  message: string;
  /** Actionable remediation hint (no secret values). */
  remediation: string;
}

export interface ConfigValidationResult {
  /** true when the gateway is configured well enough to start; every issue blocks startup. */
  ok: boolean;
  presentKeys: string[];
  issues: ConfigIssue[];
  validatedAt: string;
}

type Env = Record<string, string | undefined>;

// ── Internal helpers ─────────────────────────────────────────────────────────

function hasValue(env: Env, spec: ConfigKeySpec): boolean {
  const raw = env[spec.key];
  return typeof raw === 'string' && raw.trim().length > 0;
}

function checkInteger(raw: string, key: string, min: number, max = Number.MAX_SAFE_INTEGER): string | null {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in range ${min}-${max}`;
    return `${key} must be an integer ${range}, got '${raw}'.`;
  }
  return null;
}

/** Returns an issue string if the value is malformed, null if ok or absent. */
function formatError(env: Env, spec: ConfigKeySpec): string | null {
  if (spec.type !== 'env') {
    return null;
  }

  const raw = env[spec.key]?.trim();
  if (!raw) {
    return null;
  }

  switch (spec.key) {
    case 'API_PORT':
      return checkInteger(raw, spec.key, 1, 65535);
    case 'SESSION_CAPACITY':
    case 'CLI_HISTORY_CAPACITY':
      return checkInteger(raw, spec.key, 1);
    case 'SESSION_TTL_MS':
      return checkInteger(raw, spec.key, 0);
    case 'LOG_LEVEL': {
      const level = raw.toLowerCase();
      if (!(LOG_LEVELS as readonly string[]).includes(level)) {
        return `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'.`;
      }
      return null;
    }
    default:
      return null;
  }
}

function satisfiedConditions(env: Env): Set<ConfigCondition> {
  const satisfied = new Set<ConfigCondition>();
  for (const spec of CONFIG_SCHEMA) {
    if (spec.class === 'conditional' && spec.condition && hasValue(env, spec)) {
      satisfied.add(spec.condition);
    }
  }
  return satisfied;
}

// ── Public API ───────────────────────────────────────────────────────────────

export function validateRuntimeConfig(
  env: Env = process.env,
  now: () => Date = () => new Date(),
): ConfigValidationResult {
  const issues: ConfigIssue[] = [];
  const presentKeys: string[] = [];
  const satisfied = satisfiedConditions(env);
  const reportedConditions = new Set<ConfigCondition>();

  for (const spec of CONFIG_SCHEMA) {
    const present = hasValue(env, spec);
    if (present) {
      presentKeys.push(spec.key);
    }

    const formatErr = formatError(env, spec);
    if (formatErr) {
      issues.push({ key: spec.key, class: 'format_error', message: formatErr, remediation: spec.remediation });
      continue;
    }

    if (present) {
      continue;
    }

    switch (spec.class) {
      case 'required':
        issues.push({
          key: spec.key,
          class: 'missing_required',
          message: `Required config key '${spec.key}' is missing. ${spec.description}`,
          remediation: spec.remediation,
        });
        break;

      case 'conditional': {
        // One issue per unsatisfied group, attributed to its first key.
        const condition = spec.condition;
        if (!condition || satisfied.has(condition) || reportedConditions.has(condition)) {
          break;
        }
        reportedConditions.add(condition);
        const groupKeys = CONFIG_SCHEMA.filter((s) => s.condition === condition).map((s) => s.key);
        issues.push({
          key: spec.key,
          class: 'missing_conditional',
          message: `None of ${groupKeys.join(', ')} is configured; at least one is required.`,
          remediation: spec.remediation,
        });
        break;
      }

      case 'optional':
        break;
    }
  }

  return {
    ok: issues.length === 0,
    presentKeys: presentKeys.sort(),
    issues,
    validatedAt: now().toISOString(),
  };
}
