/**
 * Retry configuration: the choice between no retries and a bounded number
 * of attempts. `maxAttempts` is the only tunable.
 *
 * Lightweight validation without external schema libraries.
 */

import { ConfigError } from './errors.js';
import type { ValidationIssue } from './errors.js';

/** Construction-time retry configuration. */
export type RetryConfig =
  | { mode: 'none' }
  | { mode: 'bounded'; maxAttempts: number };

/** Retry configuration applied when none is given. */
export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  mode: 'bounded',
  maxAttempts: 3,
};

/** Environment variable read by {@link retryConfigFromEnv}. */
export const RETRY_ENV_VAR = 'RETRY_MAX_ATTEMPTS';

const DISABLED_VALUES = new Set(['0', 'none', 'off']);
const COUNT_PATTERN = /^\d+$/;

/**
 * Validate an untrusted retry configuration.
 *
 * @returns the problems found; empty when the value is a valid {@link RetryConfig}.
 */
export function validateRetryConfig(value: unknown): ValidationIssue[] {
  const parsed = parseRetryConfig(value);
  return Array.isArray(parsed) ? parsed : [];
}

/**
 * Resolve an optional, untrusted retry configuration.
 *
 * @throws ConfigError if the value is present and invalid.
 */
export function resolveRetryConfig(value?: unknown): RetryConfig {
  if (value === undefined) return { ...DEFAULT_RETRY_CONFIG };
  const parsed = parseRetryConfig(value);
  if (Array.isArray(parsed)) throw new ConfigError(parsed);
  return parsed;
}

/**
 * Read the retry configuration from the environment.
 *
 * Unset or blank keeps the default. `0`, `none` and `off` disable retries.
 * Any other non-negative integer bounds the attempts.
 *
 * @throws ConfigError for any other value.
 */
export function retryConfigFromEnv(env: Record<string, string | undefined>): RetryConfig {
  const raw = env[RETRY_ENV_VAR]?.trim();
  if (raw === undefined || raw === '') return { ...DEFAULT_RETRY_CONFIG };

  const normalized = raw.toLowerCase();
  if (DISABLED_VALUES.has(normalized)) return { mode: 'none' };

  if (COUNT_PATTERN.test(normalized)) {
    const maxAttempts = Number(normalized);
    if (Number.isSafeInteger(maxAttempts)) return { mode: 'bounded', maxAttempts };
  }

  throw new ConfigError([
    {
      field: RETRY_ENV_VAR,
      message: `${RETRY_ENV_VAR} must be a non-negative integer, 'none' or 'off'.`,
      expected: "non-negative integer | 'none' | 'off'",
      received: raw,
    },
  ]);
}

function parseRetryConfig(value: unknown): RetryConfig | ValidationIssue[] {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return [
      {
        field: 'retry',
        message: 'Retry configuration must be an object.',
        expected: 'object',
        received: describe(value),
      },
    ];
  }

  const mode: unknown = Reflect.get(value, 'mode');
  if (mode === 'none') return { mode: 'none' };

  if (mode === 'bounded') {
    const maxAttempts: unknown = Reflect.get(value, 'maxAttempts');
    if (typeof maxAttempts !== 'number' || !Number.isSafeInteger(maxAttempts) || maxAttempts < 0) {
      return [
        {
          field: 'retry.maxAttempts',
          message: 'maxAttempts must be a non-negative integer.',
          expected: 'non-negative integer',
          received: describe(maxAttempts),
        },
      ];
    }
    return { mode: 'bounded', maxAttempts };
  }

  return [
    {
      field: 'retry.mode',
      message: "Retry mode must be 'none' or 'bounded'.",
      expected: "'none' | 'bounded'",
      received: describe(mode),
    },
  ];
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' || typeof value === 'string') return JSON.stringify(value);
  return typeof value;
}
