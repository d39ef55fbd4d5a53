/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the library requires.
 *
 * @see .env.example for the supported environment variables
 */

import 'dotenv/config';
import { DateTime } from 'luxon';

// ---------------------------------------------------------------------------
// Config helpers: make required vs optional intent explicit
// ---------------------------------------------------------------------------

/** Read a required env var. Returns undefined if missing (caught by validateConfig). */
function required(key: string): string | undefined {
  return process.env[key];
}

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

export const PROMPT_VARIANTS = ['standard', 'compact'] as const;

export type PromptVariant = typeof PROMPT_VARIANTS[number];

export function isPromptVariant(value: string): value is PromptVariant {
  return PROMPT_VARIANTS.some((variant) => variant === value);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const nodeEnv = optional('NODE_ENV', 'development');

const config = {
  nodeEnv,
  anthropicApiKey: required('ANTHROPIC_API_KEY'),

  /** Claude model IDs - centralized to avoid hardcoding across files */
  models: {
    parser: optional('PARSER_MODEL_ID', 'claude-sonnet-4-5-20250929'),
  },

  /** Reminder interpretation */
  reminders: {
    /** IANA zone the current-time string and absolute timestamps are expressed in */
    timezone: optional('REMINDER_TIMEZONE', 'Asia/Jerusalem'),
    promptVariant: optional('REMINDER_PROMPT_VARIANT', 'standard'),
    maxAttempts: optionalInt('REMINDER_MAX_ATTEMPTS', 2),
    maxTokens: optionalInt('REMINDER_MAX_TOKENS', 512),
    retryBackoffMs: optionalInt('REMINDER_RETRY_BACKOFF_MS', nodeEnv === 'test' ? 0 : 1000),
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if required values are missing or invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  // Required API keys
  if (!config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required');
  }

  if (!DateTime.now().setZone(config.reminders.timezone).isValid) {
    errors.push(`REMINDER_TIMEZONE must be a valid IANA timezone, got "${config.reminders.timezone}"`);
  }

  if (!isPromptVariant(config.reminders.promptVariant)) {
    errors.push(
      `REMINDER_PROMPT_VARIANT must be one of ${PROMPT_VARIANTS.join(', ')}, got "${config.reminders.promptVariant}"`
    );
  }

  // Numeric bounds
  if (!(config.reminders.maxAttempts >= 1 && config.reminders.maxAttempts <= 5)) {
    errors.push(`REMINDER_MAX_ATTEMPTS must be 1-5, got ${config.reminders.maxAttempts}`);
  }
  if (!(config.reminders.maxTokens >= 64)) {
    errors.push(`REMINDER_MAX_TOKENS must be >= 64, got ${config.reminders.maxTokens}`);
  }
  if (!(config.reminders.retryBackoffMs >= 0)) {
    errors.push(`REMINDER_RETRY_BACKOFF_MS must be >= 0, got ${config.reminders.retryBackoffMs}`);
  }

  if (errors.length > 0) {
    console.error(JSON.stringify({
      level: 'fatal',
      message: 'Configuration validation failed',
      errors,
      timestamp: new Date().toISOString(),
    }));
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
