/**
 * @fileoverview Reminder interpreter.
 *
 * ## Flow
 *
 * 1. Render the prompt with the current time in the reminder timezone
 * 2. Send it to the completion provider
 * 3. Parse and validate the reply into a Reminder
 * 4. Expand the reminder into occurrences relative to `now`
 *
 * Parse failures, empty completions and provider errors are recoverable:
 * the request is sent again until `maxAttempts` is used up, then the last
 * error is thrown. An empty query is rejected before any model call.
 */

import config, { isPromptVariant, type PromptVariant } from '../../config.js';
import { AppError, safeExecute, type Result } from '../../utils/errors.js';
import { createLogger, createRequestId, withLogContext } from '../../utils/observability/index.js';
import { createAnthropicProvider } from '../anthropic/provider.js';
import { ReminderError, isReminderError } from './errors.js';
import { parseReminderResponse } from './parser.js';
import { buildReminderPrompt } from './prompts.js';
import type { CompletionProvider } from './provider.js';
import { expandReminder } from './schedule.js';
import { isValidTimezone } from './time.js';
import type { Reminder, ReminderOccurrence } from './types.js';

const log = createLogger({ domain: 'reminder-interpreter' });

export interface InterpretOptions {
  /** Defaults to the Anthropic provider */
  provider?: CompletionProvider;
  /** Defaults to the current time */
  now?: Date;
  timezone?: string;
  variant?: PromptVariant;
  maxAttempts?: number;
  retryBackoffMs?: number;
}

export interface InterpretedReminder {
  reminder: Reminder;
  occurrences: ReminderOccurrence[];
  /** Completion text the reminder was parsed from */
  raw: string;
  attempts: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function defaultVariant(): PromptVariant {
  const configured = config.reminders.promptVariant;
  return isPromptVariant(configured) ? configured : 'standard';
}

function toReminderError(error: unknown): ReminderError {
  if (isReminderError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ReminderError(`Completion request failed: ${message}`, 'llm_error', { cause: error });
}

/**
 * Turn a free-text request into a reminder.
 *
 * @throws ReminderError on an empty query, or when every attempt failed
 */
export async function interpretReminder(
  query: string,
  options: InterpretOptions = {}
): Promise<InterpretedReminder> {
  const trimmed = typeof query === 'string' ? query.trim() : '';
  if (!trimmed) {
    throw new ReminderError('Reminder request is empty', 'empty_query');
  }

  const timezone = options.timezone ?? config.reminders.timezone;
  if (!isValidTimezone(timezone)) {
    throw new AppError(`Invalid timezone: "${timezone}"`, 'invalid_timezone', false, { timezone });
  }

  const provider = options.provider ?? createAnthropicProvider();
  const now = options.now ?? new Date();
  const requestedAttempts = options.maxAttempts ?? config.reminders.maxAttempts;
  const maxAttempts = Number.isFinite(requestedAttempts) ? Math.max(1, Math.floor(requestedAttempts)) : 1;
  const backoffMs = options.retryBackoffMs ?? config.reminders.retryBackoffMs;
  const prompt = buildReminderPrompt(trimmed, {
    now,
    timezone,
    variant: options.variant ?? defaultVariant(),
  });

  return withLogContext({ requestId: createRequestId(), operation: 'interpret_reminder' }, async () => {
    const startTime = Date.now();
    log.info('interpret_started', { provider: provider.name, timezone, query: trimmed });

    let lastError: ReminderError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const raw = await provider.complete(prompt);
        if (!raw.trim()) {
          throw new ReminderError('Model returned no completion', 'no_completion');
        }

        const reminder = parseReminderResponse(raw, timezone);
        const occurrences = expandReminder(reminder, { now, timezone });

        log.info('interpret_succeeded', {
          kind: reminder.kind,
          attempt,
          occurrenceCount: occurrences.length,
          durationMs: Date.now() - startTime,
        });
        return { reminder, occurrences, raw, attempts: attempt };
      } catch (error) {
        // Setup problems (missing API key) are not worth retrying
        if (error instanceof AppError && !isReminderError(error) && !error.recoverable) {
          throw error;
        }
        lastError = toReminderError(error);
        log.warn('interpret_attempt_failed', {
          attempt,
          maxAttempts,
          code: lastError.code,
          error: lastError.message,
          issues: lastError.issues,
        });

        if (!lastError.recoverable) {
          break;
        }
        if (attempt < maxAttempts && backoffMs > 0) {
          await sleep(backoffMs);
        }
      }
    }

    log.error('interpret_failed', {
      maxAttempts,
      code: lastError?.code,
      durationMs: Date.now() - startTime,
    });
    throw lastError ?? new ReminderError('Reminder interpretation failed', 'llm_error');
  });
}

/**
 * Same as interpretReminder, but failures come back as a Result
 * so the caller can show them to the user instead of catching.
 */
export function tryInterpretReminder(
  query: string,
  options: InterpretOptions = {}
): Promise<Result<InterpretedReminder, AppError>> {
  return safeExecute(() => interpretReminder(query, options), 'interpret_reminder');
}
