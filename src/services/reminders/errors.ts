/**
 * Errors raised while turning a request into a reminder.
 */

import { AppError } from '../../utils/errors.js';
import type { ValidationError } from './types.js';

export type ReminderErrorCode =
  | 'empty_query'
  | 'no_completion'
  | 'llm_error'
  | 'invalid_json'
  | 'invalid_shape';

const RECOVERABLE: Record<ReminderErrorCode, boolean> = {
  empty_query: false,
  no_completion: true,
  llm_error: true,
  invalid_json: true,
  invalid_shape: true,
};

export class ReminderError extends AppError {
  readonly issues: ValidationError[];

  constructor(
    message: string,
    public readonly reminderCode: ReminderErrorCode,
    options: { issues?: ValidationError[]; cause?: unknown; context?: Record<string, unknown> } = {}
  ) {
    super(message, reminderCode, RECOVERABLE[reminderCode], options.context);
    this.name = 'ReminderError';
    this.issues = options.issues ?? [];
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function isReminderError(error: unknown): error is ReminderError {
  return error instanceof ReminderError;
}
