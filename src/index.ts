/**
 * reminder-interpreter public API.
 */

export {
  interpretReminder,
  tryInterpretReminder,
  buildReminderPrompt,
  buildUserPrompt,
  getSystemPrompt,
  STANDARD_PROMPT,
  COMPACT_PROMPT,
  parseReminderResponse,
  validateReminderPayload,
  extractJsonPayload,
  serializeReminder,
  toReminderJson,
  expandReminder,
  nextFireTime,
  toCronExpression,
  formatCurrentTime,
  formatTimestamp,
  parseTimestamp,
  parseTimeOfDay,
  formatTimeOfDay,
  isValidTimezone,
  ReminderError,
  isReminderError,
  KIND_NAMES,
  WEEKDAYS,
  WEEKDAY_NAMES,
} from './services/reminders/index.js';

export type {
  Reminder,
  AbsoluteReminder,
  RelativeReminder,
  RecurrentReminder,
  ReminderKind,
  ReminderOccurrence,
  KindNaming,
  TimeOfDay,
  Weekday,
  ValidationError,
  ReminderErrorCode,
  ReminderPrompt,
  BuildPromptOptions,
  ReminderValidation,
  SerializeOptions,
  SerializedReminder,
  ScheduleOptions,
  CompletionProvider,
  CompletionRequest,
  InterpretOptions,
  InterpretedReminder,
} from './services/reminders/index.js';

export { createAnthropicProvider } from './services/anthropic/index.js';
export type { AnthropicProviderOptions } from './services/anthropic/index.js';

export { default as config, validateConfig, PROMPT_VARIANTS, isPromptVariant } from './config.js';
export type { PromptVariant } from './config.js';

export { AppError } from './utils/errors.js';
export type { Result } from './utils/errors.js';
