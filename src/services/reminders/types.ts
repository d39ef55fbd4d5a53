/**
 * @fileoverview Reminder type definitions.
 *
 * A reminder is what the language model returns for one user request:
 * either a set of absolute timestamps, days of a given week, or a weekly
 * recurrence. Reminders are transient values; nothing here is persisted.
 */

/** Day of the week, 1 = Monday ... 7 = Sunday. */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const WEEKDAYS: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7];

export const WEEKDAY_NAMES: Record<Weekday, string> = {
  1: 'Monday',
  2: 'Tuesday',
  3: 'Wednesday',
  4: 'Thursday',
  5: 'Friday',
  6: 'Saturday',
  7: 'Sunday',
};

export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

/**
 * Reminder anchored to one or more calendar date-times.
 */
export interface AbsoluteReminder {
  kind: 'absolute';
  text: string;
  times: Date[];
}

/**
 * Reminder on given weekdays of the current week plus `week` weeks.
 */
export interface RelativeReminder {
  kind: 'relative';
  text: string;
  week: number; // 0 = this week, 1 = next week, ...
  days: Weekday[];
  times: TimeOfDay[];
}

/**
 * Reminder repeating every week on the given days (every day when `days` is null).
 */
export interface RecurrentReminder {
  kind: 'recurrent';
  text: string;
  days: Weekday[] | null;
  times: TimeOfDay[];
}

export type Reminder = AbsoluteReminder | RelativeReminder | RecurrentReminder;

export type ReminderKind = Reminder['kind'];

/**
 * Discriminator spellings: `standard` is the long form, `compact` the short
 * one. Both appear in model output and both are accepted when parsing.
 */
export type KindNaming = 'standard' | 'compact';

export const KIND_NAMES: Record<KindNaming, Record<ReminderKind, string>> = {
  standard: { absolute: 'absolute', relative: 'relative', recurrent: 'recurrent' },
  compact: { absolute: 'abs', relative: 'rel', recurrent: 'rec' },
};

/**
 * One concrete firing of a reminder.
 * Either a single instant or a weekly slot described by a cron expression.
 */
export type ReminderOccurrence =
  | { type: 'once'; text: string; runAt: Date }
  | {
      type: 'recurring';
      text: string;
      weekday: Weekday | null; // null = every day
      time: TimeOfDay;
      cronExpression: string; // Standard 5-field cron
    };

/**
 * A field-level problem found while validating model output.
 */
export type ValidationError = {
  field: string;
  message: string;
};
