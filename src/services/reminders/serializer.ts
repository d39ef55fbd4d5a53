/**
 * Canonical JSON form of a reminder.
 *
 * The output always uses "times" and can be fed back through
 * parseReminderResponse to get an equal reminder.
 */

import { formatTimeOfDay, formatTimestamp } from './time.js';
import { KIND_NAMES, type KindNaming, type Reminder } from './types.js';

export interface SerializeOptions {
  timezone: string;
  naming?: KindNaming; // default: compact
}

export type SerializedReminder =
  | { kind: string; text: string; times: string[] }
  | { kind: string; text: string; week: number; days: number[]; times: string[] }
  | { kind: string; text: string; days?: number[]; times: string[] };

/**
 * Build the serializable form of a reminder.
 *
 * Absolute times are written as wall-clock time in `timezone` without an
 * offset. A time inside the repeated hour when clocks fall back is
 * ambiguous in that form and parses back as the earlier (summer-time)
 * instant, one hour before the original.
 */
export function serializeReminder(reminder: Reminder, options: SerializeOptions): SerializedReminder {
  const kind = KIND_NAMES[options.naming ?? 'compact'][reminder.kind];

  switch (reminder.kind) {
    case 'absolute':
      return {
        kind,
        text: reminder.text,
        times: reminder.times.map((time) => formatTimestamp(time, options.timezone)),
      };
    case 'relative':
      return {
        kind,
        text: reminder.text,
        week: reminder.week,
        days: [...reminder.days],
        times: reminder.times.map(formatTimeOfDay),
      };
    case 'recurrent': {
      const times = reminder.times.map(formatTimeOfDay);
      return reminder.days
        ? { kind, text: reminder.text, days: [...reminder.days], times }
        : { kind, text: reminder.text, times };
    }
  }
}

export function toReminderJson(reminder: Reminder, options: SerializeOptions): string {
  return JSON.stringify(serializeReminder(reminder, options));
}
