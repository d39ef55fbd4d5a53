/**
 * @fileoverview Reminder occurrence expansion.
 *
 * Turns a parsed reminder into the moments it should fire:
 * - absolute → one "once" occurrence per timestamp
 * - relative → one "once" occurrence per (day, time) of the target week
 * - recurrent → one "recurring" occurrence per (day, time), as a cron slot
 *
 * All wall-clock arithmetic happens in the reminder timezone.
 */

import { Cron } from 'croner';
import { DateTime } from 'luxon';
import { createLogger } from '../../utils/observability/index.js';
import type {
  Reminder,
  RecurrentReminder,
  RelativeReminder,
  ReminderOccurrence,
  TimeOfDay,
  Weekday,
} from './types.js';

const log = createLogger({ domain: 'reminder-schedule' });

export interface ScheduleOptions {
  now: Date;
  timezone: string;
}

function localNow(options: ScheduleOptions): DateTime {
  const local = DateTime.fromJSDate(options.now, { zone: 'utc' }).setZone(options.timezone);
  if (!local.isValid) {
    throw new Error(`Invalid timezone: "${options.timezone}"`);
  }
  return local;
}

function atTime(day: DateTime, time: TimeOfDay): DateTime {
  return day.set({ hour: time.hour, minute: time.minute, second: time.second, millisecond: 0 });
}

function weekInstants(monday: DateTime, reminder: RelativeReminder): DateTime[] {
  return reminder.days.flatMap((day) =>
    reminder.times.map((time) => atTime(monday.plus({ days: day - 1 }), time))
  );
}

/**
 * Resolve a relative reminder against the current week.
 *
 * Week 0 means "this week", but if any of its moments are already at or
 * before `now` the whole set moves to next week. The check is made per
 * (day, time) moment, not per weekday: a reminder for later today stays
 * on today instead of moving a week ahead.
 */
function expandRelative(reminder: RelativeReminder, options: ScheduleOptions): ReminderOccurrence[] {
  const now = localNow(options);
  const thisMonday = now.startOf('day').minus({ days: now.weekday - 1 });

  let instants = weekInstants(thisMonday.plus({ weeks: reminder.week }), reminder);
  if (reminder.week === 0 && instants.some((instant) => instant.toMillis() <= now.toMillis())) {
    log.debug('relative_reminder_rolled_forward', { days: reminder.days, timezone: options.timezone });
    instants = weekInstants(thisMonday.plus({ weeks: 1 }), reminder);
  }

  return instants
    .sort((a, b) => a.toMillis() - b.toMillis())
    .map((instant) => ({ type: 'once' as const, text: reminder.text, runAt: instant.toJSDate() }));
}

/**
 * Build a 5-field cron expression for a weekly slot.
 * Cron counts Sunday as 0, so weekday 7 becomes 0.
 */
export function toCronExpression(time: TimeOfDay, weekday: Weekday | null): string {
  const dayOfWeek = weekday === null ? '*' : String(weekday % 7);
  return `${time.minute} ${time.hour} * * ${dayOfWeek}`;
}

function expandRecurrent(reminder: RecurrentReminder): ReminderOccurrence[] {
  const weekdays: Array<Weekday | null> = reminder.days ?? [null];
  return weekdays.flatMap((weekday) =>
    reminder.times.map((time) => ({
      type: 'recurring' as const,
      text: reminder.text,
      weekday,
      time,
      cronExpression: toCronExpression(time, weekday),
    }))
  );
}

/**
 * Expand a reminder into its occurrences.
 */
export function expandReminder(reminder: Reminder, options: ScheduleOptions): ReminderOccurrence[] {
  switch (reminder.kind) {
    case 'absolute':
      return reminder.times.map((runAt) => ({ type: 'once' as const, text: reminder.text, runAt }));
    case 'relative':
      return expandRelative(reminder, options);
    case 'recurrent':
      return expandRecurrent(reminder);
  }
}

/**
 * Calculate when an occurrence fires next, strictly after `now`.
 * Returns null for a one-time occurrence that is already in the past.
 */
export function nextFireTime(occurrence: ReminderOccurrence, options: ScheduleOptions): Date | null {
  if (occurrence.type === 'once') {
    return occurrence.runAt.getTime() > options.now.getTime() ? occurrence.runAt : null;
  }

  // Croner takes an optional leading seconds field
  const pattern = `${occurrence.time.second} ${occurrence.cronExpression}`;
  const cron = new Cron(pattern, { timezone: options.timezone });
  const nextRun = cron.nextRun(options.now);
  if (!nextRun) {
    throw new Error(`Could not calculate next run for cron: ${occurrence.cronExpression}`);
  }
  return nextRun;
}
