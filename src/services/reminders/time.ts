/**
 * @fileoverview Date and time-of-day formats shared by prompts and model output.
 *
 * The model sees and answers with day-first timestamps ("21.07.2022 22:37:01")
 * in the reminder timezone. Luxon handles the zone conversion.
 */

import { DateTime } from 'luxon';
import type { TimeOfDay } from './types.js';

const TIMESTAMP_FORMAT = 'dd.MM.yyyy HH:mm:ss';
const TIMESTAMP_INPUT_FORMATS = ['d.M.yyyy H:mm:ss', 'd.M.yyyy H:mm'];
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * Validate IANA timezone string.
 */
export function isValidTimezone(timezone: string): boolean {
  return DateTime.now().setZone(timezone).isValid;
}

function inZone(date: Date, timezone: string): DateTime {
  const local = DateTime.fromJSDate(date, { zone: 'utc' }).setZone(timezone);
  if (!local.isValid) {
    throw new Error(`Invalid timezone: "${timezone}"`);
  }
  return local;
}

/**
 * Format the prompt's current-time string, e.g. "26.01.2023 14:40:00, Thursday".
 */
export function formatCurrentTime(now: Date, timezone: string): string {
  return inZone(now, timezone).setLocale('en-US').toFormat(`${TIMESTAMP_FORMAT}, cccc`);
}

/**
 * Format an instant as "DD.MM.YYYY HH:MM:SS" in the given zone.
 */
export function formatTimestamp(date: Date, timezone: string): string {
  return inZone(date, timezone).toFormat(TIMESTAMP_FORMAT);
}

/**
 * Parse "DD.MM.YYYY HH:MM[:SS]" as wall-clock time in the given zone.
 * Returns null when the string does not match or names a non-existent date.
 */
export function parseTimestamp(input: string, timezone: string): Date | null {
  const trimmed = input.trim();
  for (const format of TIMESTAMP_INPUT_FORMATS) {
    const parsed = DateTime.fromFormat(trimmed, format, { zone: timezone });
    if (parsed.isValid) {
      return parsed.toJSDate();
    }
  }
  return null;
}

/**
 * Parse "HH:MM" or "HH:MM:SS" (24-hour clock).
 */
export function parseTimeOfDay(input: string): TimeOfDay | null {
  const match = input.trim().match(TIME_OF_DAY_PATTERN);
  if (!match) {
    return null;
  }

  const hour = parseInt(match[1], 10);
  const minute = parseInt(match[2], 10);
  const second = match[3] ? parseInt(match[3], 10) : 0;

  if (hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  return { hour, minute, second };
}

/**
 * Format a time of day as "HH:MM", adding ":SS" only when seconds are set.
 */
export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  const base = `${pad(time.hour)}:${pad(time.minute)}`;
  return time.second === 0 ? base : `${base}:${pad(time.second)}`;
}
