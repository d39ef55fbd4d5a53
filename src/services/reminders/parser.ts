/**
 * @fileoverview Model response parser.
 *
 * Turns the completion text into a validated Reminder. The model is asked
 * for a bare JSON object but may wrap it in prose ("Answer: {...}") or a
 * code fence, so the first parseable object or array is extracted first.
 *
 * Both template spellings are accepted:
 * - kind: "absolute" | "abs", "relative" | "rel", "recurrent" | "rec"
 * - time field: "times" (array) or "time" (string or array)
 */

import { ReminderError } from './errors.js';
import { parseTimeOfDay, parseTimestamp } from './time.js';
import {
  KIND_NAMES,
  WEEKDAYS,
  type Reminder,
  type ReminderKind,
  type TimeOfDay,
  type ValidationError,
  type Weekday,
} from './types.js';

export type ReminderValidation =
  | { success: true; data: Reminder }
  | { success: false; errors: ValidationError[] };

/** Largest week offset a relative reminder may ask for */
export const MAX_WEEK_OFFSET = 255;

const KIND_ALIASES = new Map<string, ReminderKind>();
for (const names of Object.values(KIND_NAMES)) {
  KIND_ALIASES.set(names.absolute, 'absolute');
  KIND_ALIASES.set(names.relative, 'relative');
  KIND_ALIASES.set(names.recurrent, 'recurrent');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toWeekday(value: unknown): Weekday | null {
  return WEEKDAYS.find((day) => day === value) ?? null;
}

function findJsonEnd(text: string, start: number, openChar: '{' | '[', closeChar: '}' | ']'): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
        continue;
      }
      if (char === '\\') {
        escaped = true;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      continue;
    }

    if (char === openChar) {
      depth += 1;
    } else if (char === closeChar) {
      depth -= 1;
      if (depth === 0) {
        return i;
      }
    }
  }

  return -1;
}

/**
 * Extract the first JSON object from a completion.
 * Bracketed prose such as "days [5]" is skipped over; a JSON value that is
 * not an object is returned only when the text holds no object at all.
 * Returns undefined if nothing in the text parses.
 */
export function extractJsonPayload(response: string): unknown {
  let fallback: unknown = undefined;

  const trimmed = response.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (isRecord(parsed)) {
        return parsed;
      }
      fallback = parsed;
    } catch {
      // fall through to scanning
    }
  }

  for (let i = 0; i < response.length; i++) {
    const char = response[i];
    if (char !== '{' && char !== '[') continue;
    const openChar = char;
    const closeChar = char === '{' ? '}' : ']';
    const end = findJsonEnd(response, i, openChar, closeChar);
    if (end === -1) continue;
    const candidate = response.slice(i, end + 1);
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (isRecord(parsed)) {
        return parsed;
      }
      fallback ??= parsed;
    } catch {
      // keep scanning for another candidate
    }
  }

  return fallback;
}

function readKind(record: Record<string, unknown>, errors: ValidationError[]): ReminderKind | null {
  if (typeof record.kind !== 'string') {
    errors.push({ field: 'kind', message: 'kind is required and must be a string' });
    return null;
  }
  const kind = KIND_ALIASES.get(record.kind.trim().toLowerCase());
  if (!kind) {
    errors.push({
      field: 'kind',
      message: `unknown kind "${record.kind}". Valid: ${Array.from(KIND_ALIASES.keys()).join(', ')}`,
    });
    return null;
  }
  return kind;
}

function readText(record: Record<string, unknown>, errors: ValidationError[]): string {
  const text = typeof record.text === 'string' ? record.text.trim() : '';
  if (!text) {
    errors.push({ field: 'text', message: 'text is required and must be a non-empty string' });
  }
  return text;
}

/**
 * Read the raw time strings from "times" or, failing that, "time".
 */
function readTimeStrings(
  record: Record<string, unknown>,
  errors: ValidationError[]
): { field: string; values: string[] } {
  const field = record.times !== undefined ? 'times' : 'time';
  const raw = record[field];

  if (raw === undefined || raw === null) {
    errors.push({ field: 'times', message: 'times is required' });
    return { field, values: [] };
  }

  const items: unknown[] = Array.isArray(raw) ? raw : [raw];
  if (items.length === 0) {
    errors.push({ field, message: `${field} must not be empty` });
    return { field, values: [] };
  }

  const values: string[] = [];
  items.forEach((item, index) => {
    if (typeof item !== 'string') {
      errors.push({ field: `${field}[${index}]`, message: 'must be a string' });
      return;
    }
    values.push(item);
  });
  return { field, values };
}

function readTimestamps(
  record: Record<string, unknown>,
  timezone: string,
  errors: ValidationError[]
): Date[] {
  const { field, values } = readTimeStrings(record, errors);
  const times: Date[] = [];
  values.forEach((value, index) => {
    const parsed = parseTimestamp(value, timezone);
    if (!parsed) {
      errors.push({
        field: `${field}[${index}]`,
        message: `"${value}" is not a DD.MM.YYYY HH:MM[:SS] timestamp`,
      });
      return;
    }
    times.push(parsed);
  });
  return times;
}

function readTimesOfDay(record: Record<string, unknown>, errors: ValidationError[]): TimeOfDay[] {
  const { field, values } = readTimeStrings(record, errors);
  const times: TimeOfDay[] = [];
  values.forEach((value, index) => {
    const parsed = parseTimeOfDay(value);
    if (!parsed) {
      errors.push({ field: `${field}[${index}]`, message: `"${value}" is not a HH:MM[:SS] time of day` });
      return;
    }
    times.push(parsed);
  });
  return times;
}

function readWeek(record: Record<string, unknown>, errors: ValidationError[]): number {
  const week = record.week;
  if (typeof week !== 'number' || !Number.isInteger(week) || week < 0) {
    errors.push({ field: 'week', message: 'week is required and must be a non-negative integer' });
    return 0;
  }
  if (week > MAX_WEEK_OFFSET) {
    errors.push({ field: 'week', message: `week must be at most ${MAX_WEEK_OFFSET}, got ${week}` });
    return 0;
  }
  return week;
}

/**
 * Read the weekday set. Duplicates are dropped and days sorted Monday first.
 * With `optional`, a missing or empty list means "every day" (null).
 */
function readDays(
  record: Record<string, unknown>,
  errors: ValidationError[],
  optional: boolean
): Weekday[] | null {
  const raw = record.days;
  if (raw === undefined || raw === null) {
    if (!optional) {
      errors.push({ field: 'days', message: 'days is required' });
    }
    return null;
  }
  if (!Array.isArray(raw)) {
    errors.push({ field: 'days', message: 'days must be an array of weekday numbers' });
    return null;
  }
  if (raw.length === 0) {
    if (!optional) {
      errors.push({ field: 'days', message: 'days must not be empty' });
    }
    return null;
  }

  const days = new Set<Weekday>();
  raw.forEach((value: unknown, index) => {
    const day = toWeekday(value);
    if (day === null) {
      errors.push({ field: `days[${index}]`, message: `invalid weekday: ${String(value)}. Valid: 1 (Monday) to 7 (Sunday)` });
      return;
    }
    days.add(day);
  });
  return Array.from(days).sort((a, b) => a - b);
}

/**
 * Validate a decoded payload against the reminder shapes.
 * Returns every problem found, not just the first.
 */
export function validateReminderPayload(payload: unknown, timezone: string): ReminderValidation {
  if (!isRecord(payload)) {
    return { success: false, errors: [{ field: 'response', message: 'response must be a JSON object' }] };
  }

  const errors: ValidationError[] = [];
  const kind = readKind(payload, errors);
  const text = readText(payload, errors);

  let reminder: Reminder | null = null;
  switch (kind) {
    case 'absolute':
      reminder = { kind, text, times: readTimestamps(payload, timezone, errors) };
      break;
    case 'relative':
      reminder = {
        kind,
        text,
        week: readWeek(payload, errors),
        days: readDays(payload, errors, false) ?? [],
        times: readTimesOfDay(payload, errors),
      };
      break;
    case 'recurrent':
      reminder = {
        kind,
        text,
        days: readDays(payload, errors, true),
        times: readTimesOfDay(payload, errors),
      };
      break;
    case null:
      break;
  }

  if (errors.length > 0 || !reminder) {
    return { success: false, errors };
  }
  return { success: true, data: reminder };
}

/**
 * Parse a completion into a Reminder.
 *
 * @throws ReminderError `invalid_json` when no JSON can be extracted,
 *   `invalid_shape` when the JSON does not describe a reminder
 */
export function parseReminderResponse(response: string, timezone: string): Reminder {
  const payload = extractJsonPayload(response);
  if (payload === undefined) {
    throw new ReminderError('Failed to parse JSON from model response', 'invalid_json');
  }

  const result = validateReminderPayload(payload, timezone);
  if (!result.success) {
    const summary = result.errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    throw new ReminderError(`Model response is not a valid reminder (${summary})`, 'invalid_shape', {
      issues: result.errors,
    });
  }
  return result.data;
}
