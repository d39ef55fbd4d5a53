/**
 * Reminder extraction prompts.
 *
 * Two templates are kept. They ask for the same thing but spell the output
 * differently: `standard` uses "absolute"/"relative" (and a singular "time"
 * in its type description), `compact` uses "abs"/"rel"/"rec" and always
 * "times". The response parser accepts both spellings, so either template
 * can be used with any model.
 *
 * The fourth `standard` example reads "25.02.2023 18:00:00, Saturday".
 * Older copies of this prompt called that date a Tuesday; the weekday was
 * corrected to match the date.
 */

import type { PromptVariant } from '../../config.js';
import { formatCurrentTime } from './time.js';

export const STANDARD_PROMPT = `You are an assistant tasked with converting user queries into json formatted notifications. You shouldn't comment on the query, just output the json.

Examples of how notifications should be parsed into two possible types:
Type 1: absolute date and time of format {"kind": "absolute", "text": "string", "times": ["22.07.2022 03:37:01"]}
Type 2: relative to current date and time of format {"kind": "relative", "text": "string", "week": 0, "days": [5], "time": "12:00"}

Examples of queries:

Current time is "21.07.2022 22:37:01, Thursday"
Remind me about "собеседование" in five hours

Answer: {"kind": "absolute", "text": "собеседование", "times": ["22.07.2022 03:37:01"]}

Current time is "21.07.2022 22:37:01, Thursday"
Remind me about "собеседование" next friday at 12:00

Answer: {"kind": "relative", "text": "собеседование", "week": 1, "days": [5], "times": ["12:00"]}

Current time is "24.01.2023 14:00:00, Tuesday"
Напомни мне позвонить Алексу в субботу днём;

Answer: {"kind": "relative", "text": "позвонить Алексу", "week": 0, "days": [6], "times": ["12:00"]}

Current time is "25.02.2023 18:00:00, Saturday"
'Через два и три часа напомни мне проверить плиту'

Answer: {"kind": "absolute", "text": "проверить плиту", "times": ["25.02.2023 20:00:00", "25.02.2023 21:00:00"]}`;

export const COMPACT_PROMPT = `You convert reminder requests into JSON. Output only the JSON object, no comments.

Days are numbered 1 (Monday) to 7 (Sunday). Times are 24-hour "HH:MM".
Three kinds of reminders:
"abs": exact moments: {"kind": "abs", "text": "string", "times": ["22.07.2022 03:37:01"]}
"rel": days of this week (week 0), next week (week 1) and so on: {"kind": "rel", "text": "string", "week": 0, "days": [5], "times": ["12:00"]}
"rec": repeating every week; omit "days" to repeat every day: {"kind": "rec", "text": "string", "days": [1, 3], "times": ["09:00"]}

Current time is "21.07.2022 22:37:01, Thursday"
Remind me about "interview" in five hours
{"kind": "abs", "text": "interview", "times": ["22.07.2022 03:37:01"]}

Current time is "21.07.2022 22:37:01, Thursday"
Remind me about "interview" next friday at 12:00
{"kind": "rel", "text": "interview", "week": 1, "days": [5], "times": ["12:00"]}

Current time is "24.01.2023 14:00:00, Tuesday"
Каждый понедельник и среду в 9 утра напоминай про спортзал
{"kind": "rec", "text": "спортзал", "days": [1, 3], "times": ["09:00"]}

Current time is "25.02.2023 18:00:00, Saturday"
Через два и три часа напомни мне проверить плиту
{"kind": "abs", "text": "проверить плиту", "times": ["25.02.2023 20:00:00", "25.02.2023 21:00:00"]}`;

const TEMPLATES: Record<PromptVariant, string> = {
  standard: STANDARD_PROMPT,
  compact: COMPACT_PROMPT,
};

export interface ReminderPrompt {
  system: string;
  user: string;
}

export interface BuildPromptOptions {
  now: Date;
  timezone: string;
  variant?: PromptVariant;
}

/**
 * Get the system prompt for a template variant.
 */
export function getSystemPrompt(variant: PromptVariant = 'standard'): string {
  return TEMPLATES[variant];
}

/**
 * Build the user turn: the current time in the reminder timezone, then the query.
 */
export function buildUserPrompt(query: string, now: Date, timezone: string): string {
  return `Current time is "${formatCurrentTime(now, timezone)}"\n${query}\n`;
}

/**
 * Render a template for one request.
 */
export function buildReminderPrompt(query: string, options: BuildPromptOptions): ReminderPrompt {
  return {
    system: getSystemPrompt(options.variant),
    user: buildUserPrompt(query, options.now, options.timezone),
  };
}
