/**
 * Unit tests for the reminder interpreter.
 *
 * Most cases use a scripted in-process provider; the last block goes
 * through the Anthropic provider against the SDK mock.
 */

import { describe, it, expect } from 'vitest';
import {
  interpretReminder,
  tryInterpretReminder,
} from '../../../src/services/reminders/interpreter.js';
import { COMPACT_PROMPT, STANDARD_PROMPT } from '../../../src/services/reminders/prompts.js';
import type { CompletionProvider, CompletionRequest } from '../../../src/services/reminders/provider.js';
import { AppError } from '../../../src/utils/errors.js';
import { createTextResponse, getCreateCalls, setMockResponses } from '../../mocks/anthropic.js';

const timezone = 'Asia/Jerusalem';
const now = new Date('2023-01-24T12:00:00Z');

/**
 * Provider that replays a fixed list of replies (or errors) and records requests.
 */
class ScriptedProvider implements CompletionProvider {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

describe('interpretReminder', () => {
  it('turns a relative request into dated occurrences', async () => {
    const provider = new ScriptedProvider([
      '{"kind": "relative", "text": "позвонить Алексу", "week": 0, "days": [6], "times": ["12:00"]}',
    ]);

    const result = await interpretReminder('В субботу в 12 напомни позвонить Алексу', { provider, now, timezone });

    expect(result.reminder).toEqual({
      kind: 'relative',
      text: 'позвонить Алексу',
      week: 0,
      days: [6],
      times: [{ hour: 12, minute: 0, second: 0 }],
    });
    expect(result.occurrences).toEqual([
      { type: 'once', text: 'позвонить Алексу', runAt: new Date('2023-01-28T10:00:00.000Z') },
    ]);
    expect(result.attempts).toBe(1);
    expect(provider.requests).toEqual([
      {
        system: STANDARD_PROMPT,
        user: 'Current time is "24.01.2023 14:00:00, Tuesday"\nВ субботу в 12 напомни позвонить Алексу\n',
      },
    ]);
  });

  it('trims the query before sending it', async () => {
    const provider = new ScriptedProvider(['{"kind": "rec", "text": "gym", "days": [1], "times": ["09:00"]}']);

    await interpretReminder('  gym every monday at 9  ', { provider, now, timezone });

    expect(provider.requests[0].user).toBe('Current time is "24.01.2023 14:00:00, Tuesday"\ngym every monday at 9\n');
  });

  it('uses the compact template when asked', async () => {
    const provider = new ScriptedProvider(['{"kind": "abs", "text": "stove", "times": ["25.02.2023 20:00"]}']);

    const result = await interpretReminder('check the stove', { provider, now, timezone, variant: 'compact' });

    expect(provider.requests[0].system).toBe(COMPACT_PROMPT);
    expect(result.occurrences).toEqual([
      { type: 'once', text: 'stove', runAt: new Date('2023-02-25T18:00:00.000Z') },
    ]);
  });

  it('retries after a reply without JSON', async () => {
    const reply = 'Answer: {"kind": "rec", "text": "water plants", "times": ["10:30"]}';
    const provider = new ScriptedProvider(['Sure, I can help with that.', reply]);

    const result = await interpretReminder('water plants every day at 10:30', {
      provider,
      now,
      timezone,
      maxAttempts: 2,
    });

    expect(result.attempts).toBe(2);
    expect(result.raw).toBe(reply);
    expect(result.occurrences).toEqual([
      {
        type: 'recurring',
        text: 'water plants',
        weekday: null,
        time: { hour: 10, minute: 30, second: 0 },
        cronExpression: '30 10 * * *',
      },
    ]);
  });

  it('throws the last parse error once attempts run out', async () => {
    const provider = new ScriptedProvider(['no idea', 'still no idea']);

    await expect(
      interpretReminder('remind me', { provider, now, timezone, maxAttempts: 2 })
    ).rejects.toMatchObject({ code: 'invalid_json', message: 'Failed to parse JSON from model response' });
    expect(provider.requests).toHaveLength(2);
  });

  it('reports validation issues for a malformed reminder', async () => {
    const provider = new ScriptedProvider(['{"kind": "rel", "text": "x", "week": 0, "times": ["12:00"]}']);

    await expect(
      interpretReminder('remind me', { provider, now, timezone, maxAttempts: 1 })
    ).rejects.toMatchObject({
      code: 'invalid_shape',
      issues: [{ field: 'days', message: 'days is required' }],
    });
  });

  it('treats a blank completion as a failed attempt', async () => {
    const provider = new ScriptedProvider(['   ']);

    await expect(
      interpretReminder('remind me', { provider, now, timezone, maxAttempts: 1 })
    ).rejects.toMatchObject({ code: 'no_completion' });
  });

  it('wraps provider failures', async () => {
    const provider = new ScriptedProvider([new Error('socket hang up')]);

    await expect(
      interpretReminder('remind me', { provider, now, timezone, maxAttempts: 1 })
    ).rejects.toMatchObject({ code: 'llm_error', message: 'Completion request failed: socket hang up' });
  });

  it('does not retry a non-recoverable setup error', async () => {
    const provider = new ScriptedProvider([new AppError('ANTHROPIC_API_KEY not configured', 'config_error')]);

    await expect(
      interpretReminder('remind me', { provider, now, timezone, maxAttempts: 3 })
    ).rejects.toMatchObject({ code: 'config_error' });
    expect(provider.requests).toHaveLength(1);
  });

  it('makes a single attempt when maxAttempts is not a number', async () => {
    const provider = new ScriptedProvider(['{"kind": "rec", "text": "gym", "days": [1], "times": ["09:00"]}']);

    const result = await interpretReminder('gym on mondays', { provider, now, timezone, maxAttempts: NaN });

    expect(result.attempts).toBe(1);
    expect(provider.requests).toHaveLength(1);
  });

  it('rejects an empty query without calling the model', async () => {
    const provider = new ScriptedProvider([]);

    await expect(interpretReminder('   ', { provider, now, timezone })).rejects.toMatchObject({
      code: 'empty_query',
      recoverable: false,
    });
    expect(provider.requests).toHaveLength(0);
  });

  it('rejects an unknown timezone without calling the model', async () => {
    const provider = new ScriptedProvider([]);

    await expect(
      interpretReminder('remind me', { provider, now, timezone: 'Mars/Olympus' })
    ).rejects.toMatchObject({ code: 'invalid_timezone', message: 'Invalid timezone: "Mars/Olympus"' });
    expect(provider.requests).toHaveLength(0);
  });
});

describe('tryInterpretReminder', () => {
  it('returns the interpretation as a successful result', async () => {
    const provider = new ScriptedProvider(['{"kind": "rec", "text": "gym", "days": [1], "times": ["09:00"]}']);

    const result = await tryInterpretReminder('gym on mondays', { provider, now, timezone });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.reminder.kind).toBe('recurrent');
    }
  });

  it('returns failures instead of throwing', async () => {
    const result = await tryInterpretReminder('', { provider: new ScriptedProvider([]), now, timezone });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('empty_query');
    }
  });
});

describe('interpretReminder with the Anthropic provider', () => {
  it('sends the configured model and prompt', async () => {
    setMockResponses([
      createTextResponse('{"kind": "absolute", "text": "собеседование", "times": ["25.01.2023 10:00:00"]}'),
    ]);

    const result = await interpretReminder('завтра в 10 собеседование', { now, timezone });

    expect(result.occurrences).toEqual([
      { type: 'once', text: 'собеседование', runAt: new Date('2023-01-25T08:00:00.000Z') },
    ]);

    const calls = getCreateCalls();
    expect(calls).toHaveLength(1);
    expect(calls[0]).toEqual({
      model: 'test-parser-model',
      max_tokens: 512,
      temperature: 0,
      system: STANDARD_PROMPT,
      messages: [
        {
          role: 'user',
          content: 'Current time is "24.01.2023 14:00:00, Tuesday"\nзавтра в 10 собеседование\n',
        },
      ],
    });
  });

  it('retries when the API call fails', async () => {
    setMockResponses([
      new Error('overloaded'),
      createTextResponse('{"kind": "rec", "text": "gym", "days": [3], "times": ["07:00"]}'),
    ]);

    const result = await interpretReminder('gym on wednesdays', { now, timezone, maxAttempts: 2 });

    expect(result.attempts).toBe(2);
    expect(getCreateCalls()).toHaveLength(2);
  });
});
