import { describe, expect, it } from 'vitest';
import { redactSecrets, safeSnippet } from '../../../src/utils/observability/index.js';

describe('observability redaction', () => {
  it('redacts sensitive keys and prompt content', () => {
    const input = {
      apiKey: 'test-api-key',
      query: 'Book dinner with Alex at 8pm',
      messages: [{ role: 'user', content: 'hi' }],
      attempt: 2,
      nested: {
        Authorization: 'Bearer test-token',
      },
    };

    const redacted = redactSecrets(input);

    expect(redacted).toEqual({
      apiKey: '[REDACTED]',
      query: `[REDACTED_TEXT len=${input.query.length}]`,
      messages: '[REDACTED_ARRAY len=1]',
      attempt: 2,
      nested: { Authorization: '[REDACTED]' },
    });
  });

  it('masks inline API keys in free text', () => {
    expect(redactSecrets({ error: 'invalid x-api-key sk-test-placeholder' })).toEqual({
      error: 'invalid x-api-key [REDACTED_KEY]',
    });
  });

  it('reduces errors to name and message outside development', () => {
    const previous = process.env.NODE_ENV;
    process.env.NODE_ENV = 'test';
    try {
      expect(redactSecrets({ cause: new TypeError('bad input') })).toEqual({
        cause: { name: 'TypeError', message: 'bad input', stack: undefined },
      });
    } finally {
      process.env.NODE_ENV = previous;
    }
  });

  it('truncates long snippets safely', () => {
    const value = 'x'.repeat(200);
    const snippet = safeSnippet(value, 20);
    expect(snippet).toBe('xxxxxxxxxxxxxxxxxxxx...(truncated)');
  });
});
