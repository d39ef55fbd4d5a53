/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.PARSER_MODEL_ID = 'test-parser-model';
process.env.REMINDER_TIMEZONE = 'Asia/Jerusalem';
process.env.REMINDER_RETRY_BACKOFF_MS = '0';

// Import mocks
import { clearMockState } from './mocks/anthropic.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
});
