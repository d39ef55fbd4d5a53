/**
 * Mock for @anthropic-ai/sdk module.
 *
 * Provides configurable mock responses for testing LLM interactions
 * without making real API calls.
 */

import { vi } from 'vitest';

/**
 * Text block response from Anthropic API.
 */
export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Mock response structure matching Anthropic API response.
 */
export interface MockResponse {
  content: TextBlock[];
  stop_reason: 'end_turn' | 'max_tokens';
}

export interface CreateCall {
  model: string;
  messages: unknown[];
  system?: string;
  max_tokens?: number;
  temperature?: number;
}

// Queue of mock responses (or errors) to return, consumed in order
let mockResponses: Array<MockResponse | Error> = [];

// Call history for assertions
let createCalls: CreateCall[] = [];

/**
 * Set the mock responses to return from messages.create().
 * If the queue is empty, a default text response is returned.
 */
export function setMockResponses(responses: Array<MockResponse | Error>): void {
  mockResponses = [...responses];
}

/**
 * Create a simple text response.
 */
export function createTextResponse(text: string): MockResponse {
  return {
    content: [{ type: 'text', text }],
    stop_reason: 'end_turn',
  };
}

/**
 * Get all calls made to messages.create() for assertions.
 */
export function getCreateCalls(): CreateCall[] {
  return [...createCalls];
}

/**
 * Clear mock state. Called from the global beforeEach.
 */
export function clearMockState(): void {
  mockResponses = [];
  createCalls = [];
}

// Mock the messages.create method
const mockCreate = vi.fn(async (params: CreateCall) => {
  createCalls.push({
    model: params.model,
    messages: params.messages,
    system: params.system,
    max_tokens: params.max_tokens,
    temperature: params.temperature,
  });

  const next = mockResponses.shift();
  if (next instanceof Error) {
    throw next;
  }
  if (next) {
    return next;
  }

  // Default response
  return createTextResponse('Mock response');
});

// Mock Anthropic class
class MockAnthropic {
  messages = {
    create: mockCreate,
  };

  constructor(_config?: { apiKey?: string }) {
    // Constructor accepts config but doesn't use it in mock
  }
}

// Export as default (matches how Anthropic SDK is imported)
export default MockAnthropic;

// Also export the mock function for direct access in tests
export { mockCreate };
