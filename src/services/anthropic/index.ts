/**
 * Anthropic service - LLM client and the completion provider built on it.
 */

export { getClient, resetClient } from './client.js';
export { createAnthropicProvider } from './provider.js';
export type { AnthropicProviderOptions } from './provider.js';
