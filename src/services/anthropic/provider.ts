/**
 * Completion provider backed by the Anthropic Messages API.
 */

import type Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { withErrorContext } from '../../utils/errors.js';
import type { CompletionProvider, CompletionRequest } from '../reminders/provider.js';
import { getClient } from './client.js';

export interface AnthropicProviderOptions {
  model?: string;
  maxTokens?: number;
  /** Client to use instead of the shared singleton */
  client?: Anthropic;
}

/**
 * Create a provider that sends the system prompt and one user turn,
 * and returns the concatenated text blocks of the reply.
 */
export function createAnthropicProvider(options: AnthropicProviderOptions = {}): CompletionProvider {
  const model = options.model ?? config.models.parser;
  const maxTokens = options.maxTokens ?? config.reminders.maxTokens;

  return {
    name: `anthropic:${model}`,

    complete(request: CompletionRequest): Promise<string> {
      return withErrorContext(async () => {
        const anthropic = options.client ?? getClient();
        const response = await anthropic.messages.create({
          model,
          max_tokens: maxTokens,
          temperature: 0,
          system: request.system,
          messages: [{ role: 'user', content: request.user }],
        });

        return response.content
          .filter((block): block is Anthropic.TextBlock => block.type === 'text')
          .map((block) => block.text)
          .join('');
      }, 'anthropic_completion');
    },
  };
}
