/**
 * Anthropic client singleton.
 */

import Anthropic from '@anthropic-ai/sdk';
import config from '../../config.js';
import { AppError } from '../../utils/errors.js';

let client: Anthropic | null = null;

/**
 * Get the shared Anthropic client, creating it on first use.
 */
export function getClient(): Anthropic {
  if (!client) {
    if (!config.anthropicApiKey) {
      throw new AppError('ANTHROPIC_API_KEY not configured', 'config_error');
    }
    client = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return client;
}

/**
 * Drop the shared client so the next call builds a new one.
 */
export function resetClient(): void {
  client = null;
}
