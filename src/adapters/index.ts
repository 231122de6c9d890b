/**
 * Adapters module - one ProviderClient per supported AI backend
 */

import type { ProviderConfig, ProviderId } from '../types/providers.js';
import { createAnthropicClient } from './anthropic.js';
import { createGeminiClient } from './gemini.js';
import { createGrokClient } from './grok.js';
import { createOpenAIClient } from './openai.js';
import { createReplicateClient } from './replicate.js';
import type { ProviderClient, ProviderClientFactory } from './types.js';

export type { ProviderClient, ProviderClientFactory } from './types.js';
export { kindForStatus, toProviderError } from './errors.js';

const FACTORIES: Record<ProviderId, ProviderClientFactory> = {
  replicate: createReplicateClient,
  openai: createOpenAIClient,
  anthropic: createAnthropicClient,
  gemini: createGeminiClient,
  grok: createGrokClient,
};

/**
 * Create the client for a provider config
 */
export function createProviderClient(config: ProviderConfig, apiKey: string): ProviderClient {
  return FACTORIES[config.id](config, apiKey);
}
