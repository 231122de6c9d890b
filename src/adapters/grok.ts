/**
 * xAI Grok API adapter
 *
 * Uses OpenAI SDK with custom baseURL since Grok API is OpenAI-compatible
 */

import type { ProviderConfig } from '../types/providers.js';
import { OpenAICompatibleClient } from './openai.js';
import type { ProviderClient } from './types.js';

export const GROK_API_URL = 'https://api.x.ai/v1';

export function createGrokClient(config: ProviderConfig, apiKey: string): ProviderClient {
  return new OpenAICompatibleClient(config, apiKey, GROK_API_URL);
}
