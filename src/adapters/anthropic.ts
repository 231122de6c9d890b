/**
 * Anthropic Messages API adapter
 */

import { z } from 'zod';
import type { CompletionRequest, ProviderConfig } from '../types/providers.js';
import { requireText } from './errors.js';
import { requestJson } from './http.js';
import type { ProviderClient } from './types.js';

export const ANTHROPIC_API_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

export class AnthropicClient implements ProviderClient {
  readonly id = 'anthropic';

  constructor(
    private readonly config: ProviderConfig,
    private readonly apiKey: string
  ) {}

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const data = await requestJson(
      this.id,
      ANTHROPIC_API_URL,
      {
        method: 'POST',
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': ANTHROPIC_VERSION,
        },
        body: {
          model: this.config.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
      },
      MessagesResponseSchema,
      signal
    );

    const text = data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
    return requireText(this.id, text);
  }
}

export function createAnthropicClient(config: ProviderConfig, apiKey: string): ProviderClient {
  return new AnthropicClient(config, apiKey);
}
