/**
 * OpenAI API adapter
 * Chat completions through the openai SDK
 */

import OpenAI from 'openai';
import { ProviderError, errorMessage } from '../errors.js';
import type { CompletionRequest, ProviderConfig } from '../types/providers.js';
import { kindForStatus, requireText, toProviderError } from './errors.js';
import type { ProviderClient } from './types.js';

/**
 * Map openai SDK errors onto transient/permanent provider errors
 */
export function classifyOpenAIError(provider: string, error: unknown): ProviderError {
  // Connection errors include SDK timeouts; user aborts come from the per-call timeout signal
  if (error instanceof OpenAI.APIConnectionError || error instanceof OpenAI.APIUserAbortError) {
    return new ProviderError(provider, 'transient', `${provider} connection error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    return new ProviderError(provider, kindForStatus(error.status), `${provider} API error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return toProviderError(provider, error);
}

/**
 * Client for any OpenAI-compatible chat completions endpoint
 */
export class OpenAICompatibleClient implements ProviderClient {
  private readonly client: OpenAI;

  constructor(
    private readonly config: ProviderConfig,
    apiKey: string,
    baseURL?: string
  ) {
    this.client = new OpenAI({
      apiKey,
      baseURL,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  get id() {
    return this.config.id;
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: request.temperature,
          top_p: request.topP,
          max_tokens: request.maxTokens,
        },
        { signal }
      );
      return requireText(this.id, completion.choices[0]?.message?.content);
    } catch (error) {
      throw classifyOpenAIError(this.id, error);
    }
  }
}

export function createOpenAIClient(config: ProviderConfig, apiKey: string): ProviderClient {
  return new OpenAICompatibleClient(config, apiKey);
}
