/**
 * Google Gemini API adapter
 */

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
} from '@google/generative-ai';
import { ProviderError, errorMessage } from '../errors.js';
import type { CompletionRequest, ProviderConfig } from '../types/providers.js';
import { kindForStatus, requireText, toProviderError } from './errors.js';
import type { ProviderClient } from './types.js';

export function classifyGeminiError(error: unknown): ProviderError {
  if (error instanceof GoogleGenerativeAIFetchError) {
    return new ProviderError('gemini', kindForStatus(error.status), `Gemini API error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  // Blocked or malformed candidates
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new ProviderError('gemini', 'permanent', `Gemini response error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return toProviderError('gemini', error);
}

export class GeminiClient implements ProviderClient {
  readonly id = 'gemini';
  private readonly client: GoogleGenerativeAI;

  constructor(
    private readonly config: ProviderConfig,
    apiKey: string
  ) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const generativeModel = this.client.getGenerativeModel({ model: this.config.model });

    try {
      const result = await generativeModel.generateContent(
        {
          contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
          generationConfig: {
            temperature: request.temperature,
            topP: request.topP,
            maxOutputTokens: request.maxTokens,
          },
        },
        { signal, timeout: this.config.timeoutMs }
      );
      return requireText(this.id, result.response.text());
    } catch (error) {
      throw classifyGeminiError(error);
    }
  }
}

export function createGeminiClient(config: ProviderConfig, apiKey: string): ProviderClient {
  return new GeminiClient(config, apiKey);
}
