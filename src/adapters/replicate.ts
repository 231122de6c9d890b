/**
 * Replicate predictions API adapter
 * Creates a prediction with `Prefer: wait` and polls until it settles
 */

import { setTimeout as delay } from 'node:timers/promises';
import { z } from 'zod';
import { ProviderError } from '../errors.js';
import type { CompletionRequest, ProviderConfig } from '../types/providers.js';
import { requireText } from './errors.js';
import { requestJson } from './http.js';
import type { ProviderClient } from './types.js';

export const REPLICATE_API_URL = 'https://api.replicate.com/v1';
const POLL_INTERVAL_MS = 1000;

const PredictionSchema = z.object({
  id: z.string(),
  status: z.enum(['starting', 'processing', 'succeeded', 'failed', 'canceled']),
  output: z.union([z.array(z.string()), z.string(), z.null()]).optional(),
  error: z.unknown().optional(),
  urls: z.object({ get: z.string() }).optional(),
});

type Prediction = z.infer<typeof PredictionSchema>;

/**
 * Join streamed output chunks and drop an echoed prompt
 */
export function cleanOutput(output: Prediction['output'], prompt: string): string {
  const joined = Array.isArray(output) ? output.join('') : (output ?? '');
  const trimmed = joined.trim();
  return trimmed.startsWith(prompt) ? trimmed.slice(prompt.length).trim() : trimmed;
}

export class ReplicateClient implements ProviderClient {
  readonly id = 'replicate';

  constructor(
    private readonly config: ProviderConfig,
    private readonly apiToken: string
  ) {}

  private get headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiToken}` };
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    let prediction = await requestJson(
      this.id,
      `${REPLICATE_API_URL}/models/${this.config.model}/predictions`,
      {
        method: 'POST',
        headers: { ...this.headers, Prefer: 'wait' },
        body: {
          input: {
            prompt: request.prompt,
            max_new_tokens: request.maxTokens,
            temperature: request.temperature,
            top_p: request.topP,
            repetition_penalty: request.repetitionPenalty,
          },
        },
      },
      PredictionSchema,
      signal
    );

    while (prediction.status === 'starting' || prediction.status === 'processing') {
      const pollUrl = prediction.urls?.get ?? `${REPLICATE_API_URL}/predictions/${prediction.id}`;
      await delay(POLL_INTERVAL_MS, undefined, { signal });
      prediction = await requestJson(this.id, pollUrl, { method: 'GET', headers: this.headers }, PredictionSchema, signal);
    }

    if (prediction.status !== 'succeeded') {
      const detail = typeof prediction.error === 'string' ? prediction.error : prediction.status;
      throw new ProviderError(this.id, 'permanent', `Replicate prediction ${prediction.status}: ${detail}`);
    }

    return requireText(this.id, cleanOutput(prediction.output, request.prompt));
  }
}

export function createReplicateClient(config: ProviderConfig, apiToken: string): ProviderClient {
  return new ReplicateClient(config, apiToken);
}
