/**
 * Provider client contract
 * Each adapter maps a CompletionRequest onto its backend and classifies failures
 */

import type { CompletionRequest, ProviderConfig, ProviderId } from '../types/providers.js';

export interface ProviderClient {
  readonly id: ProviderId;
  /**
   * Run a single completion
   *
   * @throws ProviderError classified as transient or permanent
   */
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}

/**
 * Builds a client from a resolved config and the credential value
 */
export type ProviderClientFactory = (config: ProviderConfig, apiKey: string) => ProviderClient;
