/**
 * Fallback chain
 * Walks providers in order, retrying transient failures with exponential backoff
 */

import type { ProviderId } from '../types/providers.js';

export type AttemptOutcome<T> =
  | { status: 'success'; value: T }
  | { status: 'transient-failure'; error: string }
  | { status: 'permanent-failure'; error: string }
  | { status: 'skipped'; reason: string };

export type AttemptStatus = AttemptOutcome<unknown>['status'];

export interface AttemptRecord {
  provider: ProviderId;
  /** 1-based attempt number for this provider */
  attempt: number;
  status: AttemptStatus;
  detail?: string;
}

export interface ChainResult<T> {
  /** null when every provider failed or was skipped */
  value: T | null;
  provider: ProviderId | null;
  attempts: AttemptRecord[];
}

export interface ChainOptions {
  /** Extra attempts per provider after a transient failure */
  retries: number;
  /** Base delay; attempt n waits base * 2^(n-1) */
  retryDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  onAttempt?: (record: AttemptRecord) => void;
}

export const DEFAULT_CHAIN_OPTIONS: ChainOptions = {
  retries: 1,
  retryDelayMs: 500,
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseMs: number, attempt: number): number {
  return baseMs * Math.pow(2, attempt - 1);
}

/**
 * Run the chain
 * Skipped providers and permanent failures advance immediately; a provider is
 * attempted at most `retries + 1` times
 */
export async function runFallbackChain<T>(
  chain: readonly ProviderId[],
  attempt: (provider: ProviderId, attemptNumber: number) => Promise<AttemptOutcome<T>>,
  options: ChainOptions = DEFAULT_CHAIN_OPTIONS
): Promise<ChainResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts: AttemptRecord[] = [];

  const record = (entry: AttemptRecord) => {
    attempts.push(entry);
    options.onAttempt?.(entry);
  };

  for (const provider of chain) {
    for (let n = 1; n <= options.retries + 1; n++) {
      const outcome = await attempt(provider, n);

      switch (outcome.status) {
        case 'success':
          record({ provider, attempt: n, status: outcome.status });
          return { value: outcome.value, provider, attempts };
        case 'skipped':
          record({ provider, attempt: n, status: outcome.status, detail: outcome.reason });
          break;
        case 'permanent-failure':
          record({ provider, attempt: n, status: outcome.status, detail: outcome.error });
          break;
        case 'transient-failure':
          record({ provider, attempt: n, status: outcome.status, detail: outcome.error });
          if (n <= options.retries) {
            await sleep(backoffDelay(options.retryDelayMs, n));
            continue;
          }
          break;
      }
      break;
    }
  }

  return { value: null, provider: null, attempts };
}
