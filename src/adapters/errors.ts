/**
 * Failure classification shared by the adapters
 */

import { ProviderError, errorMessage, type ProviderErrorKind } from '../errors.js';

/**
 * Timeouts, rate limits and server errors are worth retrying; everything else is not
 */
export function kindForStatus(status: number | undefined): ProviderErrorKind {
  if (status === undefined) return 'transient';
  if (status === 408 || status === 409 || status === 429) return 'transient';
  return status >= 500 ? 'transient' : 'permanent';
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * Wrap an unclassified error thrown while talking to a provider
 * Aborts and network failures (fetch raises TypeError) are transient
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  if (isAbortError(error)) {
    return new ProviderError(provider, 'transient', `${provider} request timed out`, { cause: error });
  }
  if (error instanceof TypeError) {
    return new ProviderError(provider, 'transient', `${provider} network error: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return new ProviderError(provider, 'permanent', `${provider} error: ${errorMessage(error)}`, { cause: error });
}

/**
 * Error for an HTTP status, with a readable message for the common cases
 */
export function statusError(provider: string, status: number, detail: string): ProviderError {
  const kind = kindForStatus(status);
  if (status === 401 || status === 403) {
    return new ProviderError(provider, kind, `${provider} API key is invalid or lacks access (${status})`);
  }
  if (status === 429) {
    return new ProviderError(provider, kind, `${provider} rate limit exceeded`);
  }
  if (status === 404) {
    return new ProviderError(provider, kind, `${provider} model or endpoint not found: ${detail}`);
  }
  return new ProviderError(provider, kind, `${provider} API error (${status}): ${detail}`);
}

/**
 * Reject blank completions
 */
export function requireText(provider: string, text: string | null | undefined): string {
  const trimmed = text?.trim() ?? '';
  if (!trimmed) {
    throw new ProviderError(provider, 'permanent', `Empty response from ${provider}`);
  }
  return trimmed;
}
