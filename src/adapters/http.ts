/**
 * JSON over fetch for the providers without an SDK in the stack
 */

import { z } from 'zod';
import { ProviderError } from '../errors.js';
import { statusError, toProviderError } from './errors.js';

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]).optional(),
  detail: z.string().optional(),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorDetail(body: string): string {
  const parsed = ErrorBodySchema.safeParse(parseJson(body));
  if (parsed.success) {
    const { error, detail } = parsed.data;
    if (typeof error === 'string') return error;
    if (error) return error.message;
    if (detail) return detail;
  }
  return body.slice(0, 200) || 'no response body';
}

/**
 * Send a request and parse the JSON response against a schema
 *
 * @throws ProviderError for transport failures, error statuses and unexpected bodies
 */
export async function requestJson<T>(
  provider: string,
  url: string,
  init: { method: 'GET' | 'POST'; headers: Record<string, string>; body?: unknown },
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal: AbortSignal
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: init.method,
      headers: { 'Content-Type': 'application/json', ...init.headers },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal,
    });
  } catch (error) {
    throw toProviderError(provider, error);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw toProviderError(provider, error);
  }

  if (!response.ok) {
    throw statusError(provider, response.status, errorDetail(text));
  }

  const json = parseJson(text);
  if (json === undefined) {
    throw new ProviderError(provider, 'permanent', `${provider} returned invalid JSON`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(provider, 'permanent', `${provider} returned an unexpected response shape`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
