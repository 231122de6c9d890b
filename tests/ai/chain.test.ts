/**
 * Tests for the provider fallback chain
 */

import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, runFallbackChain, type AttemptOutcome } from '../../src/ai/chain.js';
import type { ProviderId } from '../../src/types/providers.js';

function script(
  outcomes: Partial<Record<ProviderId, AttemptOutcome<string>[]>>
): (provider: ProviderId) => Promise<AttemptOutcome<string>> {
  const queues = new Map(Object.entries(outcomes));
  return async (provider) => {
    const next = queues.get(provider)?.shift();
    if (!next) {
      throw new Error(`Unexpected attempt on ${provider}`);
    }
    return next;
  };
}

describe('backoffDelay', () => {
  it('should double the delay per attempt', () => {
    expect(backoffDelay(500, 1)).toBe(500);
    expect(backoffDelay(500, 2)).toBe(1000);
    expect(backoffDelay(500, 3)).toBe(2000);
  });
});

describe('runFallbackChain', () => {
  const sleep = vi.fn(async (_ms: number) => {});

  it('should return the first success and stop there', async () => {
    const attempt = vi.fn(
      script({
        openai: [{ status: 'permanent-failure', error: 'API key is invalid' }],
        gemini: [{ status: 'success', value: 'from gemini' }],
      })
    );

    const result = await runFallbackChain(['openai', 'gemini', 'grok'], attempt, {
      retries: 1,
      retryDelayMs: 10,
      sleep,
    });

    expect(result.value).toBe('from gemini');
    expect(result.provider).toBe('gemini');
    expect(attempt.mock.calls.map(([provider]) => provider)).toEqual(['openai', 'gemini']);
    expect(result.attempts).toEqual([
      { provider: 'openai', attempt: 1, status: 'permanent-failure', detail: 'API key is invalid' },
      { provider: 'gemini', attempt: 1, status: 'success' },
    ]);
  });

  it('should retry a transient failure with backoff before moving on', async () => {
    sleep.mockClear();
    const attempt = script({
      replicate: [
        { status: 'transient-failure', error: 'timed out' },
        { status: 'transient-failure', error: 'timed out' },
        { status: 'transient-failure', error: 'timed out' },
      ],
      openai: [{ status: 'success', value: 'ok' }],
    });

    const result = await runFallbackChain(['replicate', 'openai'], attempt, {
      retries: 2,
      retryDelayMs: 100,
      sleep,
    });

    expect(result.provider).toBe('openai');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(result.attempts.map((a) => `${a.provider}:${a.attempt}:${a.status}`)).toEqual([
      'replicate:1:transient-failure',
      'replicate:2:transient-failure',
      'replicate:3:transient-failure',
      'openai:1:success',
    ]);
  });

  it('should succeed on a retry of the same provider', async () => {
    const attempt = script({
      anthropic: [
        { status: 'transient-failure', error: 'rate limit exceeded' },
        { status: 'success', value: 'second try' },
      ],
    });

    const result = await runFallbackChain(['anthropic'], attempt, { retries: 1, retryDelayMs: 0, sleep });

    expect(result.value).toBe('second try');
    expect(result.attempts).toHaveLength(2);
  });

  it('should not retry skipped providers', async () => {
    const attempt = vi.fn(
      script({
        replicate: [{ status: 'skipped', reason: 'REPLICATE_API_TOKEN is not set' }],
        grok: [{ status: 'success', value: 'grok text' }],
      })
    );

    const result = await runFallbackChain(['replicate', 'grok'], attempt, { retries: 3, retryDelayMs: 0, sleep });

    expect(result.value).toBe('grok text');
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(result.attempts[0]).toEqual({
      provider: 'replicate',
      attempt: 1,
      status: 'skipped',
      detail: 'REPLICATE_API_TOKEN is not set',
    });
  });

  it('should return null when every provider fails', async () => {
    const attempt = script({
      openai: [{ status: 'permanent-failure', error: 'bad request' }],
      gemini: [{ status: 'skipped', reason: 'disabled' }],
    });

    const result = await runFallbackChain(['openai', 'gemini'], attempt, { retries: 0, retryDelayMs: 0, sleep });

    expect(result.value).toBeNull();
    expect(result.provider).toBeNull();
    expect(result.attempts).toHaveLength(2);
  });

  it('should return null for an empty chain', async () => {
    const result = await runFallbackChain([], script({}));

    expect(result).toEqual({ value: null, provider: null, attempts: [] });
  });

  it('should report each attempt as it happens', async () => {
    const seen: string[] = [];
    const attempt = script({ openai: [{ status: 'success', value: 'x' }] });

    await runFallbackChain(['openai'], attempt, {
      retries: 0,
      retryDelayMs: 0,
      onAttempt: (record) => seen.push(`${record.provider}:${record.status}`),
    });

    expect(seen).toEqual(['openai:success']);
  });
});
