/**
 * Tests for the AI provider gateway
 * Uses an in-process client factory in place of the real adapters
 */

import { describe, it, expect, vi } from 'vitest';
import { AIProviderGateway, createGateway, orderChain } from '../../src/ai/gateway.js';
import type { ProviderClient, ProviderClientFactory } from '../../src/adapters/types.js';
import { resolveProviderConfigs } from '../../src/config/providers.js';
import { validateConfig } from '../../src/config/index.js';
import { ProviderError } from '../../src/errors.js';
import type { CompletionRequest, ProviderId } from '../../src/types/providers.js';

const CONTENT = 'Quarterly planning notes. The team reviewed goals and assigned owners for each milestone.';
const ENV = { OPENAI_API_KEY: 'test-secret', GEMINI_API_KEY: 'test-secret' };

type Behavior = (request: CompletionRequest) => Promise<string>;

function fakeFactory(behaviors: Partial<Record<ProviderId, Behavior>>) {
  const requests: Array<{ provider: ProviderId; request: CompletionRequest }> = [];
  const factory = vi.fn<ProviderClientFactory>((config) => {
    const client: ProviderClient = {
      id: config.id,
      complete: async (request) => {
        requests.push({ provider: config.id, request });
        const behavior = behaviors[config.id];
        if (!behavior) {
          throw new Error(`No behavior for ${config.id}`);
        }
        return behavior(request);
      },
    };
    return client;
  });
  return { factory, requests };
}

function providers(settings: Record<string, unknown>) {
  return resolveProviderConfigs(validateConfig({ ai_providers: settings }));
}

function timeoutError(): Error {
  const error = new Error('The operation was aborted due to timeout');
  error.name = 'TimeoutError';
  return error;
}

describe('orderChain', () => {
  it('should rotate the default provider to the front', () => {
    expect(orderChain(['openai', 'gemini', 'grok'], 'gemini')).toEqual(['gemini', 'openai', 'grok']);
  });

  it('should keep the order when the default is absent from the chain', () => {
    expect(orderChain(['openai', 'gemini'], 'grok')).toEqual(['openai', 'gemini']);
    expect(orderChain(['openai', 'gemini'])).toEqual(['openai', 'gemini']);
  });
});

describe('AIProviderGateway', () => {
  const sleep = vi.fn(async (_ms: number) => {});

  it('should return basic analysis without calling any provider when all are disabled', async () => {
    const { factory } = fakeFactory({});
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: false }, gemini: { enabled: false } }),
      chain: ['openai', 'gemini'],
      env: ENV,
      clientFactory: factory,
      sleep,
    });

    const summary = await gateway.summarize(CONTENT);

    expect(summary).toEqual({ source: 'basic', reason: 'exhausted', text: 'Quarterly planning notes' });
    expect(factory).not.toHaveBeenCalled();
    expect(gateway.getActiveProvider()).toBeNull();
  });

  it('should skip providers whose credential is missing', async () => {
    const { factory, requests } = fakeFactory({ gemini: async () => 'gemini summary' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true }, gemini: { enabled: true } }),
      chain: ['openai', 'gemini'],
      env: { GEMINI_API_KEY: 'test-secret' },
      clientFactory: factory,
      sleep,
    });

    const summary = await gateway.summarize(CONTENT);

    expect(summary).toEqual({ source: 'provider', provider: 'gemini', text: 'gemini summary' });
    expect(requests.map((r) => r.provider)).toEqual(['gemini']);
    expect(gateway.getUsableProviders()).toEqual(['gemini']);
  });

  it('should try the default provider first', async () => {
    const { factory, requests } = fakeFactory({
      openai: async () => 'openai summary',
      gemini: async () => 'gemini summary',
    });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true }, gemini: { enabled: true } }),
      chain: ['openai', 'gemini'],
      defaultProvider: 'gemini',
      env: ENV,
      clientFactory: factory,
      sleep,
    });

    const summary = await gateway.summarize(CONTENT);

    expect(gateway.getChain()).toEqual(['gemini', 'openai']);
    expect(summary.provider).toBe('gemini');
    expect(requests).toHaveLength(1);
  });

  it('should advance past a permanent failure without retrying', async () => {
    const { factory, requests } = fakeFactory({
      openai: async () => {
        throw new ProviderError('openai', 'permanent', 'openai API key is invalid or lacks access (401)');
      },
      gemini: async () => 'gemini analysis',
    });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true }, gemini: { enabled: true } }),
      chain: ['openai', 'gemini'],
      retries: 2,
      env: ENV,
      clientFactory: factory,
      sleep,
    });

    const analysis = await gateway.analyzeDocument(CONTENT, { fileName: 'plan.txt', format: 'text' });

    expect(analysis).toEqual({ source: 'provider', provider: 'gemini', text: 'gemini analysis' });
    expect(requests.map((r) => r.provider)).toEqual(['openai', 'gemini']);
  });

  it('should retry a timeout as a transient failure', async () => {
    sleep.mockClear();
    const { factory, requests } = fakeFactory({
      openai: async () => {
        throw timeoutError();
      },
      gemini: async () => 'gemini summary',
    });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true }, gemini: { enabled: true } }),
      chain: ['openai', 'gemini'],
      retries: 1,
      retryDelayMs: 250,
      env: ENV,
      clientFactory: factory,
      sleep,
    });

    const summary = await gateway.summarize(CONTENT);

    expect(summary.provider).toBe('gemini');
    expect(requests.map((r) => r.provider)).toEqual(['openai', 'openai', 'gemini']);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([250]);
  });

  it('should fall back to basic analysis when every provider fails', async () => {
    const { factory } = fakeFactory({
      openai: async () => {
        throw new Error('unexpected failure');
      },
    });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
      sleep,
    });

    const analysis = await gateway.analyzeDocument('A short plain note about nothing in particular', {
      fileName: 'note.txt',
      format: 'text',
    });

    expect(analysis.source).toBe('basic');
    expect(analysis.text).toBe(
      'Document Analysis (Basic):\n- File type: TXT\n- Content length: 46 characters, 8 words' +
        '\n\nNote: Full AI analysis requires API configuration'
    );
  });

  it('should not call providers for content that is too short', async () => {
    const { factory } = fakeFactory({ openai: async () => 'never' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
    });

    expect(await gateway.summarize('Too short.')).toEqual({
      source: 'basic',
      reason: 'short-input',
      text: 'Content too short for meaningful summary',
    });
    expect(await gateway.analyzeDocument('tiny', { fileName: 'a.txt', format: 'text' })).toEqual({
      source: 'basic',
      reason: 'short-input',
      text: 'Content too short for analysis',
    });
    expect(factory).not.toHaveBeenCalled();
  });

  it('should cap the output budget by the provider max_tokens', async () => {
    const { factory, requests } = fakeFactory({ openai: async () => 'ok' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true, max_tokens: 40, temperature: 0.7 } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
    });

    await gateway.summarize(CONTENT);
    await gateway.analyzeDocument(CONTENT, { fileName: 'plan.txt', format: 'text' });

    expect(requests.map((r) => r.request.maxTokens)).toEqual([40, 40]);
    expect(requests[0].request.temperature).toBe(0.7);
  });

  it('should use per-operation budgets below the provider limit', async () => {
    const { factory, requests } = fakeFactory({ openai: async () => 'ok' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
    });
    const stats = { fileCount: 1, formats: { '.txt': 1 }, subfolders: [], totalSize: 10 };

    await gateway.summarize(CONTENT);
    await gateway.analyzeDocument(CONTENT, { fileName: 'plan.txt', format: 'text' });
    await gateway.analyzeProject('Alpha', ['A plan'], stats);
    await gateway.analyzeCrossProject([{ name: 'Alpha', stats }]);

    expect(requests.map((r) => r.request.maxTokens)).toEqual([60, 150, 200, 250]);
  });

  it('should include the project name in the summary prompt', async () => {
    const { factory, requests } = fakeFactory({ openai: async () => 'ok' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
    });

    await gateway.summarize(CONTENT, { maxLength: 120, projectName: 'Alpha' });

    expect(requests[0].request.prompt).toContain('in 120 characters or less:');
    expect(requests[0].request.prompt).toContain("This document belongs to the 'Alpha' project.");
  });

  it('should create one client per provider and reuse it', async () => {
    const { factory } = fakeFactory({ openai: async () => 'ok' });
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true } }),
      chain: ['openai'],
      env: ENV,
      clientFactory: factory,
    });

    await gateway.summarize(CONTENT);
    await gateway.summarize(CONTENT);

    expect(factory).toHaveBeenCalledTimes(1);
    expect(factory.mock.calls[0][1]).toBe('test-secret');
  });

  it('should answer project questions without providers when there is nothing to analyze', async () => {
    const gateway = new AIProviderGateway({ providers: [], chain: [] });

    expect(
      await gateway.analyzeProject('Empty', [], { fileCount: 0, formats: {}, subfolders: [], totalSize: 0 })
    ).toEqual({ source: 'basic', reason: 'short-input', text: "No files found for project 'Empty'" });
    expect(await gateway.analyzeCrossProject([])).toEqual({
      source: 'basic',
      reason: 'short-input',
      text: 'No projects found for cross-analysis',
    });
  });

  it('should report provider statuses in chain order', () => {
    const gateway = new AIProviderGateway({
      providers: providers({ openai: { enabled: true }, gemini: { enabled: true }, grok: { enabled: false } }),
      chain: ['gemini', 'openai'],
      env: { OPENAI_API_KEY: 'test-secret' },
    });

    expect(gateway.getProviderStatuses()).toEqual([
      { id: 'gemini', enabled: true, credentialed: false, usable: false, model: 'gemini-2.0-flash' },
      { id: 'openai', enabled: true, credentialed: true, usable: true, model: 'gpt-4o-mini' },
      { id: 'grok', enabled: false, credentialed: false, usable: false, model: 'grok-3' },
    ]);
  });
});

describe('createGateway', () => {
  it('should build the chain from configuration', () => {
    const config = validateConfig({
      ai_providers: { default: 'gemini', openai: { enabled: true }, gemini: { enabled: true } },
      fallback: { enabled: true, order: ['openai', 'gemini'] },
    });

    const gateway = createGateway(config, { env: ENV });

    expect(gateway.getChain()).toEqual(['gemini', 'openai']);
    expect(gateway.getActiveProvider()).toBe('gemini');
  });
});
