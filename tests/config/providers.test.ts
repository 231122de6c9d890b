/**
 * Tests for provider config resolution and credential lookup
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import {
  parseCredentialRef,
  resolveFallbackChain,
  resolveProviderConfigs,
} from '../../src/config/providers.js';
import { validateConfig } from '../../src/config/index.js';
import { isUsable, resolveCredential } from '../../src/ai/credentials.js';
import { ConfigurationError } from '../../src/errors.js';

describe('parseCredentialRef', () => {
  it('should accept ${NAME} and bare NAME', () => {
    expect(parseCredentialRef('openai', '${OPENAI_API_KEY}')).toBe('OPENAI_API_KEY');
    expect(parseCredentialRef('openai', 'OPENAI_API_KEY')).toBe('OPENAI_API_KEY');
  });

  it('should reject values that look like literal secrets', () => {
    expect(() => parseCredentialRef('openai', 'test-secret')).toThrow(ConfigurationError);
    expect(() => parseCredentialRef('openai', '${NOT CLOSED')).toThrow(ConfigurationError);
  });
});

describe('resolveProviderConfigs', () => {
  it('should resolve every configured provider with defaults filled in', () => {
    const configs = resolveProviderConfigs(validateConfig(DEFAULT_CONFIG));

    expect(configs.map((c) => c.id)).toEqual(['replicate', 'openai', 'anthropic', 'gemini', 'grok']);

    const replicate = configs[0];
    expect(replicate.enabled).toBe(true);
    expect(replicate.credentialRef).toBe('REPLICATE_API_TOKEN');
    expect(replicate.model).toBe('meta/llama-2-7b-chat');
    expect(replicate.topP).toBe(0.9);
    expect(replicate.repetitionPenalty).toBe(1.1);
    expect(replicate.timeoutMs).toBe(60000);
    expect(Object.isFrozen(replicate)).toBe(true);
  });

  it('should accept api_token as an alias of api_key', () => {
    const config = validateConfig({ ai_providers: { grok: { enabled: true, api_token: 'MY_GROK_KEY' } } });

    const [grok] = resolveProviderConfigs(config);

    expect(grok.credentialRef).toBe('MY_GROK_KEY');
  });

  it('should fall back to the default credential variable', () => {
    const config = validateConfig({ ai_providers: { gemini: { enabled: true } } });

    const [gemini] = resolveProviderConfigs(config);

    expect(gemini.credentialRef).toBe('GEMINI_API_KEY');
    expect(gemini.model).toBe('gemini-2.0-flash');
  });

  it('should reject an anthropic temperature above 1', () => {
    const config = validateConfig({ ai_providers: { anthropic: { enabled: true, temperature: 1.5 } } });

    expect(() => resolveProviderConfigs(config)).toThrow(/at most 1/);
  });

  it('should reject a literal credential', () => {
    const config = validateConfig({ ai_providers: { openai: { enabled: true, api_key: 'test-secret' } } });

    expect(() => resolveProviderConfigs(config)).toThrow(ConfigurationError);
  });
});

describe('resolveFallbackChain', () => {
  it('should return the configured order without duplicates', () => {
    const config = validateConfig({
      ai_providers: { openai: { enabled: true }, gemini: { enabled: true } },
      fallback: { order: ['gemini', 'openai', 'gemini'] },
    });

    expect(resolveFallbackChain(config)).toEqual(['gemini', 'openai']);
  });

  it('should use only the default provider when fallback is disabled', () => {
    const config = validateConfig({
      ai_providers: { default: 'openai', openai: { enabled: true }, gemini: { enabled: true } },
      fallback: { enabled: false, order: ['gemini', 'openai'] },
    });

    expect(resolveFallbackChain(config)).toEqual(['openai']);
  });

  it('should be empty when fallback is disabled and no default is set', () => {
    const config = validateConfig({ fallback: { enabled: false } });

    expect(resolveFallbackChain(config)).toEqual([]);
  });

  it('should reject a chain entry without a provider block', () => {
    const config = validateConfig({
      ai_providers: { openai: { enabled: true } },
      fallback: { order: ['openai', 'grok'] },
    });

    expect(() => resolveFallbackChain(config)).toThrow(/unconfigured provider "grok"/);
  });

  it('should reject a default provider without a provider block', () => {
    const config = validateConfig({ ai_providers: { default: 'grok' } });

    expect(() => resolveFallbackChain(config)).toThrow(ConfigurationError);
  });
});

describe('resolveCredential', () => {
  const [openai] = resolveProviderConfigs(
    validateConfig({ ai_providers: { openai: { enabled: true, api_key: '${OPENAI_API_KEY}' } } })
  );

  it('should read the referenced environment variable', () => {
    expect(resolveCredential(openai, { OPENAI_API_KEY: 'test-secret' })).toBe('test-secret');
  });

  it('should treat unset and blank values as missing', () => {
    expect(resolveCredential(openai, {})).toBeNull();
    expect(resolveCredential(openai, { OPENAI_API_KEY: '   ' })).toBeNull();
  });

  it('should require both the enabled flag and a credential', () => {
    expect(isUsable(openai, { OPENAI_API_KEY: 'test-secret' })).toBe(true);
    expect(isUsable(openai, {})).toBe(false);
    expect(isUsable({ ...openai, enabled: false }, { OPENAI_API_KEY: 'test-secret' })).toBe(false);
  });
});
