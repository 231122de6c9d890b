/**
 * Provider configuration resolution
 * Turns the raw ai_providers/fallback sections into frozen ProviderConfig objects and a fallback chain
 */

import type { Config, ProviderSettings } from './schema.js';
import { PROVIDER_DEFAULTS, PROVIDER_TEMPERATURE_MAX } from './defaults.js';
import { PROVIDER_IDS, type ProviderConfig, type ProviderId } from '../types/providers.js';
import { ConfigurationError } from '../errors.js';

const CREDENTIAL_REF_PATTERN = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$|^([A-Za-z_][A-Za-z0-9_]*)$/;

/**
 * Normalize a credential reference to the bare environment variable name
 * Accepts "NAME" or "${NAME}"; anything else looks like a literal secret and is rejected
 */
export function parseCredentialRef(provider: ProviderId, ref: string): string {
  const match = ref.trim().match(CREDENTIAL_REF_PATTERN);
  if (!match) {
    throw new ConfigurationError(
      `ai_providers.${provider}: credential must reference an environment variable (e.g. \${OPENAI_API_KEY}), not a literal value`
    );
  }
  return match[1] ?? match[2];
}

function resolveProvider(id: ProviderId, settings: ProviderSettings | undefined): ProviderConfig {
  const defaults = PROVIDER_DEFAULTS[id];
  const rawRef = settings?.api_key ?? settings?.api_token;
  const temperature = settings?.temperature ?? defaults.temperature;

  const maxTemperature = PROVIDER_TEMPERATURE_MAX[id];
  if (maxTemperature !== undefined && temperature > maxTemperature) {
    throw new ConfigurationError(
      `ai_providers.${id}.temperature must be at most ${maxTemperature}, got ${temperature}`
    );
  }

  return Object.freeze({
    id,
    enabled: settings?.enabled ?? false,
    credentialRef: rawRef ? parseCredentialRef(id, rawRef) : defaults.credentialRef,
    model: settings?.model ?? defaults.model,
    temperature,
    maxTokens: settings?.max_tokens ?? defaults.maxTokens,
    topP: settings?.top_p ?? defaults.topP,
    repetitionPenalty: settings?.repetition_penalty ?? defaults.repetitionPenalty,
    timeoutMs: settings?.timeout_ms ?? defaults.timeoutMs,
  });
}

/**
 * Resolve every configured provider block
 * Providers without a block are not configured and are absent from the result
 */
export function resolveProviderConfigs(config: Config): ProviderConfig[] {
  const configs: ProviderConfig[] = [];
  for (const id of PROVIDER_IDS) {
    const settings = config.ai_providers[id];
    if (settings) {
      configs.push(resolveProvider(id, settings));
    }
  }
  return configs;
}

/**
 * Resolve the fallback chain
 *
 * - fallback enabled: the configured order
 * - fallback disabled: only the default provider
 *
 * @throws ConfigurationError if an id in the chain has no provider block
 */
export function resolveFallbackChain(config: Config): ProviderId[] {
  const { fallback } = config;
  const defaultProvider = config.ai_providers.default;

  let chain: ProviderId[];
  if (fallback.enabled) {
    chain = [...new Set(fallback.order)];
  } else {
    chain = defaultProvider ? [defaultProvider] : [];
  }

  for (const id of chain) {
    if (!config.ai_providers[id]) {
      throw new ConfigurationError(`Fallback chain references unconfigured provider "${id}"`);
    }
  }

  if (defaultProvider && !config.ai_providers[defaultProvider]) {
    throw new ConfigurationError(`Default provider "${defaultProvider}" is not configured`);
  }

  return chain;
}
