/**
 * Credential lookup for provider configs
 */

import type { ProviderConfig } from '../types/providers.js';

/**
 * Resolve a provider's credential from the environment
 * Returns null when the variable is unset or blank
 */
export function resolveCredential(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env): string | null {
  const value = env[config.credentialRef]?.trim();
  return value ? value : null;
}

export function isUsable(config: ProviderConfig, env: NodeJS.ProcessEnv = process.env): boolean {
  return config.enabled && resolveCredential(config, env) !== null;
}
