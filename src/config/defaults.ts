/**
 * Default configuration values
 */

import type { Config } from './schema.js';
import type { ProviderId } from '../types/providers.js';

/**
 * Per-provider defaults applied to any option the configuration leaves out
 */
export const PROVIDER_DEFAULTS: Record<
  ProviderId,
  {
    credentialRef: string;
    model: string;
    temperature: number;
    maxTokens: number;
    topP: number;
    repetitionPenalty: number;
    timeoutMs: number;
  }
> = {
  replicate: {
    credentialRef: 'REPLICATE_API_TOKEN',
    model: 'meta/llama-2-7b-chat',
    temperature: 0.3,
    maxTokens: 1000,
    topP: 0.9,
    repetitionPenalty: 1.1,
    timeoutMs: 60000,
  },
  openai: {
    credentialRef: 'OPENAI_API_KEY',
    model: 'gpt-4o-mini',
    temperature: 0.3,
    maxTokens: 1000,
    topP: 1,
    repetitionPenalty: 1,
    timeoutMs: 30000,
  },
  anthropic: {
    credentialRef: 'ANTHROPIC_API_KEY',
    model: 'claude-3-haiku-20240307',
    temperature: 0.3,
    maxTokens: 1000,
    topP: 1,
    repetitionPenalty: 1,
    timeoutMs: 30000,
  },
  gemini: {
    credentialRef: 'GEMINI_API_KEY',
    model: 'gemini-2.0-flash',
    temperature: 0.3,
    maxTokens: 1000,
    topP: 0.95,
    repetitionPenalty: 1,
    timeoutMs: 30000,
  },
  grok: {
    credentialRef: 'XAI_API_KEY',
    model: 'grok-3',
    temperature: 0.3,
    maxTokens: 1000,
    topP: 1,
    repetitionPenalty: 1,
    timeoutMs: 30000,
  },
};

/**
 * Upper bound for temperature where a provider is stricter than the schema
 */
export const PROVIDER_TEMPERATURE_MAX: Partial<Record<ProviderId, number>> = {
  anthropic: 1,
};

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  ai_providers: {
    default: 'replicate',
    replicate: {
      enabled: true,
      api_token: '${REPLICATE_API_TOKEN}',
      model: 'meta/llama-2-7b-chat',
      max_tokens: 1000,
      temperature: 0.3,
      top_p: 0.9,
      repetition_penalty: 1.1,
    },
    openai: {
      enabled: false,
      api_key: '${OPENAI_API_KEY}',
      model: 'gpt-4o-mini',
      max_tokens: 1000,
      temperature: 0.3,
    },
    anthropic: {
      enabled: false,
      api_key: '${ANTHROPIC_API_KEY}',
      model: 'claude-3-haiku-20240307',
      max_tokens: 1000,
      temperature: 0.3,
    },
    gemini: {
      enabled: false,
      api_key: '${GEMINI_API_KEY}',
      model: 'gemini-2.0-flash',
      max_tokens: 1000,
      temperature: 0.3,
    },
    grok: {
      enabled: false,
      api_key: '${XAI_API_KEY}',
      model: 'grok-3',
      max_tokens: 1000,
      temperature: 0.3,
    },
  },
  fallback: {
    enabled: true,
    order: ['replicate', 'openai', 'gemini', 'anthropic', 'grok'],
  },
  project_detection: {
    level: 2,
  },
  analysis: {
    concurrency: 1,
    retries: 1,
    retry_delay_ms: 500,
  },
  output: {
    reports_dir: 'Reports',
    log_file: 'docsurvey.log',
    verbose: false,
  },
};

/**
 * Configuration file names searched from the working directory upwards
 */
export const CONFIG_FILE_NAMES = [
  'docsurvey.config.yaml',
  'docsurvey.config.yml',
  '.docsurveyrc',
  '.docsurveyrc.yaml',
  '.docsurveyrc.yml',
  'ai_config.yaml',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  AI_PROVIDER: 'DOCSURVEY_AI_PROVIDER',
  DETECTION_LEVEL: 'DOCSURVEY_DETECTION_LEVEL',
  LOG_LEVEL: 'DOCSURVEY_LOG_LEVEL',
} as const;
