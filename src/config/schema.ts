/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';
import { ProviderIdSchema } from '../types/providers.js';

/**
 * Settings block for a single AI provider
 * Omitted options fall back to PROVIDER_DEFAULTS when the config is resolved
 */
export const ProviderSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    /** Credential reference: an environment variable name, bare or as ${NAME} */
    api_key: z.string().optional(),
    /** Alias of api_key */
    api_token: z.string().optional(),
    model: z.string().min(1, 'Model name must not be empty').optional(),
    temperature: z.number().min(0).max(2).optional(),
    max_tokens: z.number().int().min(1).max(32000).optional(),
    top_p: z.number().min(0).max(1).optional(),
    repetition_penalty: z.number().min(0.01).max(5).optional(),
    timeout_ms: z.number().int().min(1000).max(600000).optional(),
  })
  .strict();

/**
 * AI provider settings, keyed by provider id
 */
export const AIProvidersSchema = z
  .object({
    default: ProviderIdSchema.optional(),
    replicate: ProviderSettingsSchema.optional(),
    openai: ProviderSettingsSchema.optional(),
    anthropic: ProviderSettingsSchema.optional(),
    gemini: ProviderSettingsSchema.optional(),
    grok: ProviderSettingsSchema.optional(),
  })
  .strict();

/**
 * Fallback chain settings
 */
export const FallbackSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  order: z.array(ProviderIdSchema).default([]),
});

/**
 * Project detection settings
 */
export const ProjectDetectionSchema = z.object({
  level: z.number().int().positive().default(2),
});

/**
 * Analysis loop settings
 */
export const AnalysisSettingsSchema = z.object({
  concurrency: z.number().int().min(1).max(16).default(1),
  retries: z.number().int().min(0).max(5).default(1),
  retry_delay_ms: z.number().int().min(0).max(60000).default(500),
});

/**
 * Output settings
 */
export const OutputSettingsSchema = z.object({
  reports_dir: z.string().min(1).default('Reports'),
  log_file: z.string().min(1).default('docsurvey.log'),
  verbose: z.boolean().default(false),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  ai_providers: AIProvidersSchema.default({}),
  fallback: FallbackSettingsSchema.default({}),
  project_detection: ProjectDetectionSchema.default({}),
  analysis: AnalysisSettingsSchema.default({}),
  output: OutputSettingsSchema.default({}),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type AIProvidersSettings = z.infer<typeof AIProvidersSchema>;
export type FallbackSettings = z.infer<typeof FallbackSettingsSchema>;
export type ProjectDetectionSettings = z.infer<typeof ProjectDetectionSchema>;
export type AnalysisSettings = z.infer<typeof AnalysisSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
