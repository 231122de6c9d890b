/**
 * AI provider type definitions
 */

import { z } from 'zod';

/**
 * Supported AI providers (closed set)
 */
export const PROVIDER_IDS = ['replicate', 'openai', 'anthropic', 'gemini', 'grok'] as const;

export const ProviderIdSchema = z.enum(PROVIDER_IDS);

export type ProviderId = z.infer<typeof ProviderIdSchema>;

export function isProviderId(value: string): value is ProviderId {
  return (PROVIDER_IDS as readonly string[]).includes(value);
}

/**
 * Resolved, validated settings for one provider
 */
export interface ProviderConfig {
  readonly id: ProviderId;
  readonly enabled: boolean;
  /** Name of the environment variable holding the credential */
  readonly credentialRef: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly topP: number;
  readonly repetitionPenalty: number;
  readonly timeoutMs: number;
}

/**
 * Generation parameters for a single completion request
 */
export interface CompletionRequest {
  prompt: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  repetitionPenalty: number;
}

/**
 * Where an AI-derived text came from
 */
export type EnrichmentSource = 'provider' | 'basic';

/**
 * Why a basic result was returned: the input was too small to send,
 * or every provider in the chain failed or was skipped
 */
export type BasicReason = 'short-input' | 'exhausted';

export interface Enrichment {
  source: EnrichmentSource;
  /** Provider that produced the text (only for provider results) */
  provider?: ProviderId;
  /** Set by the gateway on basic results */
  reason?: BasicReason;
  text: string;
}

export type Summary = Enrichment;
export type DocAnalysis = Enrichment;
export type ProjectAnalysis = Enrichment;
export type CrossProjectAnalysis = Enrichment;

/**
 * Parameters for summarize()
 */
export interface SummaryParams {
  /** Maximum summary length in characters */
  maxLength?: number;
  projectName?: string | null;
}

/**
 * Context for analyzeDocument()
 */
export interface DocumentContext {
  fileName: string;
  format: string;
  projectName?: string | null;
  subfolder?: string;
}

/**
 * Statistics handed to analyzeProject()
 */
export interface ProjectStatsInput {
  fileCount: number;
  formats: Record<string, number>;
  subfolders: string[];
  totalSize: number;
}

export interface CrossProjectInput {
  name: string;
  stats: ProjectStatsInput;
}

/**
 * Provider availability as reported to callers
 */
export interface ProviderStatus {
  id: ProviderId;
  enabled: boolean;
  credentialed: boolean;
  usable: boolean;
  model: string;
}
