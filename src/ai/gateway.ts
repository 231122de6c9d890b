/**
 * AI provider gateway
 * One entry point for summaries and analyses across every configured provider.
 * Callers always get a result: a provider's text, or basic analysis when the chain is exhausted
 */

import { createProviderClient, type ProviderClient, type ProviderClientFactory } from '../adapters/index.js';
import { toProviderError } from '../adapters/errors.js';
import { resolveFallbackChain, resolveProviderConfigs } from '../config/providers.js';
import type { Config } from '../config/schema.js';
import type { RunLogger } from '../logging/run-logger.js';
import type {
  BasicReason,
  CompletionRequest,
  CrossProjectAnalysis,
  CrossProjectInput,
  DocAnalysis,
  DocumentContext,
  Enrichment,
  ProjectAnalysis,
  ProjectStatsInput,
  ProviderConfig,
  ProviderId,
  ProviderStatus,
  Summary,
  SummaryParams,
} from '../types/providers.js';
import {
  DEFAULT_SUMMARY_LENGTH,
  basicCrossProjectAnalysis,
  basicDocumentAnalysis,
  basicProjectAnalysis,
  basicSummary,
} from './basic-analysis.js';
import { runFallbackChain, type AttemptOutcome, type AttemptRecord } from './chain.js';
import { resolveCredential } from './credentials.js';
import {
  buildCrossProjectPrompt,
  buildDocumentPrompt,
  buildProjectPrompt,
  buildSummaryPrompt,
} from './prompts.js';

/** Content shorter than this skips providers */
export const MIN_SUMMARY_CONTENT = 50;
export const MIN_ANALYSIS_CONTENT = 20;

/** Output token budgets per operation, capped by each provider's max_tokens */
const TOKEN_BUDGETS = {
  summary: 60,
  document: 150,
  project: 200,
  crossProject: 250,
} as const;

export interface GatewayOptions {
  providers: readonly ProviderConfig[];
  chain: readonly ProviderId[];
  defaultProvider?: ProviderId;
  retries?: number;
  retryDelayMs?: number;
  env?: NodeJS.ProcessEnv;
  clientFactory?: ProviderClientFactory;
  sleep?: (ms: number) => Promise<void>;
  logger?: RunLogger;
}

/**
 * Put the default provider first when it is part of the chain
 */
export function orderChain(chain: readonly ProviderId[], defaultProvider?: ProviderId): ProviderId[] {
  if (!defaultProvider || !chain.includes(defaultProvider)) {
    return [...chain];
  }
  return [defaultProvider, ...chain.filter((id) => id !== defaultProvider)];
}

export class AIProviderGateway {
  private readonly configs: Map<ProviderId, ProviderConfig>;
  private readonly chain: ProviderId[];
  private readonly clients = new Map<ProviderId, ProviderClient>();
  private readonly env: NodeJS.ProcessEnv;
  private readonly clientFactory: ProviderClientFactory;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger?: RunLogger;

  constructor(options: GatewayOptions) {
    this.configs = new Map(options.providers.map((p) => [p.id, p]));
    this.chain = orderChain(options.chain, options.defaultProvider);
    this.env = options.env ?? process.env;
    this.clientFactory = options.clientFactory ?? createProviderClient;
    this.retries = options.retries ?? 1;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.sleep = options.sleep;
    this.logger = options.logger;
  }

  /**
   * Chain order after default-provider rotation
   */
  getChain(): ProviderId[] {
    return [...this.chain];
  }

  /**
   * Providers that are enabled and credentialed, in chain order
   */
  getUsableProviders(): ProviderId[] {
    return this.chain.filter((id) => this.isUsable(id));
  }

  /**
   * First usable provider, or null
   */
  getActiveProvider(): ProviderId | null {
    return this.getUsableProviders()[0] ?? null;
  }

  /**
   * Status of every configured provider, chain members first
   */
  getProviderStatuses(): ProviderStatus[] {
    const ordered = [...this.chain, ...[...this.configs.keys()].filter((id) => !this.chain.includes(id))];
    const statuses: ProviderStatus[] = [];
    for (const id of ordered) {
      const config = this.configs.get(id);
      if (!config) continue;
      const credentialed = resolveCredential(config, this.env) !== null;
      statuses.push({
        id,
        enabled: config.enabled,
        credentialed,
        usable: config.enabled && credentialed,
        model: config.model,
      });
    }
    return statuses;
  }

  async summarize(content: string, params: SummaryParams = {}): Promise<Summary> {
    const maxLength = params.maxLength ?? DEFAULT_SUMMARY_LENGTH;
    if (!content || content.trim().length < MIN_SUMMARY_CONTENT) {
      return basic('Content too short for meaningful summary', 'short-input');
    }

    const prompt = buildSummaryPrompt(content, maxLength, params.projectName);
    return this.complete('summary', prompt, TOKEN_BUDGETS.summary, () => basicSummary(content, maxLength));
  }

  async analyzeDocument(content: string, context: DocumentContext): Promise<DocAnalysis> {
    if (!content || content.trim().length < MIN_ANALYSIS_CONTENT) {
      return basic('Content too short for analysis', 'short-input');
    }

    const prompt = buildDocumentPrompt(content, context);
    return this.complete(`analysis of ${context.fileName}`, prompt, TOKEN_BUDGETS.document, () =>
      basicDocumentAnalysis(content, context.fileName)
    );
  }

  async analyzeProject(
    projectName: string,
    fileSummaries: readonly string[],
    stats: ProjectStatsInput
  ): Promise<ProjectAnalysis> {
    if (stats.fileCount === 0) {
      return basic(basicProjectAnalysis(projectName, stats), 'short-input');
    }

    const prompt = buildProjectPrompt(projectName, fileSummaries, stats);
    return this.complete(`project ${projectName}`, prompt, TOKEN_BUDGETS.project, () =>
      basicProjectAnalysis(projectName, stats)
    );
  }

  async analyzeCrossProject(projects: readonly CrossProjectInput[]): Promise<CrossProjectAnalysis> {
    if (projects.length === 0) {
      return basic(basicCrossProjectAnalysis(projects), 'short-input');
    }

    const prompt = buildCrossProjectPrompt(projects);
    return this.complete('cross-project analysis', prompt, TOKEN_BUDGETS.crossProject, () =>
      basicCrossProjectAnalysis(projects)
    );
  }

  private isUsable(id: ProviderId): boolean {
    const config = this.configs.get(id);
    return !!config && config.enabled && resolveCredential(config, this.env) !== null;
  }

  private async complete(
    label: string,
    prompt: string,
    budget: number,
    fallback: () => string
  ): Promise<Enrichment> {
    const result = await runFallbackChain(this.chain, (provider) => this.attempt(provider, prompt, budget), {
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
      sleep: this.sleep,
      onAttempt: (record) => this.logAttempt(label, record),
    });

    if (result.value !== null && result.provider !== null) {
      return { source: 'provider', provider: result.provider, text: result.value };
    }

    if (this.chain.length > 0) {
      await this.logger?.warn('ai', `All providers failed for ${label}; using basic analysis`, {
        attempts: result.attempts.length,
      });
    }
    return basic(fallback(), 'exhausted');
  }

  private async attempt(provider: ProviderId, prompt: string, budget: number): Promise<AttemptOutcome<string>> {
    const config = this.configs.get(provider);
    if (!config) {
      return { status: 'skipped', reason: 'not configured' };
    }
    if (!config.enabled) {
      return { status: 'skipped', reason: 'disabled' };
    }
    const apiKey = resolveCredential(config, this.env);
    if (apiKey === null) {
      return { status: 'skipped', reason: `${config.credentialRef} is not set` };
    }

    const request: CompletionRequest = {
      prompt,
      maxTokens: Math.min(config.maxTokens, budget),
      temperature: config.temperature,
      topP: config.topP,
      repetitionPenalty: config.repetitionPenalty,
    };

    try {
      const client = this.getClient(config, apiKey);
      const text = await client.complete(request, AbortSignal.timeout(config.timeoutMs));
      return { status: 'success', value: text };
    } catch (error) {
      const providerError = toProviderError(provider, error);
      return providerError.kind === 'transient'
        ? { status: 'transient-failure', error: providerError.message }
        : { status: 'permanent-failure', error: providerError.message };
    }
  }

  private getClient(config: ProviderConfig, apiKey: string): ProviderClient {
    let client = this.clients.get(config.id);
    if (!client) {
      client = this.clientFactory(config, apiKey);
      this.clients.set(config.id, client);
    }
    return client;
  }

  private logAttempt(label: string, record: AttemptRecord): void {
    const data = { provider: record.provider, attempt: record.attempt, detail: record.detail };
    const message = `${label}: ${record.provider} ${record.status}`;
    const write =
      record.status === 'transient-failure' || record.status === 'permanent-failure'
        ? this.logger?.warn('ai', message, data)
        : this.logger?.debug('ai', message, data);
    write?.catch((error: unknown) => console.error('Failed to record provider attempt:', error));
  }
}

function basic(text: string, reason: BasicReason): Enrichment {
  return { source: 'basic', reason, text };
}

/**
 * Build a gateway from loaded configuration
 */
export function createGateway(
  config: Config,
  options: Omit<GatewayOptions, 'providers' | 'chain' | 'defaultProvider' | 'retries' | 'retryDelayMs'> = {}
): AIProviderGateway {
  return new AIProviderGateway({
    ...options,
    providers: resolveProviderConfigs(config),
    chain: resolveFallbackChain(config),
    defaultProvider: config.ai_providers.default,
    retries: config.analysis.retries,
    retryDelayMs: config.analysis.retry_delay_ms,
  });
}
