/**
 * CLI commands index
 */

export { runAnalyze, resolveRunConfig, type AnalyzeDependencies } from './analyze.js';
export { createProvidersCommand, runProviders } from './providers.js';
