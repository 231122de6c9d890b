/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import { z } from 'zod';
import { PROVIDER_IDS } from '../types/providers.js';
import type { AnalyzeCommandOptions } from '../types/cli.js';
import { createProvidersCommand, runAnalyze, type AnalyzeDependencies } from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson = z.object({ version: z.string() }).parse(require('../../package.json'));
export const VERSION: string = packageJson.version;

/**
 * Create the main CLI program
 */
export function createProgram(deps: AnalyzeDependencies = {}): Command {
  const program = new Command();

  program
    .name('docsurvey')
    .description('Project-aware document analysis with optional AI enrichment')
    .version(VERSION)
    .argument('<directory>', 'Directory to analyze')
    .option('--ai', 'Enrich results with AI summaries and analyses')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--list-only', 'List supported files without analyzing them')
    .option('--no-summary', 'Skip showing the summary at the end')
    .option('--no-file-summaries', 'Skip per-file AI summaries')
    .option(
      '--analysis-mode <mode>',
      'Analysis approach: qualitative (insights/summaries) or quantitative (metrics/stats)',
      'qualitative'
    )
    .option('--provider <id>', `Default AI provider (${PROVIDER_IDS.join(', ')})`)
    .option('--level <n>', 'Directory level that names a project (root is 1)')
    .option('-c, --config <path>', 'Configuration file')
    .option('--concurrency <n>', 'Files analyzed at once')
    .action(async (directory: string, options: AnalyzeCommandOptions) => {
      process.exitCode = await runAnalyze(directory, options, deps);
    });

  program.addCommand(createProvidersCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv, deps: AnalyzeDependencies = {}): Promise<void> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
