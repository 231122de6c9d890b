/**
 * Providers command
 * Lists configured AI providers, whether they are usable, and the active one
 */

import { Command } from 'commander';
import { createGateway } from '../../ai/gateway.js';
import { loadConfig } from '../../config/index.js';
import { errorMessage } from '../../errors.js';
import { EXIT_CODES, type ExitCode } from '../../types/cli.js';
import { printError, printHeader, printInfo, printProviderStatuses } from '../output.js';

export async function runProviders(
  options: { config?: string; json?: boolean },
  env: NodeJS.ProcessEnv = process.env
): Promise<ExitCode> {
  try {
    const { config, filepath } = await loadConfig({ configPath: options.config, env });
    const gateway = createGateway(config, { env });
    const statuses = gateway.getProviderStatuses();
    const active = gateway.getActiveProvider();

    if (options.json) {
      console.log(JSON.stringify({ chain: gateway.getChain(), active, providers: statuses }, null, 2));
      return EXIT_CODES.SUCCESS;
    }

    printHeader('AI Providers');
    printInfo(filepath ? `Config file: ${filepath}` : 'Using default configuration');
    printInfo(`Fallback chain: ${gateway.getChain().join(' -> ') || '(empty)'}`);
    printProviderStatuses(statuses, active);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    printError(errorMessage(error));
    return EXIT_CODES.ERROR;
  }
}

/**
 * Create the providers command
 */
export function createProvidersCommand(): Command {
  return new Command('providers')
    .description('List configured AI providers and which one is active')
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Output as JSON')
    .action(async (options: { config?: string; json?: boolean }) => {
      process.exitCode = await runProviders(options);
    });
}
