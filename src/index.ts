#!/usr/bin/env node
/**
 * docsurvey CLI
 * Project-aware document analysis with optional AI enrichment
 */

import 'dotenv/config';
import { runCLI } from './cli/index.js';
import { EXIT_CODES } from './types/cli.js';

const controller = new AbortController();

process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    process.exit(EXIT_CODES.INTERRUPTED);
  }
  console.error('\nInterrupted: finishing the current file, press Ctrl+C again to exit now');
  controller.abort();
});

// Run the CLI
runCLI(process.argv, { signal: controller.signal }).catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
