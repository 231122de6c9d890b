/**
 * CLI type definitions
 */

/**
 * Options accepted by the analyze (default) command
 */
export interface AnalyzeCommandOptions {
  ai?: boolean;
  verbose?: boolean;
  listOnly?: boolean;
  /** False with --no-summary: skip the end-of-run summary */
  summary?: boolean;
  /** False with --no-file-summaries: skip per-file AI summaries */
  fileSummaries?: boolean;
  analysisMode?: string;
  provider?: string;
  level?: string;
  config?: string;
  concurrency?: string;
}

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
