/**
 * Analyze command
 * Scans a directory, analyzes every supported document and writes the reports
 */

import path from 'node:path';
import { createGateway } from '../../ai/gateway.js';
import { applyOverrides, loadConfig, type Config } from '../../config/index.js';
import { createRunContext } from '../../context.js';
import { ConfigurationError, DocsurveyError, errorMessage } from '../../errors.js';
import { createExtractorRegistry } from '../../extractors/index.js';
import { RunLogger, type LogEntry } from '../../logging/run-logger.js';
import { analyze } from '../../pipeline/orchestrator.js';
import { createReportGenerator } from '../../reports/generator.js';
import { formatAnalysisMode } from '../../reports/templates.js';
import { scan, summarizeScan } from '../../scanner/index.js';
import { ANALYSIS_MODES, isAnalysisMode, type AnalysisMode } from '../../types/analysis.js';
import { EXIT_CODES, type AnalyzeCommandOptions, type ExitCode } from '../../types/cli.js';
import {
  failSpinner,
  printError,
  printFileListing,
  printInfo,
  printRunSummary,
  printScanSummary,
  printWarning,
  startSpinner,
  stopSpinner,
  succeedSpinner,
  theme,
  updateSpinner,
} from '../output.js';

export interface AnalyzeDependencies {
  /** Aborted on user interrupt */
  signal?: AbortSignal;
  /** Directory searched for a config file */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseAnalysisMode(value: string | undefined): AnalysisMode {
  if (value === undefined) return 'qualitative';
  if (!isAnalysisMode(value)) {
    throw new ConfigurationError(`--analysis-mode must be one of ${ANALYSIS_MODES.join(', ')}, got "${value}"`);
  }
  return value;
}

function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigurationError(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Load config and fold in the command-line overrides
 */
export async function resolveRunConfig(
  options: AnalyzeCommandOptions,
  deps: AnalyzeDependencies = {}
): Promise<{ config: Config; filepath: string | null }> {
  const { config, filepath } = await loadConfig({ configPath: options.config, cwd: deps.cwd, env: deps.env });
  return {
    config: applyOverrides(config, {
      provider: options.provider,
      level: parsePositiveInt('level', options.level),
      concurrency: parsePositiveInt('concurrency', options.concurrency),
      verbose: options.verbose,
    }),
    filepath,
  };
}

function echoEntry(entry: LogEntry): void {
  const line = `[${entry.stage}] ${entry.message}`;
  if (entry.level === 'error') {
    console.error(theme.error(line));
  } else if (entry.level === 'warn') {
    console.error(theme.warning(line));
  } else {
    console.error(theme.dim(line));
  }
}

/**
 * Run a full analysis
 * Returns the exit code instead of exiting so callers decide how to stop
 */
export async function runAnalyze(
  directory: string,
  options: AnalyzeCommandOptions,
  deps: AnalyzeDependencies = {}
): Promise<ExitCode> {
  let resolved: { config: Config; filepath: string | null };
  let analysisMode: AnalysisMode;
  try {
    analysisMode = parseAnalysisMode(options.analysisMode);
    resolved = await resolveRunConfig(options, deps);
  } catch (error) {
    printError(errorMessage(error));
    return EXIT_CODES.ERROR;
  }
  const { config, filepath: configFile } = resolved;

  const verbose = config.output.verbose;
  const logger = new RunLogger({
    logFile: config.output.log_file,
    verbose,
    onEntry: verbose ? echoEntry : undefined,
  });
  const ctx = createRunContext(directory, { logger, signal: deps.signal });

  try {
    await logger.info('config', configFile ? `Loaded configuration from ${configFile}` : 'Using default configuration', {
      detectionLevel: config.project_detection.level,
      ai: options.ai ?? false,
      analysisMode,
    });

    const registry = createExtractorRegistry();

    startSpinner(`Scanning ${path.resolve(directory)}...`);
    const scanResult = await scan(directory, registry.supportedExtensions(), config.project_detection.level, ctx);
    const scanSummary = summarizeScan(scanResult);
    succeedSpinner(`Found ${scanSummary.totalFiles} supported files in ${scanSummary.projectCount} projects`);
    printScanSummary(scanResult, scanSummary);

    if (options.listOnly) {
      printFileListing(scanResult);
      return EXIT_CODES.SUCCESS;
    }

    const gateway = options.ai ? createGateway(config, { logger, env: deps.env }) : null;
    if (gateway) {
      const active = gateway.getActiveProvider();
      if (active) {
        printInfo(`AI enrichment via ${active} (chain: ${gateway.getChain().join(' -> ')})`);
      } else {
        printWarning('AI requested but no provider is usable; using basic analysis');
        await logger.warn('ai', 'No usable AI provider', { chain: gateway.getChain() });
      }
    }

    printInfo(`Analysis mode: ${formatAnalysisMode(analysisMode)}`);
    startSpinner('Analyzing documents...');
    const result = await analyze(
      scanResult,
      registry,
      gateway,
      {
        useAI: options.ai ?? false,
        summaries: options.fileSummaries ?? true,
        concurrency: config.analysis.concurrency,
        onFileStart: (file, index, total) => updateSpinner(`[${index + 1}/${total}] ${file.relativePath}`),
      },
      ctx
    );
    if (result.cancelled) {
      failSpinner('Analysis interrupted');
    } else {
      succeedSpinner(`Analyzed ${result.files.length} files`);
    }

    const generator = createReportGenerator({ reportsDir: config.output.reports_dir, analysisMode });
    const reports = await generator.generate(result, ctx);

    if (options.summary !== false) {
      printRunSummary(result, reports);
    }
    await logger.success('run', 'Run finished', {
      succeeded: result.crossProject.succeeded,
      failed: result.crossProject.failed,
      reports: reports.written.length,
      cancelled: result.cancelled,
    });

    return result.cancelled ? EXIT_CODES.INTERRUPTED : EXIT_CODES.SUCCESS;
  } catch (error) {
    stopSpinner();
    printError(errorMessage(error));
    await logger.error('run', errorMessage(error), {
      code: error instanceof DocsurveyError ? error.code : undefined,
    });
    return EXIT_CODES.ERROR;
  } finally {
    await logger.flush();
  }
}
