/**
 * Analysis orchestrator
 * Drives extraction for every scanned file, requests AI enrichment and builds the rollups
 */

import type { AIProviderGateway } from '../ai/gateway.js';
import {
  DEFAULT_SUMMARY_LENGTH,
  basicCrossProjectAnalysis,
  basicProjectAnalysis,
  countWords,
} from '../ai/basic-analysis.js';
import type { RunContext } from '../context.js';
import { errorMessage } from '../errors.js';
import type { Extraction, ExtractorRegistry } from '../extractors/index.js';
import { computeGroupStats } from '../scanner/index.js';
import type { AnalysisResult, FileFailure, FileResult, FileSuccess, ProjectRollup } from '../types/analysis.js';
import type { FileRecord, ProjectGroup, ScanResult } from '../types/scan.js';
import {
  UNASSIGNED_NAME,
  buildCrossProjectRollup,
  createRollup,
  recordFile,
  toCrossProjectInput,
  toStatsInput,
} from './rollups.js';

export const PREVIEW_LENGTH = 500;
export const CANCELLED_MESSAGE = 'Analysis cancelled before processing';

/**
 * Gateway operations the orchestrator depends on
 */
export type EnrichmentGateway = Pick<
  AIProviderGateway,
  'summarize' | 'analyzeDocument' | 'analyzeProject' | 'analyzeCrossProject' | 'getUsableProviders' | 'getActiveProvider'
>;

export interface AnalyzeOptions {
  useAI?: boolean;
  /** Request per-file summaries when AI is on (default true) */
  summaries?: boolean;
  summaryLength?: number;
  /** Files processed at once (default 1) */
  concurrency?: number;
  /** Stops new files from starting; defaults to the context's signal */
  signal?: AbortSignal;
  onFileStart?: (file: FileRecord, index: number, total: number) => void;
  onFileComplete?: (result: FileResult, index: number, total: number) => void;
}

function failure(file: FileRecord, error: string): FileFailure {
  return { status: 'failed', file, error };
}

/**
 * Analyze every file of a scan
 * Never throws for document content or AI unavailability
 */
export async function analyze(
  scanResult: ScanResult,
  registry: ExtractorRegistry,
  gateway: EnrichmentGateway | null | undefined,
  options: AnalyzeOptions = {},
  ctx?: RunContext
): Promise<AnalysisResult> {
  const startedAt = new Date();
  const logger = ctx?.logger;
  const signal = options.signal ?? ctx?.signal;
  const ai = options.useAI && gateway ? gateway : null;
  const wantSummaries = options.summaries ?? true;
  const summaryLength = options.summaryLength ?? DEFAULT_SUMMARY_LENGTH;
  const total = scanResult.files.length;
  const concurrency = Math.max(1, options.concurrency ?? 1);

  await logger?.stageStart('extract', `Analyzing ${total} files`, {
    ai: ai !== null,
    concurrency,
  });

  const projectRollups = new Map<string, ProjectRollup>(
    scanResult.groups.map((g) => [g.name, createRollup(g.name, g.stats)])
  );
  const unassignedRollup = createRollup(UNASSIGNED_NAME, computeGroupStats(scanResult.unassigned));
  const results = new Map<string, FileResult>();

  const processFile = async (file: FileRecord, index: number): Promise<FileResult> => {
    if (signal?.aborted) {
      return failure(file, CANCELLED_MESSAGE);
    }

    options.onFileStart?.(file, index, total);
    await logger?.debug('extract', `Extracting ${file.relativePath}`);

    let extraction: Extraction;
    try {
      extraction = await registry.extract(file.path);
    } catch (error) {
      await logger?.warn('extract', errorMessage(error), { path: file.path });
      return failure(file, errorMessage(error));
    }

    const { text, metadata } = extraction;
    const success: FileSuccess = {
      status: 'success',
      file,
      wordCount: countWords(text),
      preview: text.slice(0, PREVIEW_LENGTH),
      metadata,
    };

    if (ai && text.trim()) {
      const [summary, analysis] = await Promise.all([
        wantSummaries ? ai.summarize(text, { maxLength: summaryLength, projectName: file.project }) : undefined,
        ai.analyzeDocument(text, {
          fileName: file.name,
          format: file.format,
          projectName: file.project,
          subfolder: file.subfolder,
        }),
      ]);
      if (summary) success.summary = summary;
      success.analysis = analysis;
    }

    return success;
  };

  const runFile = async (file: FileRecord, index: number): Promise<void> => {
    const result = await processFile(file, index);
    results.set(file.path, result);
    const rollup = file.project === null ? unassignedRollup : projectRollups.get(file.project);
    if (rollup) recordFile(rollup, result, ai !== null);
    options.onFileComplete?.(result, index, total);
  };

  const analyzedProjects = new Set<string>();
  const analyzeProject = async (group: ProjectGroup): Promise<void> => {
    const rollup = projectRollups.get(group.name);
    analyzedProjects.add(group.name);
    if (!rollup) return;

    const stats = toStatsInput(group.stats);
    if (ai && !signal?.aborted) {
      const summaries = group.files.flatMap((f) => {
        const r = results.get(f.path);
        return r?.status === 'success' && r.summary?.source === 'provider' ? [`${r.file.name}: ${r.summary.text}`] : [];
      });
      rollup.analysis = await ai.analyzeProject(group.name, summaries, stats);
    } else {
      rollup.analysis = { source: 'basic', text: basicProjectAnalysis(group.name, stats) };
    }
  };

  // A project is analyzed as soon as the batch holding its last file finishes
  const analyzeCompletedProjects = async (): Promise<void> => {
    for (const group of scanResult.groups) {
      if (!analyzedProjects.has(group.name) && group.files.every((f) => results.has(f.path))) {
        await logger?.info('aggregate', `Project ${group.name} complete`, { files: group.files.length });
        await analyzeProject(group);
      }
    }
  };

  // Files run in fixed-size batches; results are keyed by path so order never depends on timing
  for (let i = 0; i < total; i += concurrency) {
    const batch = scanResult.files.slice(i, i + concurrency);
    await Promise.all(batch.map((file, offset) => runFile(file, i + offset)));
    await analyzeCompletedProjects();
  }
  await analyzeCompletedProjects();

  const files = scanResult.files.map((file) => results.get(file.path) ?? failure(file, CANCELLED_MESSAGE));
  const projects = scanResult.groups.flatMap((g) => {
    const rollup = projectRollups.get(g.name);
    return rollup ? [rollup] : [];
  });

  const crossProject = buildCrossProjectRollup(projects, unassignedRollup, files);
  const crossInput = toCrossProjectInput(projects);
  crossProject.analysis =
    ai && !signal?.aborted
      ? await ai.analyzeCrossProject(crossInput)
      : { source: 'basic', text: basicCrossProjectAnalysis(crossInput) };

  const cancelled = signal?.aborted ?? false;
  const usableProviders = gateway && options.useAI ? gateway.getUsableProviders() : [];

  await logger?.stageComplete('extract', 'File analysis', startedAt.getTime(), {
    succeeded: crossProject.succeeded,
    failed: crossProject.failed,
    aiDegraded: crossProject.aiDegraded,
    cancelled,
  });

  return {
    root: scanResult.root,
    rootName: scanResult.rootName,
    detectionLevel: scanResult.detectionLevel,
    files,
    projects,
    unassigned: unassignedRollup,
    crossProject,
    ai: {
      requested: options.useAI ?? false,
      usableProviders,
      activeProvider: usableProviders[0] ?? null,
    },
    cancelled,
    startedAt,
    durationMs: Date.now() - startedAt.getTime(),
  };
}
