/**
 * Per-project and cross-project aggregation
 */

import { compareCodeUnits } from '../scanner/index.js';
import type { FileResult, LargestFile, ProjectRollup, CrossProjectRollup } from '../types/analysis.js';
import type { CrossProjectInput, Enrichment, ProjectStatsInput } from '../types/providers.js';
import type { GroupStats } from '../types/scan.js';

export const UNASSIGNED_NAME = '(unassigned)';
export const LARGEST_FILES_COUNT = 5;

export function createRollup(name: string, stats: GroupStats): ProjectRollup {
  return {
    name,
    stats,
    succeeded: 0,
    failed: 0,
    wordCount: 0,
    aiDegraded: 0,
  };
}

/**
 * Fold one file result into its rollup
 */
export function recordFile(rollup: ProjectRollup, result: FileResult, aiRequested: boolean): void {
  if (result.status === 'failed') {
    rollup.failed++;
    return;
  }

  rollup.succeeded++;
  rollup.wordCount += result.wordCount;
  if (aiRequested && (isExhausted(result.summary) || isExhausted(result.analysis))) {
    rollup.aiDegraded++;
  }
}

/**
 * True when the provider chain ran out; short-input shortcuts do not count
 */
function isExhausted(enrichment: Enrichment | undefined): boolean {
  return enrichment?.source === 'basic' && enrichment.reason === 'exhausted';
}

export function toStatsInput(stats: GroupStats): ProjectStatsInput {
  return {
    fileCount: stats.fileCount,
    formats: stats.formats,
    subfolders: stats.subfolders,
    totalSize: stats.totalSize,
  };
}

export function toCrossProjectInput(rollups: readonly ProjectRollup[]): CrossProjectInput[] {
  return rollups.map((r) => ({ name: r.name, stats: toStatsInput(r.stats) }));
}

export function largestFiles(results: readonly FileResult[], count: number = LARGEST_FILES_COUNT): LargestFile[] {
  return results
    .map((r) => ({ relativePath: r.file.relativePath, size: r.file.size }))
    .sort((a, b) => b.size - a.size || compareCodeUnits(a.relativePath, b.relativePath))
    .slice(0, count);
}

/**
 * Cross-project totals over every project plus the unassigned files
 * Must run after all project rollups are final
 */
export function buildCrossProjectRollup(
  projects: readonly ProjectRollup[],
  unassigned: ProjectRollup,
  results: readonly FileResult[]
): CrossProjectRollup {
  const all = [...projects, unassigned];
  const formats: Record<string, number> = {};
  for (const rollup of all) {
    for (const [extension, count] of Object.entries(rollup.stats.formats)) {
      formats[extension] = (formats[extension] ?? 0) + count;
    }
  }

  return {
    projectCount: projects.length,
    totalFiles: all.reduce((sum, r) => sum + r.stats.fileCount, 0),
    totalSize: all.reduce((sum, r) => sum + r.stats.totalSize, 0),
    totalWords: all.reduce((sum, r) => sum + r.wordCount, 0),
    succeeded: all.reduce((sum, r) => sum + r.succeeded, 0),
    failed: all.reduce((sum, r) => sum + r.failed, 0),
    aiDegraded: all.reduce((sum, r) => sum + r.aiDegraded, 0),
    formats,
    largestFiles: largestFiles(results),
  };
}
