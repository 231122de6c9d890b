/**
 * Analysis result type definitions
 */

import type { FileRecord, GroupStats } from './scan.js';
import type { Enrichment, ProviderId } from './providers.js';

/**
 * Report emphasis: insights and summaries, or metrics and statistics
 */
export const ANALYSIS_MODES = ['qualitative', 'quantitative'] as const;

export type AnalysisMode = (typeof ANALYSIS_MODES)[number];

export function isAnalysisMode(value: string): value is AnalysisMode {
  return (ANALYSIS_MODES as readonly string[]).includes(value);
}

interface FileResultBase {
  file: FileRecord;
}

export interface FileSuccess extends FileResultBase {
  status: 'success';
  wordCount: number;
  /** First 500 characters of the extracted text */
  preview: string;
  metadata: Record<string, unknown>;
  summary?: Enrichment;
  analysis?: Enrichment;
}

export interface FileFailure extends FileResultBase {
  status: 'failed';
  error: string;
}

export type FileResult = FileSuccess | FileFailure;

/**
 * Per-project rollup, updated as files complete
 */
export interface ProjectRollup {
  name: string;
  stats: GroupStats;
  succeeded: number;
  failed: number;
  wordCount: number;
  /** Files whose summary or analysis fell back to basic analysis after every provider failed */
  aiDegraded: number;
  analysis?: Enrichment;
}

export interface LargestFile {
  relativePath: string;
  size: number;
}

/**
 * Cross-project rollup, computed after every project rollup is final
 */
export interface CrossProjectRollup {
  projectCount: number;
  totalFiles: number;
  totalSize: number;
  totalWords: number;
  succeeded: number;
  failed: number;
  aiDegraded: number;
  formats: Record<string, number>;
  largestFiles: LargestFile[];
  analysis?: Enrichment;
}

export interface AIStatus {
  requested: boolean;
  /** Providers usable at run start, in chain order */
  usableProviders: ProviderId[];
  activeProvider: ProviderId | null;
}

export interface AnalysisResult {
  root: string;
  rootName: string;
  detectionLevel: number;
  /** One entry per scanned file, in scan order */
  files: FileResult[];
  projects: ProjectRollup[];
  unassigned: ProjectRollup;
  crossProject: CrossProjectRollup;
  ai: AIStatus;
  cancelled: boolean;
  startedAt: Date;
  durationMs: number;
}
