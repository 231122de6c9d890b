/**
 * Report generator
 * Writes the comprehensive, overview, per-project and cross-project reports into a session folder
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { RunContext, Session } from '../context.js';
import { ReportWriteError, errorMessage } from '../errors.js';
import type { AnalysisMode, AnalysisResult } from '../types/analysis.js';
import { SegmentAllocator, createSessionDirectory, formatSessionStamp, safeSegment } from './session.js';
import { renderComprehensive, renderCrossProject, renderOverview, renderProject } from './templates.js';

export type ReportType = 'COMPREHENSIVE' | 'OVERVIEW' | `PROJECT_${string}` | 'CROSS_PROJECT';

export interface WrittenReport {
  type: ReportType;
  path: string;
}

export interface FailedReport {
  type: ReportType;
  path: string;
  error: ReportWriteError;
}

export interface GeneratedReports {
  directory: string;
  written: WrittenReport[];
  failed: FailedReport[];
}

export interface ReportGeneratorOptions {
  reportsDir: string;
  /** Shown in the comprehensive report header (default qualitative) */
  analysisMode?: AnalysisMode;
  writeFile?: (filePath: string, content: string) => Promise<void>;
}

interface PendingReport {
  type: ReportType;
  render: () => string;
}

export function reportFileName(session: Session, type: ReportType): string {
  return `${safeSegment(session.rootName)}_${type}_${formatSessionStamp(session.createdAt)}.md`;
}

export class ReportGenerator {
  private readonly reportsDir: string;
  private readonly analysisMode: AnalysisMode;
  private readonly writeFile: (filePath: string, content: string) => Promise<void>;

  constructor(options: ReportGeneratorOptions) {
    this.reportsDir = path.resolve(options.reportsDir);
    this.analysisMode = options.analysisMode ?? 'qualitative';
    this.writeFile = options.writeFile ?? ((filePath, content) => fs.writeFile(filePath, content, 'utf-8'));
  }

  /**
   * Render and write every report
   * A failed write is recorded and the remaining reports are still written
   *
   * @throws ReportWriteError when the session folder cannot be created
   */
  async generate(result: AnalysisResult, ctx: RunContext): Promise<GeneratedReports> {
    const { session, logger } = ctx;
    const startedAt = Date.now();

    let directory: string;
    try {
      directory = await createSessionDirectory(this.reportsDir, session);
    } catch (error) {
      throw new ReportWriteError(this.reportsDir, `Cannot create session folder: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    await logger.stageStart('report', `Writing reports to ${directory}`);

    const projectSegments = new SegmentAllocator();
    const reports: PendingReport[] = [
      { type: 'COMPREHENSIVE', render: () => renderComprehensive(result, session, this.analysisMode) },
      { type: 'OVERVIEW', render: () => renderOverview(result, session) },
      ...result.projects.map(
        (project): PendingReport => ({
          type: `PROJECT_${projectSegments.allocate(project.name)}`,
          render: () => renderProject(result, project, session),
        })
      ),
      { type: 'CROSS_PROJECT', render: () => renderCrossProject(result, session) },
    ];

    const generated: GeneratedReports = { directory, written: [], failed: [] };
    for (const report of reports) {
      const filePath = path.join(directory, reportFileName(session, report.type));
      try {
        await this.writeFile(filePath, report.render());
        generated.written.push({ type: report.type, path: filePath });
        await logger.debug('report', `Wrote ${report.type}`, { path: filePath });
      } catch (error) {
        const failure = new ReportWriteError(filePath, `Failed to write ${report.type} report: ${errorMessage(error)}`, {
          cause: error,
        });
        generated.failed.push({ type: report.type, path: filePath, error: failure });
        await logger.error('report', failure.message, { path: filePath });
      }
    }

    await logger.stageComplete('report', 'Reports', startedAt, {
      written: generated.written.length,
      failed: generated.failed.length,
    });
    return generated;
  }
}

export function createReportGenerator(options: ReportGeneratorOptions): ReportGenerator {
  return new ReportGenerator(options);
}
