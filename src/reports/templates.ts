/**
 * Markdown renderers for the four report variants
 */

import type { Session } from '../context.js';
import type { AnalysisMode, AnalysisResult, FileResult, FileSuccess, ProjectRollup } from '../types/analysis.js';
import type { Enrichment } from '../types/providers.js';
import { formatGeneratedAt } from './session.js';

export const AI_UNAVAILABLE_NOTICE = 'AI unavailable: no provider was usable for this run, so the analysis below is basic.';

/**
 * Human-readable file size
 */
export function formatSize(bytes: number): string {
  if (bytes === 0) return '0 B';
  let size = bytes;
  for (const unit of ['B', 'KB', 'MB', 'GB']) {
    if (size < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} TB`;
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/**
 * Enrichment text, labelled when it came from basic analysis
 */
export function formatEnrichment(enrichment: Enrichment): string {
  if (enrichment.source === 'basic') {
    return `${enrichment.text} (basic analysis)`;
  }
  return enrichment.provider ? `${enrichment.text}\n\n_Generated by ${enrichment.provider}_` : enrichment.text;
}

function extensions(formats: Record<string, number>): string {
  const keys = Object.keys(formats);
  return keys.length > 0 ? keys.join(', ') : 'none';
}

function sections(subfolders: readonly string[]): string {
  return subfolders.length > 0 ? subfolders.join(', ') : 'root';
}

function header(
  title: string,
  result: AnalysisResult,
  session: Session,
  subtitle?: string,
  details: readonly string[] = []
): string[] {
  const facts = [
    `**Generated:** ${formatGeneratedAt(session.createdAt)}`,
    `**Directory:** \`${result.root}\``,
    `**Detection Level:** ${result.detectionLevel}`,
    ...details,
  ];
  return [
    `# ${title}`,
    ...(subtitle ? [`## ${subtitle}`] : []),
    '',
    // Markdown hard breaks between the fact lines
    ...facts.map((line, index) => (index < facts.length - 1 ? `${line}  ` : line)),
    '',
    '---',
    '',
  ];
}

export function formatAnalysisMode(mode: AnalysisMode): string {
  return mode[0].toUpperCase() + mode.slice(1);
}

function fileDetails(file: FileSuccess, heading: string): string[] {
  const lines = [
    `${heading} ${file.file.name}`,
    `**Location:** \`${file.file.relativePath}\`  `,
    `**Type:** ${file.file.extension.slice(1).toUpperCase()}  `,
    `**Size:** ${formatSize(file.file.size)}  `,
    `**Words:** ${formatCount(file.wordCount)}`,
    '',
  ];
  if (file.summary) {
    lines.push(`**Summary:** ${formatEnrichment(file.summary)}`, '');
  }
  if (file.analysis) {
    lines.push(`**Analysis:** ${formatEnrichment(file.analysis)}`, '');
  }
  lines.push('---', '');
  return lines;
}

function failureLines(results: readonly FileResult[]): string[] {
  const lines: string[] = [];
  for (const result of results) {
    if (result.status === 'failed') {
      lines.push(`- **${result.file.relativePath}:** ${result.error}`);
    }
  }
  return lines;
}

function filesOf(result: AnalysisResult, project: string | null): FileResult[] {
  return result.files.filter((r) => r.file.project === project);
}

function unassignedSection(result: AnalysisResult): string[] {
  const files = filesOf(result, null);
  if (files.length === 0) return [];
  const lines = ['## Unassigned Files', '', `${files.length} files sit above the project level.`, ''];
  for (const file of files) {
    const status = file.status === 'success' ? `${formatCount(file.wordCount)} words` : `failed: ${file.error}`;
    lines.push(`- \`${file.file.relativePath}\` (${formatSize(file.file.size)}, ${status})`);
  }
  lines.push('');
  return lines;
}

function runNotes(result: AnalysisResult): string[] {
  const lines: string[] = [];
  if (result.cancelled) {
    lines.push('> Analysis was cancelled; files that never started are listed as failed.', '');
  }
  return lines;
}

export function renderComprehensive(
  result: AnalysisResult,
  session: Session,
  mode: AnalysisMode = 'qualitative'
): string {
  const cross = result.crossProject;
  const lines = header('Comprehensive Document Analysis Report', result, session, result.rootName, [
    `**Analysis Mode:** ${formatAnalysisMode(mode)}`,
  ]);

  lines.push(
    '## Executive Summary',
    '',
    `This analysis covers **${result.projects.length} projects** containing **${cross.totalFiles} documents** ` +
      `with a total of **${formatCount(cross.totalWords)} words**.`,
    '',
    `- **Succeeded:** ${cross.succeeded}`,
    `- **Failed:** ${cross.failed}`,
    `- **AI-degraded:** ${cross.aiDegraded}`,
    '',
    ...runNotes(result),
    '### Projects Overview',
    ''
  );
  for (const project of result.projects) {
    lines.push(`- **${project.name}:** ${project.stats.fileCount} files, ${project.stats.subfolders.length} sections`);
  }
  lines.push('', '---', '');

  for (const project of result.projects) {
    lines.push(
      `## Project: ${project.name}`,
      '',
      `**Files:** ${project.stats.fileCount}  `,
      `**Sections:** ${sections(project.stats.subfolders)}  `,
      `**File Types:** ${extensions(project.stats.formats)}`,
      ''
    );
    if (project.analysis) {
      lines.push('### Project Analysis', '', formatEnrichment(project.analysis), '');
    }
    lines.push(`### Documents in ${project.name}`, '');
    for (const file of filesOf(result, project.name)) {
      if (file.status === 'success') {
        lines.push(...fileDetails(file, '####'));
      }
    }
  }

  lines.push(...unassignedSection(result));

  lines.push('## Technical Appendix', '');
  const failures = failureLines(result.files);
  if (failures.length > 0) {
    lines.push('### Processing Errors', '', ...failures, '');
  }
  lines.push('### Detailed Statistics', '');
  for (const rollup of [...result.projects, result.unassigned]) {
    if (rollup.stats.fileCount === 0) continue;
    lines.push(
      `#### ${rollup.name}`,
      `- Files: ${rollup.stats.fileCount}`,
      `- Total Size: ${formatSize(rollup.stats.totalSize)}`,
      `- Sections: ${sections(rollup.stats.subfolders)}`
    );
    for (const [extension, count] of Object.entries(rollup.stats.formats)) {
      lines.push(`  - ${extension.slice(1).toUpperCase()}: ${count}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

export function renderOverview(result: AnalysisResult, session: Session): string {
  const cross = result.crossProject;
  const lines = header('Portfolio Overview Report', result, session, result.rootName);

  lines.push(
    '## Portfolio Summary',
    '',
    '### Quick Stats',
    `- **Projects:** ${result.projects.length}`,
    `- **Total Documents:** ${cross.totalFiles}`,
    `- **Total Words:** ${formatCount(cross.totalWords)}`,
    `- **Total Size:** ${formatSize(cross.totalSize)}`,
    `- **File Types:** ${Object.keys(cross.formats).length}`,
    `- **Unassigned Files:** ${result.unassigned.stats.fileCount}`,
    '',
    ...runNotes(result),
    '### Project Breakdown',
    ''
  );

  for (const project of result.projects) {
    lines.push(
      `#### ${project.name}`,
      `- **Documents:** ${project.stats.fileCount}`,
      `- **Sections:** ${project.stats.subfolders.length}`,
      `- **Word Count:** ${formatCount(project.wordCount)}`,
      `- **File Types:** ${extensions(project.stats.formats)}`,
      ''
    );
  }

  lines.push(...unassignedSection(result));

  lines.push('---', '', '## Cross-Project Analysis', '');
  if (cross.analysis) {
    lines.push(formatEnrichment(cross.analysis), '');
  }

  return lines.join('\n');
}

export function renderProject(result: AnalysisResult, project: ProjectRollup, session: Session): string {
  const files = filesOf(result, project.name);
  const lines = header(`Project Report: ${project.name}`, result, session);

  lines.push(
    '## Project Overview',
    '',
    `**Files:** ${project.stats.fileCount}  `,
    `**Sections:** ${sections(project.stats.subfolders)}  `,
    `**File Types:** ${extensions(project.stats.formats)}  `,
    `**Total Size:** ${formatSize(project.stats.totalSize)}  `,
    `**Total Words:** ${formatCount(project.wordCount)}`,
    '',
    '## Project Analysis',
    '',
    project.analysis ? formatEnrichment(project.analysis) : 'No project analysis available.',
    '',
    '## Document Details',
    ''
  );

  const bySubfolder = new Map<string, FileResult[]>();
  for (const file of files) {
    const key = file.file.subfolder || 'root';
    bySubfolder.set(key, [...(bySubfolder.get(key) ?? []), file]);
  }
  for (const [subfolder, sectionFiles] of bySubfolder) {
    lines.push(`### ${subfolder} section`, '');
    for (const file of sectionFiles) {
      if (file.status === 'success') {
        lines.push(...fileDetails(file, '####'));
      } else {
        lines.push(`#### ${file.file.name} (failed)`, `**Error:** ${file.error}`, '', '---', '');
      }
    }
  }

  return lines.join('\n');
}

export function renderCrossProject(result: AnalysisResult, session: Session): string {
  const cross = result.crossProject;
  const lines = header('Cross-Project Analysis Report', result, session, result.rootName);

  lines.push(
    '## Portfolio Analysis',
    '',
    `This report compares all ${result.projects.length} projects in the portfolio.`,
    ''
  );
  if (result.ai.usableProviders.length === 0) {
    lines.push(`> ${AI_UNAVAILABLE_NOTICE}`, '');
  }
  if (cross.analysis) {
    lines.push(formatEnrichment(cross.analysis), '');
  }

  lines.push('## Comparative Analysis', '', '### Project Size Comparison', '');
  const bySize = [...result.projects].sort((a, b) => b.stats.fileCount - a.stats.fileCount);
  for (const project of bySize) {
    lines.push(
      `- **${project.name}:** ${project.stats.fileCount} files, ${formatSize(project.stats.totalSize)}, ` +
        `${formatCount(project.wordCount)} words`
    );
  }

  lines.push('', '### File Type Distribution', '');
  const formats = Object.entries(cross.formats).sort((a, b) => b[1] - a[1]);
  for (const [extension, count] of formats) {
    lines.push(`- **${extension.slice(1).toUpperCase()}:** ${count} files`);
  }

  if (cross.largestFiles.length > 0) {
    lines.push('', '### Largest Files', '');
    for (const file of cross.largestFiles) {
      lines.push(`- \`${file.relativePath}\` (${formatSize(file.size)})`);
    }
  }
  lines.push('');

  return lines.join('\n');
}
