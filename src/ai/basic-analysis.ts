/**
 * Deterministic analysis used when no provider produced a result
 */

import type { CrossProjectInput, ProjectStatsInput } from '../types/providers.js';

export const DEFAULT_SUMMARY_LENGTH = 200;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * First sentence, truncated to maxLength characters
 */
export function basicSummary(content: string, maxLength: number = DEFAULT_SUMMARY_LENGTH): string {
  const firstSentence = content.replace(/\n/g, ' ').split('. ')[0];
  if (firstSentence.length > maxLength) {
    return firstSentence.slice(0, Math.max(0, maxLength - 3)) + '...';
  }
  return firstSentence;
}

export function hasTables(content: string): boolean {
  return content.toLowerCase().includes('table') || content.includes('|');
}

export function hasHeadings(content: string): boolean {
  return ['#', 'Chapter', 'Section'].some((marker) => content.includes(marker));
}

export function hasLists(content: string): boolean {
  return /^\s*(?:[-*+]|\d+[.)])\s+\S/m.test(content);
}

function fileType(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toUpperCase() : 'UNKNOWN';
}

export function basicDocumentAnalysis(content: string, fileName: string): string {
  const lines = [
    'Document Analysis (Basic):',
    `- File type: ${fileType(fileName)}`,
    `- Content length: ${content.length} characters, ${countWords(content)} words`,
  ];
  if (hasTables(content)) lines.push('- Contains structured data (tables)');
  if (hasHeadings(content)) lines.push('- Contains headings/sections');
  if (hasLists(content)) lines.push('- Contains lists');
  return `${lines.join('\n')}\n\nNote: Full AI analysis requires API configuration`;
}

export function basicProjectAnalysis(projectName: string, stats: ProjectStatsInput): string {
  if (stats.fileCount === 0) {
    return `No files found for project '${projectName}'`;
  }
  const types = Object.keys(stats.formats).join(', ');
  return (
    `Project '${projectName}' contains ${stats.fileCount} files (${types}) ` +
    `across ${stats.subfolders.length} sections. Requires AI for detailed analysis.`
  );
}

export function basicCrossProjectAnalysis(projects: readonly CrossProjectInput[]): string {
  if (projects.length === 0) {
    return 'No projects found for cross-analysis';
  }
  const totalFiles = projects.reduce((sum, p) => sum + p.stats.fileCount, 0);
  return (
    `Cross-project analysis of ${projects.length} projects with ${totalFiles} total files. ` +
    'Requires AI for detailed insights.'
  );
}
