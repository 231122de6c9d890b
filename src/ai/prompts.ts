/**
 * Prompt builders for the gateway operations
 */

import type { CrossProjectInput, DocumentContext, ProjectStatsInput } from '../types/providers.js';

export const MAX_PROMPT_CONTENT = 4000;
const MAX_FILE_SUMMARIES = 10;

export function truncateContent(content: string, max: number = MAX_PROMPT_CONTENT): string {
  return content.length > max ? content.slice(0, max) + '...' : content;
}

export function buildSummaryPrompt(content: string, maxLength: number, projectName?: string | null): string {
  const context = projectName ? `\nProject Context: This document belongs to the '${projectName}' project. ` : '';
  return `Please provide a concise summary of the following content in ${maxLength} characters or less:${context}

${truncateContent(content)}

Summary:`;
}

export function buildDocumentPrompt(content: string, context: DocumentContext): string {
  let projectInfo = '';
  if (context.projectName) {
    projectInfo = `\nProject Context: This document belongs to the '${context.projectName}' project`;
    if (context.subfolder) {
      projectInfo += ` in the '${context.subfolder}' section`;
    }
    projectInfo += '. ';
  }

  return `Analyze the following document content from file "${context.fileName}" (${context.format}) and provide insights about:
1. Document type and purpose
2. Key topics or themes
3. Structure and organization
4. Notable characteristics${projectInfo}

Content:
${truncateContent(content)}

Analysis:`;
}

export function buildProjectPrompt(
  projectName: string,
  fileSummaries: readonly string[],
  stats: ProjectStatsInput
): string {
  const types = Object.keys(stats.formats).join(', ');
  const structure = stats.subfolders.length > 0 ? stats.subfolders.join(', ') : 'root level only';
  const summaries =
    fileSummaries.length > 0
      ? `\n\nDocument summaries:\n${fileSummaries
          .slice(0, MAX_FILE_SUMMARIES)
          .map((s) => `- ${s}`)
          .join('\n')}`
      : '';

  return `Analyze the following project and provide insights:

Project: ${projectName}
Files: ${stats.fileCount} files (${types})
Structure: ${stats.subfolders.length} subfolders: ${structure}${summaries}

Based on the project structure and file types, provide:
1. Project purpose and scope assessment
2. Documentation quality and organization
3. Potential gaps or recommendations
4. Overall project characteristics

Analysis:`;
}

export function buildCrossProjectPrompt(projects: readonly CrossProjectInput[]): string {
  const lines = projects.map(
    (p) =>
      `- ${p.name}: ${p.stats.fileCount} files, ${p.stats.subfolders.length} sections, types: ${Object.keys(p.stats.formats).join(', ')}`
  );
  const totalFiles = projects.reduce((sum, p) => sum + p.stats.fileCount, 0);

  return `Perform cross-project analysis of the following projects:

Projects Overview:
${lines.join('\n')}

Total: ${projects.length} projects, ${totalFiles} files

Provide insights on:
1. Project similarities and differences
2. Documentation patterns across projects
3. Potential standardization opportunities
4. Cross-project relationships or dependencies
5. Overall portfolio assessment

Cross-Project Analysis:`;
}
