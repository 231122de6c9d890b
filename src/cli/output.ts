/**
 * CLI output utilities
 * Handles formatted output, spinners, and progress display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { AnalysisResult } from '../types/analysis.js';
import type { ProviderStatus } from '../types/providers.js';
import type { ScanResult, ScanSummary } from '../types/scan.js';
import type { GeneratedReports } from '../reports/generator.js';
import { formatSize } from '../reports/templates.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Update spinner message
 *
 * @param message - New message
 */
export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

/**
 * Stop spinner with success
 *
 * @param message - Success message
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 *
 * @param message - Failure message
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 *
 * @param title - Header title
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 *
 * @param title - Section title
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

/**
 * Print a success message
 *
 * @param message - Success message
 */
export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

/**
 * Print a warning message
 *
 * @param message - Warning message
 */
export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

/**
 * Print an error message
 *
 * @param message - Error message
 */
export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

/**
 * Print an info message
 *
 * @param message - Info message
 */
export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 *
 * @param key - Key
 * @param value - Value
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 *
 * @param item - List item
 * @param indent - Indentation level
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 *
 * @param headers - Table headers
 * @param rows - Table rows
 */
export function printTable(headers: string[], rows: string[][]): void {
  // Calculate column widths
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(...rows.map((r) => (r[i] || '').length));
    return Math.max(h.length, maxRow);
  });

  // Print header
  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  // Print rows
  for (const row of rows) {
    const rowLine = row.map((cell, i) => (cell || '').padEnd(widths[i])).join('  ');
    console.log(rowLine);
  }
}

/**
 * Print a blank line
 */
export function printBlank(): void {
  console.log();
}

/**
 * Print the scan totals and per-project file counts
 */
export function printScanSummary(scan: ScanResult, summary: ScanSummary): void {
  printSection('Scan');
  printKeyValue('Directory', scan.root);
  printKeyValue('Detection level', scan.detectionLevel);
  printKeyValue('Supported files', summary.totalFiles);
  printKeyValue('Total size', formatSize(summary.totalSize));
  printKeyValue('Projects', summary.projectCount);
  printKeyValue('Unassigned files', summary.unassignedCount);
  printKeyValue('Unsupported files', summary.unsupportedCount);

  const formats = Object.entries(summary.formats).sort((a, b) => b[1] - a[1]);
  if (formats.length > 0) {
    printSection('File types');
    for (const [extension, count] of formats) {
      printListItem(`${extension} ${theme.dim(`(${count})`)}`);
    }
  }

  if (scan.errors.length > 0 || scan.cycles.length > 0) {
    printSection('Skipped paths');
    for (const issue of scan.errors) {
      printWarning(`${issue.path}: ${issue.message}`);
    }
    for (const cycle of scan.cycles) {
      printWarning(`${cycle.path}: symbolic link cycle`);
    }
  }
}

/**
 * Print every file grouped by project (list-only mode)
 */
export function printFileListing(scan: ScanResult): void {
  for (const group of scan.groups) {
    printSection(`${group.name} (${group.stats.fileCount} files, ${formatSize(group.stats.totalSize)})`);
    for (const file of group.files) {
      printListItem(`${file.relativePath} ${theme.dim(formatSize(file.size))}`, 1);
    }
  }
  if (scan.unassigned.length > 0) {
    printSection(`Unassigned (${scan.unassigned.length} files)`);
    for (const file of scan.unassigned) {
      printListItem(`${file.relativePath} ${theme.dim(formatSize(file.size))}`, 1);
    }
  }
}

/**
 * Print the end-of-run summary
 */
export function printRunSummary(result: AnalysisResult, reports: GeneratedReports | null): void {
  const cross = result.crossProject;

  printHeader('Analysis Summary');
  printKeyValue('Files analyzed', cross.succeeded);
  printKeyValue('Extraction failures', cross.failed);
  printKeyValue('AI-degraded files', cross.aiDegraded);
  printKeyValue('Projects', cross.projectCount);
  printKeyValue('Total words', cross.totalWords.toLocaleString('en-US'));
  printKeyValue('Duration', `${(result.durationMs / 1000).toFixed(1)}s`);

  if (result.ai.requested) {
    printKeyValue('AI provider', result.ai.activeProvider ?? 'unavailable');
  }

  const failures = result.files.filter((r) => r.status === 'failed');
  if (failures.length > 0) {
    printSection('Failed files');
    for (const failure of failures.slice(0, 10)) {
      if (failure.status === 'failed') {
        printListItem(`${failure.file.relativePath}: ${theme.dim(failure.error)}`);
      }
    }
    if (failures.length > 10) {
      printInfo(`...and ${failures.length - 10} more (see the comprehensive report)`);
    }
  }

  if (reports) {
    printSection('Reports');
    printKeyValue('Folder', reports.directory);
    for (const report of reports.written) {
      printSuccess(report.type);
    }
    for (const report of reports.failed) {
      printError(report.error.message);
    }
  }
}

/**
 * Print provider availability as a table
 */
export function printProviderStatuses(statuses: ProviderStatus[], active: string | null): void {
  const mark = (value: boolean) => (value ? 'yes' : 'no');
  printTable(
    ['Provider', 'Model', 'Enabled', 'Credential', 'Usable'],
    statuses.map((s) => [s.id, s.model, mark(s.enabled), mark(s.credentialed), mark(s.usable)])
  );
  printBlank();
  if (active) {
    printSuccess(`Active provider: ${active}`);
  } else {
    printWarning('No usable provider; AI enrichment will fall back to basic analysis');
  }
}

