/**
 * Directory scanner
 * Walks the root tree, classifies files by extension and groups them into
 * projects by hierarchy depth
 */

import { promises as fs } from 'node:fs';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { ConfigurationError, ScanError, errorMessage } from '../errors.js';
import type { RunContext } from '../context.js';
import type {
  DocumentFormat,
  FileRecord,
  GroupStats,
  ProjectGroup,
  ScanIssue,
  ScanResult,
  ScanSummary,
  SkippedCycle,
} from '../types/scan.js';

const EXTENSION_FORMATS: Record<string, DocumentFormat> = {
  '.txt': 'text',
  '.md': 'markdown',
  '.markdown': 'markdown',
  '.html': 'html',
  '.htm': 'html',
  '.xml': 'xml',
  '.pdf': 'pdf',
  '.docx': 'word',
  '.doc': 'word',
  '.xlsx': 'spreadsheet',
  '.xls': 'spreadsheet',
};

/**
 * Document format for a lowercase extension
 */
export function formatForExtension(extension: string): DocumentFormat {
  return EXTENSION_FORMATS[extension.toLowerCase()] ?? 'unknown';
}

/**
 * Compare strings by UTF-16 code units, independent of locale
 */
export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Where a file at the given location belongs
 * Segments start with the root directory name, which counts as level 1
 */
export function assignProject(
  segments: readonly string[],
  detectionLevel: number
): { project: string | null; subfolder: string } {
  if (segments.length < detectionLevel) {
    return { project: null, subfolder: '' };
  }
  return {
    project: segments[detectionLevel - 1],
    subfolder: segments.slice(detectionLevel).join('/'),
  };
}

export function validateDetectionLevel(level: unknown): number {
  if (typeof level !== 'number' || !Number.isInteger(level) || level < 1) {
    throw new ConfigurationError(`Detection level must be a positive integer, got ${String(level)}`);
  }
  return level;
}

/**
 * Aggregate statistics for a list of files
 */
export function computeGroupStats(files: readonly FileRecord[]): GroupStats {
  const formats: Record<string, number> = {};
  const subfolders = new Set<string>();
  let totalSize = 0;

  for (const file of files) {
    totalSize += file.size;
    formats[file.extension] = (formats[file.extension] ?? 0) + 1;
    if (file.subfolder) {
      subfolders.add(file.subfolder);
    }
  }

  return {
    fileCount: files.length,
    totalSize,
    formats,
    subfolders: [...subfolders].sort(compareCodeUnits),
  };
}

interface WalkState {
  root: string;
  rootName: string;
  supported: ReadonlySet<string>;
  detectionLevel: number;
  files: FileRecord[];
  errors: ScanIssue[];
  cycles: SkippedCycle[];
  unsupportedCount: number;
}

/**
 * Scan a directory tree
 *
 * @param root - Directory to scan
 * @param supportedExtensions - Lowercase extensions (with dot) that can be analyzed
 * @param detectionLevel - Hierarchy level naming a project; the root is level 1
 * @throws ConfigurationError for an invalid level
 * @throws ScanError when the root is missing or not a directory
 */
export async function scan(
  root: string,
  supportedExtensions: Iterable<string>,
  detectionLevel: number,
  ctx?: RunContext
): Promise<ScanResult> {
  const level = validateDetectionLevel(detectionLevel);
  const absoluteRoot = path.resolve(root);

  let rootStat: Stats;
  try {
    rootStat = await fs.stat(absoluteRoot);
  } catch (error) {
    throw new ScanError(absoluteRoot, `Directory not found: ${absoluteRoot}`, { cause: error });
  }
  if (!rootStat.isDirectory()) {
    throw new ScanError(absoluteRoot, `Not a directory: ${absoluteRoot}`);
  }

  const startedAt = Date.now();
  await ctx?.logger.stageStart('scan', `Scanning ${absoluteRoot}`, { detectionLevel: level });

  const state: WalkState = {
    root: absoluteRoot,
    rootName: path.basename(absoluteRoot),
    supported: new Set([...supportedExtensions].map((e) => e.toLowerCase())),
    detectionLevel: level,
    files: [],
    errors: [],
    cycles: [],
    unsupportedCount: 0,
  };

  const rootReal = await fs.realpath(absoluteRoot);
  await walk(state, absoluteRoot, [], [rootReal]);

  for (const issue of state.errors) {
    await ctx?.logger.warn('scan', `Skipped ${issue.path}: ${issue.message}`);
  }
  for (const cycle of state.cycles) {
    await ctx?.logger.warn('scan', `Skipped symbolic link cycle at ${cycle.path}`, { target: cycle.target });
  }

  const result = buildResult(state);
  await ctx?.logger.stageComplete('scan', 'Directory scan', startedAt, {
    files: result.files.length,
    projects: result.groups.length,
    unassigned: result.unassigned.length,
    unsupported: result.unsupportedCount,
  });
  return result;
}

async function walk(state: WalkState, dir: string, dirs: string[], stack: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    state.errors.push({ path: dir, message: errorMessage(error) });
    return;
  }

  entries.sort((a, b) => compareCodeUnits(a.name, b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    let stat: Stats;
    try {
      stat = await fs.stat(fullPath);
    } catch (error) {
      const message = entry.isSymbolicLink() ? `Broken symbolic link: ${errorMessage(error)}` : errorMessage(error);
      state.errors.push({ path: fullPath, message });
      continue;
    }

    if (stat.isDirectory()) {
      let real: string;
      try {
        real = await fs.realpath(fullPath);
      } catch (error) {
        state.errors.push({ path: fullPath, message: errorMessage(error) });
        continue;
      }
      if (stack.includes(real)) {
        state.cycles.push({ path: fullPath, target: real });
        continue;
      }
      await walk(state, fullPath, [...dirs, entry.name], [...stack, real]);
    } else if (stat.isFile()) {
      addFile(state, fullPath, entry.name, dirs, stat);
    }
  }
}

function addFile(state: WalkState, fullPath: string, name: string, dirs: string[], stat: Stats): void {
  const extension = path.extname(name).toLowerCase();
  if (!state.supported.has(extension)) {
    state.unsupportedCount++;
    return;
  }

  const { project, subfolder } = assignProject([state.rootName, ...dirs], state.detectionLevel);
  const record: FileRecord = Object.freeze({
    path: fullPath,
    relativePath: [...dirs, name].join('/'),
    name,
    extension,
    size: stat.size,
    modified: stat.mtime,
    format: formatForExtension(extension),
    project,
    subfolder,
  });
  state.files.push(record);
}

function buildResult(state: WalkState): ScanResult {
  const files = [...state.files].sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath));

  const byProject = new Map<string, FileRecord[]>();
  const unassigned: FileRecord[] = [];
  for (const file of files) {
    if (file.project === null) {
      unassigned.push(file);
      continue;
    }
    const bucket = byProject.get(file.project);
    if (bucket) {
      bucket.push(file);
    } else {
      byProject.set(file.project, [file]);
    }
  }

  const groups: ProjectGroup[] = [...byProject.entries()]
    .sort(([a], [b]) => compareCodeUnits(a, b))
    .map(([name, groupFiles]) =>
      Object.freeze({
        name,
        files: Object.freeze(groupFiles),
        stats: Object.freeze(computeGroupStats(groupFiles)),
      })
    );

  return Object.freeze({
    root: state.root,
    rootName: state.rootName,
    detectionLevel: state.detectionLevel,
    files: Object.freeze(files),
    groups: Object.freeze(groups),
    unassigned: Object.freeze(unassigned),
    unsupportedCount: state.unsupportedCount,
    errors: Object.freeze(state.errors),
    cycles: Object.freeze(state.cycles),
  });
}

/**
 * Totals for list-only mode and the run summary
 */
export function summarizeScan(result: ScanResult): ScanSummary {
  const stats = computeGroupStats(result.files);
  return {
    totalFiles: stats.fileCount,
    totalSize: stats.totalSize,
    projectCount: result.groups.length,
    unassignedCount: result.unassigned.length,
    unsupportedCount: result.unsupportedCount,
    formats: stats.formats,
  };
}
