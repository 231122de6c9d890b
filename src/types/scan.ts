/**
 * Scan-related type definitions
 * Describes classified files and the project groups built from them
 */

/**
 * Detected document format, derived from the file extension
 */
export type DocumentFormat =
  | 'text'
  | 'markdown'
  | 'html'
  | 'xml'
  | 'pdf'
  | 'word'
  | 'spreadsheet'
  | 'unknown';

/**
 * A supported file found during the scan
 * Immutable after creation
 */
export interface FileRecord {
  /** Absolute path on disk */
  readonly path: string;
  /** Path relative to the scan root, always '/'-separated */
  readonly relativePath: string;
  readonly name: string;
  /** Lowercase extension including the dot, e.g. '.pdf' */
  readonly extension: string;
  readonly size: number;
  readonly modified: Date;
  readonly format: DocumentFormat;
  /** Name of the owning project, or null for unassigned files */
  readonly project: string | null;
  /** Directories between the project directory and the file ('' when none) */
  readonly subfolder: string;
}

/**
 * Aggregate statistics for a group of files
 */
export interface GroupStats {
  fileCount: number;
  totalSize: number;
  /** Extension -> file count */
  formats: Record<string, number>;
  /** Distinct subfolders, sorted */
  subfolders: string[];
}

export interface ProjectGroup {
  readonly name: string;
  readonly files: readonly FileRecord[];
  readonly stats: GroupStats;
}

/**
 * A directory skipped because following it would loop back into the traversal stack
 */
export interface SkippedCycle {
  path: string;
  target: string;
}

export interface ScanIssue {
  path: string;
  message: string;
}

export interface ScanResult {
  readonly root: string;
  readonly rootName: string;
  readonly detectionLevel: number;
  /** All supported files, sorted by relative path */
  readonly files: readonly FileRecord[];
  /** Project groups, sorted by name */
  readonly groups: readonly ProjectGroup[];
  readonly unassigned: readonly FileRecord[];
  readonly unsupportedCount: number;
  readonly errors: readonly ScanIssue[];
  readonly cycles: readonly SkippedCycle[];
}

/**
 * Directory-level summary (used by list-only mode and the CLI summary)
 */
export interface ScanSummary {
  totalFiles: number;
  totalSize: number;
  projectCount: number;
  unassignedCount: number;
  unsupportedCount: number;
  formats: Record<string, number>;
}
