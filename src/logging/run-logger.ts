/**
 * Run Logger
 * Append-only log of scan progress, extraction failures, provider attempts and timing
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: RunStage;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'info' | 'warn' | 'error' | 'success' | 'debug';

/**
 * Run stages for categorization
 */
export type RunStage = 'config' | 'scan' | 'extract' | 'ai' | 'aggregate' | 'report' | 'run';

export interface RunLoggerOptions {
  /** File to append to; null keeps entries in memory only */
  logFile: string | null;
  /** Record debug entries */
  verbose?: boolean;
  /** Called for every recorded entry (console echo) */
  onEntry?: (entry: LogEntry) => void;
}

/**
 * Format a single entry as one log line
 */
export function formatLogLine(entry: LogEntry): string {
  const data = entry.data && Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
  return `${entry.timestamp} [${entry.level.toUpperCase()}] [${entry.stage}] ${entry.message}${data}`;
}

/**
 * Run-scoped logger. One instance per run, passed explicitly to each component
 */
export class RunLogger {
  private readonly logFile: string | null;
  private readonly verbose: boolean;
  private readonly onEntry?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private writeQueue: Promise<void> = Promise.resolve();
  private initialized: boolean = false;
  private writeFailed: boolean = false;

  constructor(options: RunLoggerOptions) {
    this.logFile = options.logFile ? path.resolve(options.logFile) : null;
    this.verbose = options.verbose ?? false;
    this.onEntry = options.onEntry;
  }

  /**
   * Record an entry and queue it for appending to the log file
   */
  log(
    stage: RunStage,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): Promise<void> {
    if (level === 'debug' && !this.verbose) {
      return this.writeQueue;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      stage,
      message,
      data,
      level,
    };

    this.entries.push(entry);
    this.onEntry?.(entry);

    this.writeQueue = this.writeQueue.then(() => this.append(entry));
    return this.writeQueue;
  }

  debug(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.log(stage, message, data, 'debug');
  }

  info(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.log(stage, message, data, 'info');
  }

  warn(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.log(stage, message, data, 'warn');
  }

  error(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.log(stage, message, data, 'error');
  }

  success(stage: RunStage, message: string, data?: Record<string, unknown>): Promise<void> {
    return this.log(stage, message, data, 'success');
  }

  /**
   * Log stage start
   */
  stageStart(stage: RunStage, description: string, data?: Record<string, unknown>): Promise<void> {
    return this.info(stage, `Starting: ${description}`, data);
  }

  /**
   * Log stage completion with elapsed time
   */
  stageComplete(stage: RunStage, description: string, startedAt: number, data?: Record<string, unknown>): Promise<void> {
    return this.success(stage, `Completed: ${description}`, { ...data, elapsedMs: Date.now() - startedAt });
  }

  /**
   * Wait until every queued entry has been written
   */
  flush(): Promise<void> {
    return this.writeQueue;
  }

  private async append(entry: LogEntry): Promise<void> {
    if (!this.logFile || this.writeFailed) return;

    try {
      if (!this.initialized) {
        await fs.mkdir(path.dirname(this.logFile), { recursive: true });
        this.initialized = true;
      }
      await fs.appendFile(this.logFile, formatLogLine(entry) + '\n', 'utf-8');
    } catch (error) {
      // Entries stay available in memory after the first write failure
      this.writeFailed = true;
      console.error('Failed to write run log:', error);
    }
  }

  /**
   * Get all log entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Get entries for a specific stage
   */
  getEntriesForStage(stage: RunStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  /**
   * Get error entries
   */
  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }

  get path(): string | null {
    return this.logFile;
  }
}

/**
 * Logger that keeps entries in memory only
 */
export function createMemoryLogger(verbose = false): RunLogger {
  return new RunLogger({ logFile: null, verbose });
}
