/**
 * Run-scoped context shared by scanner, orchestrator, gateway and report generator
 */

import path from 'node:path';
import { RunLogger, createMemoryLogger } from './logging/run-logger.js';

/**
 * A single run's identity: root directory name + creation time
 */
export interface Session {
  readonly rootName: string;
  readonly createdAt: Date;
}

export interface RunContext {
  readonly logger: RunLogger;
  readonly session: Session;
  /** Aborted on user interrupt */
  readonly signal?: AbortSignal;
}

export function createSession(root: string, createdAt: Date = new Date()): Session {
  return Object.freeze({ rootName: path.basename(path.resolve(root)), createdAt });
}

export function createRunContext(
  root: string,
  options: { logger?: RunLogger; signal?: AbortSignal; createdAt?: Date } = {}
): RunContext {
  return {
    logger: options.logger ?? createMemoryLogger(),
    session: createSession(root, options.createdAt),
    signal: options.signal,
  };
}
