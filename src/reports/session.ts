/**
 * Session folder naming and creation
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Session } from '../context.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * dd_mm_yy_hh_mm in local time
 */
export function formatSessionStamp(date: Date): string {
  return [
    pad(date.getDate()),
    pad(date.getMonth() + 1),
    pad(date.getFullYear() % 100),
    pad(date.getHours()),
    pad(date.getMinutes()),
  ].join('_');
}

/**
 * YYYY-MM-DD HH:MM:SS in local time
 */
export function formatGeneratedAt(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function sessionFolderName(session: Session): string {
  return `${session.rootName}_${formatSessionStamp(session.createdAt)}`;
}

/**
 * Keep names usable as a single path segment
 * Letters and digits of any script survive; separators, reserved characters and whitespace become _
 */
export function safeSegment(name: string): string {
  const safe = name.replace(/[\u0000-\u001f\u007f\/\\:*?"<>|\s]+/gu, '_');
  return safe === '' || safe === '.' || safe === '..' ? '_' : safe;
}

/**
 * Hands out segments that are unique within one session folder
 * Clashes, compared case-insensitively, get _2, _3, ... appended
 */
export class SegmentAllocator {
  private readonly used = new Set<string>();

  allocate(name: string): string {
    const base = safeSegment(name);
    for (let suffix = 1; ; suffix++) {
      const candidate = suffix === 1 ? base : `${base}_${suffix}`;
      const key = candidate.toLowerCase();
      if (!this.used.has(key)) {
        this.used.add(key);
        return candidate;
      }
    }
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Create the session folder under reportsDir
 * An existing folder is never reused: _2, _3, ... is appended instead
 */
export async function createSessionDirectory(reportsDir: string, session: Session): Promise<string> {
  await fs.mkdir(reportsDir, { recursive: true });
  const base = path.join(reportsDir, safeSegment(sessionFolderName(session)));

  for (let suffix = 1; ; suffix++) {
    const candidate = suffix === 1 ? base : `${base}_${suffix}`;
    try {
      await fs.mkdir(candidate);
      return candidate;
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;
    }
  }
}
