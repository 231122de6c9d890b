/**
 * Tests for the directory scanner
 * Covers project detection by level, unassigned files, ordering and symbolic links
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import {
  assignProject,
  computeGroupStats,
  formatForExtension,
  scan,
  summarizeScan,
} from '../../src/scanner/index.js';
import { createExtractorRegistry } from '../../src/extractors/index.js';
import { ConfigurationError, ScanError } from '../../src/errors.js';
import type { ScanResult } from '../../src/types/scan.js';

const SUPPORTED = createExtractorRegistry().supportedExtensions();

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

function assignedPaths(result: ScanResult): string[] {
  return result.groups.flatMap((g) => g.files.map((f) => f.relativePath));
}

describe('assignProject', () => {
  it('should name the project by the segment at the level', () => {
    expect(assignProject(['Docs', 'Alpha'], 2)).toEqual({ project: 'Alpha', subfolder: '' });
    expect(assignProject(['Docs', 'Alpha', 'notes', 'old'], 2)).toEqual({ project: 'Alpha', subfolder: 'notes/old' });
  });

  it('should leave files shallower than the level unassigned', () => {
    expect(assignProject(['Docs'], 2)).toEqual({ project: null, subfolder: '' });
  });

  it('should put every file under the root at level 1', () => {
    expect(assignProject(['Docs'], 1)).toEqual({ project: 'Docs', subfolder: '' });
    expect(assignProject(['Docs', 'Alpha'], 1)).toEqual({ project: 'Docs', subfolder: 'Alpha' });
  });
});

describe('formatForExtension', () => {
  it('should map known extensions and fall back to unknown', () => {
    expect(formatForExtension('.md')).toBe('markdown');
    expect(formatForExtension('.HTM')).toBe('html');
    expect(formatForExtension('.xlsx')).toBe('spreadsheet');
    expect(formatForExtension('.png')).toBe('unknown');
  });
});

describe('scan', () => {
  let tmpDir: string;
  let docs: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsurvey-scan-'));
    docs = path.join(tmpDir, 'Docs');
    await writeTree(docs, {
      'Alpha/a.txt': 'alpha text',
      'Alpha/notes/b.md': '# Notes',
      'Beta/c.html': '<p>beta</p>',
      'standalone.txt': 'loose file',
      'image.png': 'not a document',
    });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should group files by the directory at level 2', async () => {
    const result = await scan(docs, SUPPORTED, 2);

    expect(result.rootName).toBe('Docs');
    expect(result.groups.map((g) => g.name)).toEqual(['Alpha', 'Beta']);
    expect(result.groups[0].files.map((f) => f.relativePath)).toEqual(['Alpha/a.txt', 'Alpha/notes/b.md']);
    expect(result.groups[1].files.map((f) => f.relativePath)).toEqual(['Beta/c.html']);
    expect(result.unassigned.map((f) => f.relativePath)).toEqual(['standalone.txt']);
    expect(result.unsupportedCount).toBe(1);
  });

  it('should fill in file records', async () => {
    const result = await scan(docs, SUPPORTED, 2);
    const notes = result.files.find((f) => f.name === 'b.md');

    expect(notes).toMatchObject({
      path: path.join(docs, 'Alpha', 'notes', 'b.md'),
      relativePath: 'Alpha/notes/b.md',
      extension: '.md',
      size: 7,
      format: 'markdown',
      project: 'Alpha',
      subfolder: 'notes',
    });
    expect(notes?.modified).toBeInstanceOf(Date);
  });

  it('should compute group statistics', async () => {
    const result = await scan(docs, SUPPORTED, 2);

    expect(result.groups[0].stats).toEqual({
      fileCount: 2,
      totalSize: 'alpha text'.length + '# Notes'.length,
      formats: { '.txt': 1, '.md': 1 },
      subfolders: ['notes'],
    });
  });

  it('should assign every file to the root project at level 1', async () => {
    const result = await scan(docs, SUPPORTED, 1);

    expect(result.groups.map((g) => g.name)).toEqual(['Docs']);
    expect(result.groups[0].files).toHaveLength(4);
    expect(result.groups[0].stats.subfolders).toEqual(['Alpha', 'Alpha/notes', 'Beta']);
    expect(result.unassigned).toEqual([]);
  });

  it('should name projects by deeper directories at level 3', async () => {
    const result = await scan(docs, SUPPORTED, 3);

    expect(result.groups.map((g) => g.name)).toEqual(['notes']);
    expect(result.unassigned.map((f) => f.relativePath)).toEqual(['Alpha/a.txt', 'Beta/c.html', 'standalone.txt']);
  });

  it('should produce zero groups when no directory reaches the level', async () => {
    const result = await scan(docs, SUPPORTED, 5);

    expect(result.groups).toEqual([]);
    expect(result.unassigned).toHaveLength(4);
  });

  it('should place every supported file in exactly one group or the unassigned set', async () => {
    for (const level of [1, 2, 3, 4]) {
      const result = await scan(docs, SUPPORTED, level);
      const placed = [...assignedPaths(result), ...result.unassigned.map((f) => f.relativePath)];

      expect(placed.sort()).toEqual(result.files.map((f) => f.relativePath).sort());
      expect(new Set(placed).size).toBe(placed.length);
    }
  });

  it('should return the same result when scanned twice', async () => {
    const first = await scan(docs, SUPPORTED, 2);
    const second = await scan(docs, SUPPORTED, 2);

    expect(second).toEqual(first);
  });

  it('should freeze its results', async () => {
    const result = await scan(docs, SUPPORTED, 2);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.files)).toBe(true);
    expect(Object.isFrozen(result.files[0])).toBe(true);
  });

  it('should match extensions case-insensitively', async () => {
    await writeTree(docs, { 'Beta/README.MD': '# Readme' });

    const result = await scan(docs, SUPPORTED, 2);
    const readme = result.files.find((f) => f.name === 'README.MD');

    expect(readme?.extension).toBe('.md');
    expect(readme?.project).toBe('Beta');
  });

  it('should order files by code unit', async () => {
    await writeTree(docs, { 'Beta/Zeta.txt': 'z', 'Beta/alpha.txt': 'a' });

    const result = await scan(docs, SUPPORTED, 2);
    const beta = result.groups.find((g) => g.name === 'Beta');

    expect(beta?.files.map((f) => f.name)).toEqual(['Zeta.txt', 'alpha.txt', 'c.html']);
  });

  it('should reject invalid detection levels before traversal', async () => {
    await expect(scan(docs, SUPPORTED, 0)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(scan(docs, SUPPORTED, 1.5)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(scan(path.join(tmpDir, 'missing'), SUPPORTED, -1)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should raise ScanError for a missing root', async () => {
    await expect(scan(path.join(tmpDir, 'missing'), SUPPORTED, 2)).rejects.toBeInstanceOf(ScanError);
  });

  it('should raise ScanError when the root is a file', async () => {
    await expect(scan(path.join(docs, 'standalone.txt'), SUPPORTED, 2)).rejects.toThrow(/Not a directory/);
  });

  it('should skip a symbolic link that loops back to an ancestor', async () => {
    await fs.symlink(docs, path.join(docs, 'Alpha', 'loop'), 'dir');

    const result = await scan(docs, SUPPORTED, 2);

    expect(result.cycles).toEqual([{ path: path.join(docs, 'Alpha', 'loop'), target: await fs.realpath(docs) }]);
    expect(result.files).toHaveLength(4);
  });

  it('should follow a symbolic link to a directory outside the tree', async () => {
    const shared = path.join(tmpDir, 'shared');
    await writeTree(shared, { 'guide.txt': 'shared guide' });
    await fs.symlink(shared, path.join(docs, 'Gamma'), 'dir');

    const result = await scan(docs, SUPPORTED, 2);

    expect(result.groups.map((g) => g.name)).toEqual(['Alpha', 'Beta', 'Gamma']);
    expect(result.files.find((f) => f.name === 'guide.txt')?.relativePath).toBe('Gamma/guide.txt');
  });

  it('should treat a symbolic link to a file as that file', async () => {
    await fs.symlink(path.join(docs, 'standalone.txt'), path.join(docs, 'Beta', 'link.txt'));

    const result = await scan(docs, SUPPORTED, 2);
    const link = result.files.find((f) => f.name === 'link.txt');

    expect(link?.project).toBe('Beta');
    expect(link?.size).toBe('loose file'.length);
  });

  it('should record broken symbolic links as scan errors', async () => {
    const broken = path.join(docs, 'Beta', 'broken.txt');
    await fs.symlink(path.join(tmpDir, 'nowhere.txt'), broken);

    const result = await scan(docs, SUPPORTED, 2);

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].path).toBe(broken);
    expect(result.errors[0].message).toMatch(/^Broken symbolic link/);
    expect(result.files).toHaveLength(4);
  });
});

describe('summarizeScan', () => {
  it('should total files, sizes and extensions', async () => {
    const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsurvey-summary-'));
    try {
      await writeTree(tmpDir, { 'P/one.txt': '12345', 'P/two.txt': '123', 'top.md': '1', 'skip.bin': 'x' });

      const summary = summarizeScan(await scan(tmpDir, SUPPORTED, 2));

      expect(summary).toEqual({
        totalFiles: 3,
        totalSize: 9,
        projectCount: 1,
        unassignedCount: 1,
        unsupportedCount: 1,
        formats: { '.txt': 2, '.md': 1 },
      });
    } finally {
      await fs.rm(tmpDir, { recursive: true, force: true });
    }
  });
});

describe('computeGroupStats', () => {
  it('should return zeros for no files', () => {
    expect(computeGroupStats([])).toEqual({ fileCount: 0, totalSize: 0, formats: {}, subfolders: [] });
  });
});
