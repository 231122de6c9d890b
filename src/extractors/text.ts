/**
 * Plain text and Markdown extractor
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Extraction, Extractor } from './types.js';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

export function countLines(text: string): number {
  if (text.length === 0) return 0;
  const lines = text.split(/\r\n|\r|\n/);
  return text.endsWith('\n') ? lines.length - 1 : lines.length;
}

async function readText(filePath: string): Promise<Extraction> {
  const buffer = await fs.readFile(filePath);
  const text = buffer.toString('utf-8');
  return {
    text,
    metadata: {
      file_type: 'text',
      encoding: 'utf-8',
      line_count: countLines(text),
      size_bytes: buffer.length,
      is_markdown: MARKDOWN_EXTENSIONS.has(path.extname(filePath).toLowerCase()),
    },
  };
}

export const textExtractor: Extractor = {
  format: 'text',
  extensions: ['.txt'],
  extract: readText,
};

export const markdownExtractor: Extractor = {
  format: 'markdown',
  extensions: ['.md', '.markdown'],

  async extract(filePath: string): Promise<Extraction> {
    const { text, metadata } = await readText(filePath);
    const headings = text.match(/^#{1,6}\s+.+$/gm) ?? [];
    return {
      text,
      metadata: {
        ...metadata,
        file_type: 'markdown',
        heading_count: headings.length,
      },
    };
  },
};
