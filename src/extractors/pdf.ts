/**
 * PDF extractor using pdf-parse
 */

import { promises as fs } from 'node:fs';
import { createRequire } from 'node:module';
import type pdfParseFn from 'pdf-parse';
import type { Extraction, Extractor } from './types.js';

type PdfParse = typeof pdfParseFn;

let pdfParse: PdfParse | null = null;

/**
 * Load pdf-parse on first use
 * The package entry runs a self-test when imported from ESM, so the parser module is required directly
 */
function loadPdfParse(): PdfParse {
  if (pdfParse) return pdfParse;
  const require = createRequire(import.meta.url);
  const loaded: PdfParse = require('pdf-parse/lib/pdf-parse.js');
  pdfParse = loaded;
  return loaded;
}

export const pdfExtractor: Extractor = {
  format: 'pdf',
  extensions: ['.pdf'],

  async extract(filePath: string): Promise<Extraction> {
    const data = await loadPdfParse()(await fs.readFile(filePath));
    const info: Record<string, unknown> = data.info ?? {};
    const metadata: Record<string, unknown> = {
      file_type: 'pdf',
      page_count: data.numpages,
      pdf_version: data.version,
    };

    for (const [key, field] of [
      ['title', 'Title'],
      ['author', 'Author'],
      ['subject', 'Subject'],
      ['creator', 'Creator'],
      ['producer', 'Producer'],
      ['creation_date', 'CreationDate'],
    ] as const) {
      const value = info[field];
      if (typeof value === 'string' && value.trim()) {
        metadata[key] = value.trim();
      }
    }

    return { text: data.text, metadata };
  },
};
