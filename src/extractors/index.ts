/**
 * Extractor registry
 * Maps a lowercase file extension to the extractor that reads it
 */

import path from 'node:path';
import { ExtractionError, UnsupportedFormatError, errorMessage } from '../errors.js';
import type { DocumentFormat } from '../types/scan.js';
import type { Extraction, Extractor } from './types.js';
import { docxExtractor } from './docx.js';
import { htmlExtractor, xmlExtractor } from './markup.js';
import { pdfExtractor } from './pdf.js';
import { spreadsheetExtractor } from './spreadsheet.js';
import { markdownExtractor, textExtractor } from './text.js';

export type { Extraction, Extractor } from './types.js';

export const DEFAULT_EXTRACTORS: readonly Extractor[] = [
  textExtractor,
  markdownExtractor,
  htmlExtractor,
  xmlExtractor,
  pdfExtractor,
  docxExtractor,
  spreadsheetExtractor,
];

export class ExtractorRegistry {
  private readonly byExtension = new Map<string, Extractor>();

  constructor(extractors: readonly Extractor[] = []) {
    for (const extractor of extractors) {
      this.register(extractor);
    }
  }

  /**
   * Register an extractor; later registrations win for shared extensions
   */
  register(extractor: Extractor): void {
    for (const extension of extractor.extensions) {
      this.byExtension.set(extension.toLowerCase(), extractor);
    }
  }

  get(extension: string): Extractor | undefined {
    return this.byExtension.get(extension.toLowerCase());
  }

  supportedExtensions(): Set<string> {
    return new Set(this.byExtension.keys());
  }

  formatFor(extension: string): DocumentFormat {
    return this.get(extension)?.format ?? 'unknown';
  }

  /**
   * Extract text and metadata from a file
   *
   * @throws UnsupportedFormatError when no extractor handles the extension
   * @throws ExtractionError when the extractor fails
   */
  async extract(filePath: string): Promise<Extraction> {
    const extension = path.extname(filePath).toLowerCase();
    const extractor = this.get(extension);
    if (!extractor) {
      throw new UnsupportedFormatError(filePath, extension);
    }

    try {
      return await extractor.extract(filePath);
    } catch (error) {
      throw new ExtractionError(filePath, `Failed to extract ${path.basename(filePath)}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

/**
 * Create a registry with every built-in extractor
 */
export function createExtractorRegistry(extractors: readonly Extractor[] = DEFAULT_EXTRACTORS): ExtractorRegistry {
  return new ExtractorRegistry(extractors);
}
