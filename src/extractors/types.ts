/**
 * Extractor contract shared by all format extractors
 */

import type { DocumentFormat } from '../types/scan.js';

export interface Extractor {
  readonly format: DocumentFormat;
  /** Lowercase extensions including the dot */
  readonly extensions: readonly string[];
  /** Reads and parses the file once, returning its text and metadata */
  extract(filePath: string): Promise<Extraction>;
}

export interface Extraction {
  text: string;
  metadata: Record<string, unknown>;
}
