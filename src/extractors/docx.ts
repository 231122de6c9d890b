/**
 * Word (.docx) extractor using mammoth
 */

import mammoth from 'mammoth';
import type { Extraction, Extractor } from './types.js';

export const docxExtractor: Extractor = {
  format: 'word',
  extensions: ['.docx'],

  async extract(filePath: string): Promise<Extraction> {
    const result = await mammoth.extractRawText({ path: filePath });
    const paragraphs = result.value.split(/\n{2,}/).filter((p) => p.trim().length > 0);
    return {
      text: result.value,
      metadata: {
        file_type: 'word',
        paragraph_count: paragraphs.length,
        warnings: result.messages.map((m) => m.message),
      },
    };
  },
};
