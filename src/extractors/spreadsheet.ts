/**
 * Spreadsheet (.xlsx, .xls) extractor using SheetJS
 */

import { promises as fs } from 'node:fs';
import * as XLSX from 'xlsx';
import type { Extraction, Extractor } from './types.js';

async function readWorkbook(filePath: string): Promise<XLSX.WorkBook> {
  const buffer = await fs.readFile(filePath);
  return XLSX.read(buffer, { type: 'buffer' });
}

export const spreadsheetExtractor: Extractor = {
  format: 'spreadsheet',
  extensions: ['.xlsx', '.xls'],

  async extract(filePath: string): Promise<Extraction> {
    const workbook = await readWorkbook(filePath);
    const text = workbook.SheetNames.map((name) => {
      const csv = XLSX.utils.sheet_to_csv(workbook.Sheets[name], { blankrows: false });
      return `Sheet: ${name}\n${csv}`;
    }).join('\n\n');

    const sheets = workbook.SheetNames.map((name) => {
      const ref = workbook.Sheets[name]['!ref'];
      const range = ref ? XLSX.utils.decode_range(ref) : null;
      return {
        name,
        rows: range ? range.e.r - range.s.r + 1 : 0,
        columns: range ? range.e.c - range.s.c + 1 : 0,
      };
    });

    const metadata: Record<string, unknown> = {
      file_type: 'spreadsheet',
      sheet_count: sheets.length,
      sheets,
    };
    if (workbook.Props?.Title) metadata.title = workbook.Props.Title;
    if (workbook.Props?.Author) metadata.author = workbook.Props.Author;
    return { text, metadata };
  },
};
