import * as XLSX from 'xlsx';
import { NAME_COLUMN, PREVIEW_NAME_LIMIT } from '../constants';
import { SpreadsheetError } from '../errors';
import type { NamesPreview } from '../types';

const cellToName = (cell: unknown): string => {
  if (cell === null || cell === undefined) return '';
  return String(cell).trim();
};

const readWorkbook = (data: Uint8Array): XLSX.WorkBook => {
  if (data.byteLength === 0) {
    throw new SpreadsheetError('SPREADSHEET_UNREADABLE', 'Spreadsheet file is empty');
  }
  try {
    // 65001: text uploads (CSV) are UTF-8, not the default single-byte codepage
    return XLSX.read(Buffer.from(data), { type: 'buffer', cellDates: false, codepage: 65001 });
  } catch (error) {
    throw new SpreadsheetError(
      'SPREADSHEET_UNREADABLE',
      `Could not read spreadsheet: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
};

/**
 * Every non-empty value of the "Name" column of the first sheet, trimmed, in
 * row order. Blank cells are skipped; the header must read exactly "Name".
 */
export function readNamesFromSpreadsheet(data: Uint8Array): string[] {
  const workbook = readWorkbook(data);
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new SpreadsheetError('MISSING_NAME_COLUMN', 'Spreadsheet has no sheets');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
  });

  const header = Array.isArray(rows[0]) ? rows[0] : [];
  const columnIndex = header.findIndex((cell) => cell === NAME_COLUMN);
  if (columnIndex === -1) {
    throw new SpreadsheetError(
      'MISSING_NAME_COLUMN',
      `The spreadsheet must contain a column named '${NAME_COLUMN}'.`,
    );
  }

  const names: string[] = [];
  for (const row of rows.slice(1)) {
    const name = Array.isArray(row) ? cellToName(row[columnIndex]) : '';
    if (name) names.push(name);
  }
  return names;
}

export function previewSpreadsheetNames(data: Uint8Array, limit = PREVIEW_NAME_LIMIT): NamesPreview {
  const names = readNamesFromSpreadsheet(data);
  return { names: names.slice(0, limit), total: names.length };
}
