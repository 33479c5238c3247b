import * as XLSX from 'xlsx';
import { EMPTY, Sheet, Workbook, numberCell, textCell } from '../../lib/grid';
import type { CellValue } from '../../lib/grid';
import { WorkbookFormatError } from '../../lib/errors';

const READ_OPTIONS: XLSX.ParsingOptions = { cellDates: true, cellFormula: false, cellStyles: false };

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return EMPTY;
  if (typeof value === 'number') return Number.isFinite(value) ? numberCell(value) : EMPTY;
  if (typeof value === 'string') return textCell(value);
  if (typeof value === 'boolean') return textCell(value ? 'TRUE' : 'FALSE');
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? EMPTY : textCell(value.toISOString());
  }
  return textCell(String(value));
}

function convertSheet(name: string, ws: XLSX.WorkSheet): Sheet {
  const sheet = new Sheet(name);
  const ref = ws['!ref'];
  if (!ref) return sheet;
  const range = XLSX.utils.decode_range(ref);
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, raw: true, defval: null, blankrows: true });
  rows.forEach((row, r) => {
    row.forEach((value, c) => {
      const cell = toCellValue(value);
      if (cell.kind === 'empty') return;
      // sheet_to_json rows start at the top-left corner of !ref; the grid is 1-based
      sheet.set(range.s.r + r + 1, range.s.c + c + 1, cell);
    });
  });
  return sheet;
}

export function toWorkbookModel(book: XLSX.WorkBook): Workbook {
  const workbook = new Workbook();
  book.SheetNames.forEach(sheetName => {
    const ws = book.Sheets[sheetName];
    workbook.addSheet(ws ? convertSheet(sheetName, ws) : new Sheet(sheetName));
  });
  return workbook;
}

export function readWorkbook(filePath: string): Workbook {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.readFile(filePath, READ_OPTIONS);
  } catch (err) {
    throw new WorkbookFormatError('The uploaded file could not be read as a spreadsheet', err);
  }
  return toWorkbookModel(book);
}

export function readWorkbookBuffer(buffer: Buffer): Workbook {
  let book: XLSX.WorkBook;
  try {
    book = XLSX.read(buffer, { ...READ_OPTIONS, type: 'buffer' });
  } catch (err) {
    throw new WorkbookFormatError('The uploaded file could not be read as a spreadsheet', err);
  }
  return toWorkbookModel(book);
}
