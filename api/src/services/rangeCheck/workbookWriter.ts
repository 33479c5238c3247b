import ExcelJS from 'exceljs';
import type { CellValue as ExcelCellValue, Fill, Worksheet } from 'exceljs';
import type { Workbook } from '../../lib/grid';
import { WorkbookFormatError } from '../../lib/errors';
import { RESULT_SHEET_NAME, isResultSheet } from './roleDetector';
import { categoryKey } from './types';
import type { RangeCheckOutcome, ResultGrid, VisualCategory } from './types';

// ARGB of the Result fills: light blue, light green, light red
export const CATEGORY_COLORS: Record<VisualCategory, string> = {
  low: 'FFADD8E6',
  ok: 'FF90EE90',
  high: 'FFFFC7CE',
};

const solidFill = (argb: string): Fill => ({ type: 'pattern', pattern: 'solid', fgColor: { argb } });

/**
 * Serializes the workbook model to .xlsx. Only the sheet named "Result" gets fills,
 * taken from the categories of the assembled result.
 */
export async function writeWorkbook(workbook: Workbook, categories: ResultGrid['categories']): Promise<Buffer> {
  const book = new ExcelJS.Workbook();
  book.created = new Date();

  workbook.sheets.forEach(sheet => {
    const ws = book.addWorksheet(sheet.name);
    const isResult = sheet.name === RESULT_SHEET_NAME;
    for (const [row, col] of sheet.addresses()) {
      const value = sheet.get(row, col);
      if (value.kind === 'empty') continue;
      const cell = ws.getCell(row, col);
      cell.value = value.value;
      const category = isResult ? categories.get(categoryKey(row, col)) : undefined;
      if (category) cell.fill = solidFill(CATEGORY_COLORS[category]);
    }
  });

  const data = await book.xlsx.writeBuffer();
  return Buffer.from(data);
}

// exceljs opens Office Open XML packages only; other formats go through writeWorkbook
const OPEN_XML_NAME = /\.xls[xm]$/i;

export interface WorkbookSource {
  path: string;
  /** Name the file was uploaded or stored under; its extension picks the writer. */
  name: string;
}

// formulas would point at Result's own cells, so Result keeps their cached result
function staticValue(value: ExcelCellValue): ExcelCellValue {
  if (value === null || typeof value !== 'object' || value instanceof Date) return value;
  if (!('formula' in value) && !('sharedFormula' in value)) return value;
  const { result } = value;
  if (result === undefined || (typeof result === 'object' && !(result instanceof Date))) return null;
  return result;
}

function addResultSheet(book: ExcelJS.Workbook, sensed: Worksheet, result: ResultGrid) {
  const ws = book.addWorksheet(RESULT_SHEET_NAME);
  for (const [row, col] of result.sheet.addresses()) {
    const cell = ws.getCell(row, col);
    const category = result.categories.get(categoryKey(row, col));
    if (category) {
      const verdict = result.sheet.get(row, col);
      if (verdict.kind !== 'empty') cell.value = verdict.value;
      cell.fill = solidFill(CATEGORY_COLORS[category]);
      continue;
    }
    // header and unclassified cells keep the sensed cell's value and number format
    const source = sensed.getCell(row, col);
    const value = staticValue(source.value);
    if (value === null || value === undefined) continue;
    cell.value = value;
    if (source.numFmt) cell.numFmt = source.numFmt;
  }
}

/**
 * Writes the checked workbook. An .xlsx/.xlsm source is reopened as it is, so its
 * sheets keep their dates, formulas and styles; only "Result" (any case) is
 * dropped and rebuilt at the end. Other formats are rebuilt from the model.
 */
export async function writeCheckedWorkbook(source: WorkbookSource, outcome: RangeCheckOutcome): Promise<Buffer> {
  if (!OPEN_XML_NAME.test(source.name)) {
    return writeWorkbook(outcome.workbook, outcome.result.categories);
  }

  const book = new ExcelJS.Workbook();
  try {
    await book.xlsx.readFile(source.path);
  } catch (err) {
    throw new WorkbookFormatError('The uploaded file could not be read as a spreadsheet', err);
  }
  book.worksheets
    .filter(ws => isResultSheet(ws.name))
    .forEach(ws => book.removeWorksheet(ws.id));

  const sensed = outcome.roles.sensed === undefined ? undefined : book.getWorksheet(outcome.roles.sensed);
  if (!sensed) throw new WorkbookFormatError(`Sheet "${outcome.roles.sensed ?? ''}" could not be reopened`);
  addResultSheet(book, sensed, outcome.result);

  const data = await book.xlsx.writeBuffer();
  return Buffer.from(data);
}

const pad = (value: number) => String(value).padStart(2, '0');

/** processed20240131093000.xlsx, local time */
export function processedFileName(date: Date = new Date()): string {
  const stamp = [
    date.getFullYear(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds()),
  ].join('');
  return `processed${stamp}.xlsx`;
}
