import { Sheet } from '../../lib/grid';
import type { CellValue } from '../../lib/grid';
import { classify, renderVerdict, verdictCategory } from './classifier';
import { isHeaderCell, translateAddress } from './offsetAligner';
import { categoryKey } from './types';
import type { Alignment, BoundSheets, ResultGrid, ResultSummary, Verdict } from './types';
import { RESULT_SHEET_NAME } from './roleDetector';

interface BoundPair {
  lower: CellValue;
  upper: CellValue;
}

function isHeader(alignment: Alignment, row: number, col: number): boolean {
  if (alignment.kind === 'offset') return isHeaderCell(alignment.sensed, row, col);
  return row <= alignment.headerRow;
}

// undefined when the address cannot be resolved in one of the bound sheets
function resolveBounds(alignment: Alignment, bounds: BoundSheets, row: number, col: number): BoundPair | undefined {
  if (alignment.kind === 'offset') {
    const lowerAt = translateAddress(alignment.sensed, alignment.lower, row, col);
    const upperAt = translateAddress(alignment.sensed, alignment.upper, row, col);
    return {
      lower: bounds.lower.get(lowerAt.row, lowerAt.col),
      upper: bounds.upper.get(upperAt.row, upperAt.col),
    };
  }
  const id = alignment.sensed.get(col);
  if (!id) return undefined;
  const lowerCol = alignment.lower.get(id);
  const upperCol = alignment.upper.get(id);
  if (lowerCol === undefined || upperCol === undefined) return undefined;
  return {
    lower: bounds.lower.get(row, lowerCol),
    upper: bounds.upper.get(row, upperCol),
  };
}

/**
 * Walks the sensed rectangle: header cells are copied as they are, data cells
 * are classified against the aligned bound cells.
 */
export function assembleResult(sensed: Sheet, bounds: BoundSheets, alignment: Alignment): ResultGrid {
  const sheet = new Sheet(RESULT_SHEET_NAME);
  const categories: ResultGrid['categories'] = new Map();
  const summary: ResultSummary = { header: 0, low: 0, high: 0, ok: 0, unclassified: 0 };

  for (const [row, col] of sensed.addresses()) {
    const value = sensed.get(row, col);
    if (isHeader(alignment, row, col)) {
      sheet.set(row, col, value);
      summary.header += 1;
      continue;
    }
    const pair = resolveBounds(alignment, bounds, row, col);
    const verdict: Verdict = pair
      ? classify(value, pair.lower, pair.upper)
      : { kind: 'unclassified', original: value };
    sheet.set(row, col, renderVerdict(verdict));
    summary[verdict.kind] += 1;
    const category = verdictCategory(verdict);
    if (category) categories.set(categoryKey(row, col), category);
  }

  return { sheet, categories, summary };
}
