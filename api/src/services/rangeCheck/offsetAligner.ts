import type { Sheet } from '../../lib/grid';
import type { HeaderSize, OffsetTuple } from './types';

export const DEFAULT_HEADER_SIZE: HeaderSize = { headerRows: 3, headerCols: 2 };

function findFirstNumber(sheet: Sheet): { row: number; col: number } | undefined {
  for (const [row, col] of sheet.addresses()) {
    if (sheet.get(row, col).kind === 'number') return { row, col };
  }
  return undefined;
}

/**
 * The first numeric cell (row-major) starts the data region; the header band is
 * the fixed-size strip right before it, clipped to the occupied rectangle.
 * A sheet without numbers is all data.
 */
export function detectDataOffset(sheet: Sheet, size: HeaderSize = DEFAULT_HEADER_SIZE): OffsetTuple {
  const { minRow, minCol } = sheet.bounds;
  const first = findFirstNumber(sheet);
  if (!first) {
    return { headerRowStart: minRow, headerColStart: minCol, dataRowStart: minRow, dataColStart: minCol };
  }
  return {
    headerRowStart: Math.max(minRow, first.row - size.headerRows),
    headerColStart: Math.max(minCol, first.col - size.headerCols),
    dataRowStart: first.row,
    dataColStart: first.col,
  };
}

export const isHeaderCell = (offset: OffsetTuple, row: number, col: number) =>
  row < offset.dataRowStart || col < offset.dataColStart;

/** Moves a sensed data address into another sheet's data region. */
export const translateAddress = (from: OffsetTuple, to: OffsetTuple, row: number, col: number) => ({
  row: row - from.dataRowStart + to.dataRowStart,
  col: col - from.dataColStart + to.dataColStart,
});
