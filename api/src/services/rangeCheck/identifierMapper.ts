import type { Sheet } from '../../lib/grid';
import type { IdentifierMap } from './types';

// Two letters followed by digits, e.g. "TS12" inside "Sensor TS12 (deg C)"
const IDENTIFIER_REGEX = /[A-Za-z]{2}\d+/;

export function extractIdentifier(text: string): string | undefined {
  const match = IDENTIFIER_REGEX.exec(text);
  return match ? match[0].toUpperCase() : undefined;
}

/** column -> identifier for every text cell of `headerRow` that carries one. */
export function extractIdentifiers(sheet: Sheet, headerRow: number): Map<number, string> {
  const columns = new Map<number, string>();
  const { minCol, maxCol } = sheet.bounds;
  for (let c = minCol; c <= maxCol; c += 1) {
    const cell = sheet.get(headerRow, c);
    if (cell.kind !== 'text') continue;
    const id = extractIdentifier(cell.value);
    if (id) columns.set(c, id);
  }
  return columns;
}

/** identifier -> column; when an identifier repeats, the left-most column keeps it. */
export function buildIdentifierMap(sheet: Sheet, headerRow: number): IdentifierMap {
  const map: IdentifierMap = new Map();
  extractIdentifiers(sheet, headerRow).forEach((id, col) => {
    if (!map.has(id)) map.set(id, col);
  });
  return map;
}
