// api/src/lib/grid.ts
// In-memory tabular model shared by the reader, the range check core and the writer.

export type CellValue =
  | { kind: 'empty' }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string };

export const EMPTY: CellValue = Object.freeze({ kind: 'empty' });

export const numberCell = (value: number): CellValue => ({ kind: 'number', value });
export const textCell = (value: string): CellValue => (value === '' ? EMPTY : { kind: 'text', value });

export function isNumberCell(cell: CellValue): cell is { kind: 'number'; value: number } {
  return cell.kind === 'number';
}

export interface SheetBounds {
  minRow: number;
  maxRow: number;
  minCol: number;
  maxCol: number;
}

const cellKey = (row: number, col: number) => `${row}:${col}`;

/**
 * A named grid of cells addressed by 1-based (row, column).
 * The bounds describe the occupied rectangle; an empty sheet reports 1..0 on both axes.
 */
export class Sheet {
  readonly name: string;
  private readonly cells = new Map<string, CellValue>();
  private rect: SheetBounds = { minRow: 1, maxRow: 0, minCol: 1, maxCol: 0 };

  constructor(name: string) {
    this.name = name;
  }

  get bounds(): SheetBounds {
    return { ...this.rect };
  }

  get isEmpty(): boolean {
    return this.cells.size === 0;
  }

  get(row: number, col: number): CellValue {
    if (row < 1 || col < 1) return EMPTY;
    return this.cells.get(cellKey(row, col)) ?? EMPTY;
  }

  set(row: number, col: number, value: CellValue): void {
    if (!Number.isInteger(row) || !Number.isInteger(col) || row < 1 || col < 1) {
      throw new RangeError(`Invalid cell address (${row}, ${col}) on sheet "${this.name}"`);
    }
    if (value.kind === 'empty') {
      this.cells.delete(cellKey(row, col));
      return;
    }
    if (this.cells.size === 0) {
      this.rect = { minRow: row, maxRow: row, minCol: col, maxCol: col };
    } else {
      this.rect = {
        minRow: Math.min(this.rect.minRow, row),
        maxRow: Math.max(this.rect.maxRow, row),
        minCol: Math.min(this.rect.minCol, col),
        maxCol: Math.max(this.rect.maxCol, col),
      };
    }
    this.cells.set(cellKey(row, col), value);
  }

  /** Row-major walk over every address of the occupied rectangle, empty cells included. */
  *addresses(): IterableIterator<[number, number]> {
    for (let r = this.rect.minRow; r <= this.rect.maxRow; r += 1) {
      for (let c = this.rect.minCol; c <= this.rect.maxCol; c += 1) {
        yield [r, c];
      }
    }
  }

  /**
   * Builds a sheet from plain rows. `null`, `undefined` and '' are empty cells.
   * `origin` places rows[0][0] somewhere other than A1.
   */
  static fromRows(
    name: string,
    rows: Array<Array<string | number | null | undefined>>,
    origin: { row: number; col: number } = { row: 1, col: 1 },
  ): Sheet {
    const sheet = new Sheet(name);
    rows.forEach((row, r) => {
      row.forEach((value, c) => {
        if (value === null || value === undefined) return;
        sheet.set(origin.row + r, origin.col + c, typeof value === 'number' ? numberCell(value) : textCell(value));
      });
    });
    return sheet;
  }
}

export class Workbook {
  private readonly sheetList: Sheet[] = [];

  constructor(sheets: Sheet[] = []) {
    sheets.forEach(sheet => this.addSheet(sheet));
  }

  get sheets(): readonly Sheet[] {
    return this.sheetList;
  }

  get sheetNames(): string[] {
    return this.sheetList.map(sheet => sheet.name);
  }

  getSheet(name: string): Sheet | undefined {
    return this.sheetList.find(sheet => sheet.name === name);
  }

  hasSheet(name: string): boolean {
    return this.getSheet(name) !== undefined;
  }

  addSheet(sheet: Sheet): Sheet {
    const lower = sheet.name.toLowerCase();
    if (this.sheetList.some(existing => existing.name.toLowerCase() === lower)) {
      throw new Error(`Duplicate sheet name "${sheet.name}"`);
    }
    this.sheetList.push(sheet);
    return sheet;
  }
}
