import type { CellValue, Sheet, Workbook } from '../../lib/grid';

export type Role = 'sensed' | 'lower' | 'upper' | 'midband';

export const REQUIRED_ROLES = ['sensed', 'lower', 'upper'] as const;

// Names shown to the user when a role is missing
export const ROLE_LABELS: Record<Role, string> = {
  sensed: 'Room Data',
  lower: 'Min',
  upper: 'Max',
  midband: 'Midband',
};

export type RoleKeywords = Record<Role, string[]>;

export type RoleMapping = Readonly<Record<Role, string | undefined>>;

export interface OffsetTuple {
  headerRowStart: number;
  headerColStart: number;
  dataRowStart: number;
  dataColStart: number;
}

export interface HeaderSize {
  headerRows: number;
  headerCols: number;
}

/** identifier -> column */
export type IdentifierMap = Map<string, number>;

export type Verdict =
  | { kind: 'low'; delta: number }
  | { kind: 'high'; delta: number }
  | { kind: 'ok' }
  | { kind: 'unclassified'; original: CellValue };

export type VisualCategory = 'low' | 'ok' | 'high';

export type Alignment =
  | { kind: 'offset'; sensed: OffsetTuple; lower: OffsetTuple; upper: OffsetTuple }
  | {
      kind: 'identifier';
      headerRow: number;
      sensed: Map<number, string>;
      lower: IdentifierMap;
      upper: IdentifierMap;
    };

export interface BoundSheets {
  lower: Sheet;
  upper: Sheet;
}

export interface ResultSummary {
  header: number;
  low: number;
  high: number;
  ok: number;
  unclassified: number;
}

export interface ResultGrid {
  sheet: Sheet;
  /** keyed by `${row}:${col}`; cells without an entry carry no fill */
  categories: Map<string, VisualCategory>;
  summary: ResultSummary;
}

export type DiagnosticCode = 'MIDBAND_MISSING' | 'RESULT_REPLACED' | 'IDENTIFIER_UNMATCHED';

export interface Diagnostic {
  level: 'warning' | 'info';
  code: DiagnosticCode;
  message: string;
}

export interface RangeCheckOutcome {
  workbook: Workbook;
  result: ResultGrid;
  roles: RoleMapping;
  alignment: Alignment;
  diagnostics: Diagnostic[];
}

export const categoryKey = (row: number, col: number) => `${row}:${col}`;
