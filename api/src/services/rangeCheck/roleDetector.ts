import type { Workbook, Sheet } from '../../lib/grid';
import type { Role, RoleKeywords, RoleMapping } from './types';

export const RESULT_SHEET_NAME = 'Result';

// Sheet names are case-insensitive in spreadsheet files
export const isResultSheet = (name: string) => name.toLowerCase() === RESULT_SHEET_NAME.toLowerCase();

export const DEFAULT_ROLE_KEYWORDS: RoleKeywords = {
  upper: ['max', 'maximum'],
  lower: ['min', 'minimum'],
  midband: ['midband'],
  sensed: ['sensed value', 'room'],
};

// Order in which a sheet is tested against the roles
const ROLE_ORDER: Role[] = ['upper', 'lower', 'midband', 'sensed'];

const CONTENT_SCAN_SIZE = 10;

const mentionsAny = (text: string, keywords: string[]) => {
  const lower = text.toLowerCase();
  return keywords.some(keyword => lower.includes(keyword.toLowerCase()));
};

function headerBlockMentions(sheet: Sheet, keywords: string[]): boolean {
  for (let r = 1; r <= CONTENT_SCAN_SIZE; r += 1) {
    for (let c = 1; c <= CONTENT_SCAN_SIZE; c += 1) {
      const cell = sheet.get(r, c);
      if (cell.kind === 'text' && mentionsAny(cell.value, keywords)) return true;
    }
  }
  return false;
}

/**
 * Assigns sheets to roles, first by sheet title and then by the text of the
 * top-left 10x10 block. Earlier sheets win and a sheet holds at most one role.
 */
export function detectRoles(workbook: Workbook, keywords: RoleKeywords = DEFAULT_ROLE_KEYWORDS): RoleMapping {
  const detected: Record<Role, string | undefined> = {
    sensed: undefined,
    lower: undefined,
    upper: undefined,
    midband: undefined,
  };
  const claimed = new Set<string>();
  const candidates = workbook.sheets.filter(sheet => !isResultSheet(sheet.name));

  for (const sheet of candidates) {
    const role = ROLE_ORDER.find(r => detected[r] === undefined && mentionsAny(sheet.name, keywords[r]));
    if (!role) continue;
    detected[role] = sheet.name;
    claimed.add(sheet.name);
  }

  for (const role of ROLE_ORDER) {
    if (detected[role] !== undefined) continue;
    const match = candidates.find(sheet => !claimed.has(sheet.name) && headerBlockMentions(sheet, keywords[role]));
    if (!match) continue;
    detected[role] = match.name;
    claimed.add(match.name);
  }

  return Object.freeze(detected);
}

export function missingRoles(mapping: RoleMapping, roles: readonly Role[]): Role[] {
  return roles.filter(role => mapping[role] === undefined);
}
