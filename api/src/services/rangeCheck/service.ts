import { z } from 'zod';
import { Workbook } from '../../lib/grid';
import { MissingRoleError } from '../../lib/errors';
import { assembleResult } from './assembler';
import { buildIdentifierMap, extractIdentifiers } from './identifierMapper';
import { DEFAULT_HEADER_SIZE, detectDataOffset } from './offsetAligner';
import { DEFAULT_ROLE_KEYWORDS, RESULT_SHEET_NAME, detectRoles, isResultSheet, missingRoles } from './roleDetector';
import { REQUIRED_ROLES, ROLE_LABELS } from './types';
import type { Alignment, Diagnostic, RangeCheckOutcome, RoleKeywords } from './types';

const KeywordListSchema = z.array(z.string().trim().min(1)).min(1);

export const RangeCheckOptionsSchema = z.object({
  strategy: z.enum(['offset', 'identifier']).default('offset'),
  headerRows: z.coerce.number().int().nonnegative().default(DEFAULT_HEADER_SIZE.headerRows),
  headerCols: z.coerce.number().int().nonnegative().default(DEFAULT_HEADER_SIZE.headerCols),
  identifierRow: z.coerce.number().int().positive().default(1),
  keywords: z
    .object({
      sensed: KeywordListSchema.optional(),
      lower: KeywordListSchema.optional(),
      upper: KeywordListSchema.optional(),
      midband: KeywordListSchema.optional(),
    })
    .optional(),
});

export type RangeCheckOptionsInput = z.input<typeof RangeCheckOptionsSchema>;
export type RangeCheckOptions = z.output<typeof RangeCheckOptionsSchema>;

const resolveKeywords = (overrides: RangeCheckOptions['keywords']): RoleKeywords => ({
  sensed: overrides?.sensed ?? DEFAULT_ROLE_KEYWORDS.sensed,
  lower: overrides?.lower ?? DEFAULT_ROLE_KEYWORDS.lower,
  upper: overrides?.upper ?? DEFAULT_ROLE_KEYWORDS.upper,
  midband: overrides?.midband ?? DEFAULT_ROLE_KEYWORDS.midband,
});

function requireSheet(workbook: Workbook, name: string | undefined) {
  const sheet = name === undefined ? undefined : workbook.getSheet(name);
  // detectRoles only returns names taken from this workbook
  if (!sheet) throw new Error(`Sheet "${name ?? ''}" not found in workbook`);
  return sheet;
}

/**
 * Detects the Room Data / Min / Max sheets, classifies every sensed data cell and
 * returns a copy of the workbook whose last sheet is a freshly built "Result".
 * Throws MissingRoleError when a required sheet cannot be found.
 */
export function runRangeCheck(workbook: Workbook, input: RangeCheckOptionsInput = {}): RangeCheckOutcome {
  const options = RangeCheckOptionsSchema.parse(input);
  const diagnostics: Diagnostic[] = [];

  const roles = detectRoles(workbook, resolveKeywords(options.keywords));
  const missing = missingRoles(roles, REQUIRED_ROLES);
  if (missing.length) {
    throw new MissingRoleError(missing.map(role => ROLE_LABELS[role]));
  }
  if (roles.midband === undefined) {
    diagnostics.push({
      level: 'warning',
      code: 'MIDBAND_MISSING',
      message: "Sheet for 'Midband' not found. It will be ignored.",
    });
  }

  const sensed = requireSheet(workbook, roles.sensed);
  const lower = requireSheet(workbook, roles.lower);
  const upper = requireSheet(workbook, roles.upper);

  let alignment: Alignment;
  if (options.strategy === 'offset') {
    const size = { headerRows: options.headerRows, headerCols: options.headerCols };
    alignment = {
      kind: 'offset',
      sensed: detectDataOffset(sensed, size),
      lower: detectDataOffset(lower, size),
      upper: detectDataOffset(upper, size),
    };
  } else {
    const headerRow = options.identifierRow;
    const sensedIds = extractIdentifiers(sensed, headerRow);
    const lowerMap = buildIdentifierMap(lower, headerRow);
    const upperMap = buildIdentifierMap(upper, headerRow);
    alignment = { kind: 'identifier', headerRow, sensed: sensedIds, lower: lowerMap, upper: upperMap };

    new Set(sensedIds.values()).forEach(id => {
      const absentFrom = [
        lowerMap.has(id) ? undefined : lower.name,
        upperMap.has(id) ? undefined : upper.name,
      ].filter((name): name is string => name !== undefined);
      if (!absentFrom.length) return;
      diagnostics.push({
        level: 'warning',
        code: 'IDENTIFIER_UNMATCHED',
        message: `Sensor ${id} not found in ${absentFrom.join(', ')}; its values are left unclassified.`,
      });
    });
  }

  const result = assembleResult(sensed, { lower, upper }, alignment);

  const kept = workbook.sheets.filter(sheet => !isResultSheet(sheet.name));
  if (kept.length < workbook.sheets.length) {
    diagnostics.push({
      level: 'info',
      code: 'RESULT_REPLACED',
      message: `Existing "${RESULT_SHEET_NAME}" sheet was replaced.`,
    });
  }
  const output = new Workbook(kept);
  output.addSheet(result.sheet);

  return { workbook: output, result, roles, alignment, diagnostics };
}
