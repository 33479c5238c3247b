import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { Sheet, Workbook, numberCell, textCell } from '../src/lib/grid';
import { MissingRoleError } from '../src/lib/errors';
import { runRangeCheck } from '../src/services/rangeCheck/service';

// Sensed data starts at (4,3); the bound sheets carry the same header layout
const layout = (name: string, value: number | string) =>
  Sheet.fromRows(name, [
    [name, null, 'TS1'],
    ['Level 1', null, 'Zone A'],
    ['Date', 'Hour', 'degC'],
    ['2024-01-01', '08:00', value],
  ]);

const workbookWith = (sensed: number, lower: number | string = 20, upper = 25, extra: Sheet[] = []) =>
  new Workbook([layout('Room Sensed Value', sensed), layout('Min', lower), layout('Max', upper), ...extra]);

describe('runRangeCheck', () => {
  it('classifies the sensed cell against the aligned bounds', () => {
    expect(runRangeCheck(workbookWith(18)).result.sheet.get(4, 3)).toEqual(textCell('low: -2.0'));
    expect(runRangeCheck(workbookWith(30)).result.sheet.get(4, 3)).toEqual(textCell('high: 5.0'));

    const ok = runRangeCheck(workbookWith(22));
    expect(ok.result.sheet.get(4, 3)).toEqual(textCell('ok'));
    expect(ok.result.categories.get('4:3')).toBe('ok');
  });

  it('aligns bound sheets whose data starts elsewhere', () => {
    const lower = Sheet.fromRows('Minimum', [['TS1'], [20]], { row: 1, col: 1 });
    const upper = Sheet.fromRows('Maximum', [['x', 'TS1'], [null, 25]], { row: 5, col: 5 });
    const workbook = new Workbook([layout('Room', 30), lower, upper]);
    const outcome = runRangeCheck(workbook);
    expect(outcome.alignment).toEqual({
      kind: 'offset',
      sensed: { headerRowStart: 1, headerColStart: 1, dataRowStart: 4, dataColStart: 3 },
      lower: { headerRowStart: 1, headerColStart: 1, dataRowStart: 2, dataColStart: 1 },
      upper: { headerRowStart: 5, headerColStart: 5, dataRowStart: 6, dataColStart: 6 },
    });
    expect(outcome.result.sheet.get(4, 3)).toEqual(textCell('high: 5.0'));
  });

  it('passes the sensed value through when the bound is text', () => {
    const outcome = runRangeCheck(workbookWith(22, 'pending'));
    // the Min sheet has no number, so its whole rectangle is data from (1,1)
    expect(outcome.alignment.kind).toBe('offset');
    expect(outcome.result.sheet.get(4, 3)).toEqual(numberCell(22));
    expect(outcome.result.categories.size).toBe(0);
  });

  it('appends a Result sheet after the input sheets', () => {
    const outcome = runRangeCheck(workbookWith(22));
    expect(outcome.workbook.sheetNames).toEqual(['Room Sensed Value', 'Min', 'Max', 'Result']);
    expect(outcome.workbook.getSheet('Result')).toBe(outcome.result.sheet);
  });

  it('replaces an existing Result sheet', () => {
    const stale = Sheet.fromRows('Result', [['old']]);
    const workbook = new Workbook([stale, layout('Room', 22), layout('Min', 20), layout('Max', 25)]);
    const outcome = runRangeCheck(workbook);
    expect(outcome.workbook.sheetNames).toEqual(['Room', 'Min', 'Max', 'Result']);
    expect(outcome.workbook.getSheet('Result')?.get(1, 1)).toEqual(textCell('Room'));
    expect(outcome.diagnostics.map(d => d.code)).toContain('RESULT_REPLACED');
  });

  it('warns when the midband sheet is missing', () => {
    const outcome = runRangeCheck(workbookWith(22));
    expect(outcome.roles.midband).toBeUndefined();
    expect(outcome.diagnostics).toEqual([
      { level: 'warning', code: 'MIDBAND_MISSING', message: "Sheet for 'Midband' not found. It will be ignored." },
    ]);
  });

  it('detects but does not use the midband sheet', () => {
    const midband = layout('Midband', 100);
    const outcome = runRangeCheck(workbookWith(22, 20, 25, [midband]));
    expect(outcome.roles.midband).toBe('Midband');
    expect(outcome.diagnostics).toEqual([]);
    expect(outcome.result.sheet.get(4, 3)).toEqual(textCell('ok'));
  });

  it('fails naming every missing required sheet', () => {
    const workbook = new Workbook([layout('Room', 22), layout('Max', 25)]);
    expect(() => runRangeCheck(workbook)).toThrowError(MissingRoleError);
    try {
      runRangeCheck(workbook);
    } catch (err) {
      expect(err).toBeInstanceOf(MissingRoleError);
      if (!(err instanceof MissingRoleError)) return;
      expect(err.missing).toEqual(['Min']);
      expect(err.message).toBe('The following required sheets are missing: Min');
    }
  });

  it('lists missing roles in Room Data, Min, Max order', () => {
    const workbook = new Workbook([new Sheet('Notes')]);
    expect(() => runRangeCheck(workbook)).toThrowError('The following required sheets are missing: Room Data, Min, Max');
  });

  it('replaces only the overridden role keywords', () => {
    const workbook = new Workbook([layout('Room', 18), layout('Floor limits', 20), layout('Max', 25)]);
    const outcome = runRangeCheck(workbook, { keywords: { lower: ['floor'] } });
    expect(outcome.roles).toEqual({ sensed: 'Room', lower: 'Floor limits', upper: 'Max', midband: undefined });
    expect(outcome.result.sheet.get(4, 3)).toEqual(textCell('low: -2.0'));
  });

  it('no longer finds the default lower sheet once its keywords are overridden', () => {
    const workbook = new Workbook([layout('Room', 18), layout('Min', 20), layout('Max', 25)]);
    expect(() => runRangeCheck(workbook, { keywords: { lower: ['floor'] } })).toThrowError(
      'The following required sheets are missing: Min',
    );
  });

  it('honours a custom header size', () => {
    const outcome = runRangeCheck(workbookWith(22), { headerRows: 1, headerCols: 1 });
    expect(outcome.alignment).toMatchObject({
      kind: 'offset',
      sensed: { headerRowStart: 3, headerColStart: 2, dataRowStart: 4, dataColStart: 3 },
    });
  });

  it('rejects invalid options', () => {
    expect(() => runRangeCheck(workbookWith(22), { headerRows: -1 })).toThrowError(ZodError);
  });

  it('joins by sensor identifier and reports unmatched identifiers', () => {
    const sensed = Sheet.fromRows('Room', [
      ['Date', 'TS1', 'TS9'],
      ['Mon', 26, 10],
    ]);
    const lower = Sheet.fromRows('Min', [['TS1'], [20]]);
    const upper = Sheet.fromRows('Max', [['TS1'], [25]]);
    const outcome = runRangeCheck(new Workbook([sensed, lower, upper]), { strategy: 'identifier', identifierRow: 1 });
    expect(outcome.result.sheet.get(2, 2)).toEqual(textCell('high: 1.0'));
    expect(outcome.result.sheet.get(2, 3)).toEqual(numberCell(10));
    expect(outcome.diagnostics).toContainEqual({
      level: 'warning',
      code: 'IDENTIFIER_UNMATCHED',
      message: 'Sensor TS9 not found in Min, Max; its values are left unclassified.',
    });
  });
});
