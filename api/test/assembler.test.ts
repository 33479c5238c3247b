import { describe, expect, it } from 'vitest';
import { Sheet, numberCell, textCell } from '../src/lib/grid';
import { assembleResult } from '../src/services/rangeCheck/assembler';
import { buildIdentifierMap, extractIdentifiers } from '../src/services/rangeCheck/identifierMapper';
import { detectDataOffset } from '../src/services/rangeCheck/offsetAligner';
import type { Alignment } from '../src/services/rangeCheck/types';

// 3 header rows, 2 header columns, data from (4,3)
const sensedSheet = (values: Array<number | string>) =>
  Sheet.fromRows('Room Data', [
    ['Building', 'North', 'Sensor A', 'Sensor B'],
    ['Floor', '1', 'TS1', 'TS2'],
    ['Date', 'Time', 'degC', 'degC'],
    ['2024-01-01', '08:00', ...values],
  ]);

// 1 header row, 1 header column, data from (2,2)
const boundSheet = (name: string, values: Array<number | string>) =>
  Sheet.fromRows(name, [
    ['Date', 'TS1', 'TS2'],
    ['2024-01-01', ...values],
  ]);

const offsetAlignment = (sensed: Sheet, lower: Sheet, upper: Sheet): Alignment => ({
  kind: 'offset',
  sensed: detectDataOffset(sensed),
  lower: detectDataOffset(lower),
  upper: detectDataOffset(upper),
});

describe('assembleResult (offset alignment)', () => {
  const lower = boundSheet('Min', [20, 20]);
  const upper = boundSheet('Max', [25, 25]);

  it('classifies a low reading', () => {
    const sensed = sensedSheet([18, 22]);
    const result = assembleResult(sensed, { lower, upper }, offsetAlignment(sensed, lower, upper));
    expect(result.sheet.get(4, 3)).toEqual(textCell('low: -2.0'));
    expect(result.categories.get('4:3')).toBe('low');
  });

  it('classifies high and ok readings', () => {
    const sensed = sensedSheet([30, 22]);
    const result = assembleResult(sensed, { lower, upper }, offsetAlignment(sensed, lower, upper));
    expect(result.sheet.get(4, 3)).toEqual(textCell('high: 5.0'));
    expect(result.categories.get('4:3')).toBe('high');
    expect(result.sheet.get(4, 4)).toEqual(textCell('ok'));
    expect(result.categories.get('4:4')).toBe('ok');
  });

  it('passes the sensed value through when the aligned bound is text', () => {
    const textLower = boundSheet('Min', ['n/a', 20]);
    const sensed = sensedSheet([22, 22]);
    // pin the lower data start to (2,2) so that (4,3) lands on the text cell
    const alignment: Alignment = {
      kind: 'offset',
      sensed: detectDataOffset(sensed),
      lower: { headerRowStart: 1, headerColStart: 1, dataRowStart: 2, dataColStart: 2 },
      upper: detectDataOffset(upper),
    };
    const result = assembleResult(sensed, { lower: textLower, upper }, alignment);
    expect(result.sheet.get(4, 3)).toEqual(numberCell(22));
    expect(result.categories.has('4:3')).toBe(false);
    expect(result.sheet.get(4, 4)).toEqual(textCell('ok'));
    expect(result.summary).toEqual({ header: 14, low: 0, high: 0, ok: 1, unclassified: 1 });
  });

  it('copies the header band verbatim without categories', () => {
    const sensed = sensedSheet([18, 30]);
    const result = assembleResult(sensed, { lower, upper }, offsetAlignment(sensed, lower, upper));
    for (let r = 1; r <= 3; r += 1) {
      for (let c = 1; c <= 4; c += 1) {
        expect(result.sheet.get(r, c)).toEqual(sensed.get(r, c));
        expect(result.categories.has(`${r}:${c}`)).toBe(false);
      }
    }
    expect(result.sheet.get(4, 1)).toEqual(textCell('2024-01-01'));
    expect(result.sheet.name).toBe('Result');
    expect(result.sheet.bounds).toEqual(sensed.bounds);
  });

  it('leaves cells unclassified when the bound sheet is smaller', () => {
    const shortLower = boundSheet('Min', [20]);
    const sensed = sensedSheet([22, 22]);
    const result = assembleResult(
      sensed,
      { lower: shortLower, upper },
      offsetAlignment(sensed, shortLower, upper),
    );
    expect(result.sheet.get(4, 3)).toEqual(textCell('ok'));
    expect(result.sheet.get(4, 4)).toEqual(numberCell(22));
  });
});

describe('assembleResult (identifier alignment)', () => {
  // identifiers on row 1, bound columns in a different order than the sensed sheet
  const sensed = Sheet.fromRows('Room', [
    ['Date', 'Probe TS1', 'Probe TS2', 'Probe TS3', 'Comment'],
    ['Mon', 18, 23, 30, 'fine'],
    ['Tue', 21, 26, 30, 'fine'],
  ]);
  const lower = Sheet.fromRows('Min', [
    ['TS2', 'TS1'],
    [20, 20],
    [20, 20],
  ]);
  const upper = Sheet.fromRows('Max', [
    ['TS1', 'TS2'],
    [25, 25],
    [25, 25],
  ]);
  const alignment: Alignment = {
    kind: 'identifier',
    headerRow: 1,
    sensed: extractIdentifiers(sensed, 1),
    lower: buildIdentifierMap(lower, 1),
    upper: buildIdentifierMap(upper, 1),
  };
  const result = assembleResult(sensed, { lower, upper }, alignment);

  it('joins columns by sensor identifier on the same row', () => {
    expect(result.sheet.get(2, 2)).toEqual(textCell('low: -2.0'));
    expect(result.sheet.get(2, 3)).toEqual(textCell('ok'));
    expect(result.sheet.get(3, 2)).toEqual(textCell('ok'));
    expect(result.sheet.get(3, 3)).toEqual(textCell('high: 1.0'));
  });

  it('passes values through when the identifier is missing from a bound sheet', () => {
    expect(result.sheet.get(2, 4)).toEqual(numberCell(30));
    expect(result.categories.has('2:4')).toBe(false);
  });

  it('passes values through for columns without an identifier', () => {
    expect(result.sheet.get(2, 1)).toEqual(textCell('Mon'));
    expect(result.sheet.get(2, 5)).toEqual(textCell('fine'));
  });

  it('copies the identifier row as header', () => {
    expect(result.sheet.get(1, 2)).toEqual(textCell('Probe TS1'));
    expect(result.summary).toEqual({ header: 5, low: 1, high: 1, ok: 2, unclassified: 6 });
  });
});
