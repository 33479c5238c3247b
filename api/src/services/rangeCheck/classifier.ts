import type { CellValue } from '../../lib/grid';
import type { Verdict, VisualCategory } from './types';

// x * 100 lands exactly on .5 only when x is an odd multiple of 1/8
const isExactTie = (value: number) => Number.isInteger(value * 8) && Math.abs(value * 8) % 2 === 1;

/**
 * Two-decimal rounding of the exact binary value; exact ties go to the even
 * neighbour (0.125 -> 0.12, 0.375 -> 0.38). Never returns -0.
 */
export function round2(value: number): number {
  let rounded: number;
  if (isExactTie(value)) {
    const floor = Math.floor(value * 100);
    rounded = (floor % 2 === 0 ? floor : floor + 1) / 100;
  } else {
    // toFixed rounds the exact value, so only ties need the branch above
    rounded = Number(value.toFixed(2));
  }
  return rounded === 0 ? 0 : rounded;
}

export function classify(sensed: CellValue, lower: CellValue, upper: CellValue): Verdict {
  if (sensed.kind !== 'number' || lower.kind !== 'number' || upper.kind !== 'number') {
    return { kind: 'unclassified', original: sensed };
  }
  if (sensed.value <= lower.value) {
    return { kind: 'low', delta: round2(sensed.value - lower.value) };
  }
  if (sensed.value >= upper.value) {
    return { kind: 'high', delta: round2(sensed.value - upper.value) };
  }
  return { kind: 'ok' };
}

// Whole deltas keep one decimal: -2 -> "-2.0"
export const formatDelta = (delta: number) => (Number.isInteger(delta) ? delta.toFixed(1) : String(delta));

export function renderVerdict(verdict: Verdict): CellValue {
  switch (verdict.kind) {
    case 'low':
      return { kind: 'text', value: `low: ${formatDelta(verdict.delta)}` };
    case 'high':
      return { kind: 'text', value: `high: ${formatDelta(verdict.delta)}` };
    case 'ok':
      return { kind: 'text', value: 'ok' };
    case 'unclassified':
      return verdict.original;
  }
}

export function verdictCategory(verdict: Verdict): VisualCategory | undefined {
  return verdict.kind === 'unclassified' ? undefined : verdict.kind;
}
