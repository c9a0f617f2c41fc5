import { describe, it, expect } from 'vitest';
import {
  ArithOp, ResultClass, combine, classify, laneLabels, physicalLabel,
  sfgWavelength, multiplyTrits, addWords, mulWords, divWords,
} from './sfg';
import { WDM_TRIPLETS } from './constants';
import { Word } from './word';
import type { Trit } from './types';

const TRITS: Trit[] = [-1, 0, 1];

describe('SFG truth table', () => {
  it('is commutative', () => {
    for (const a of TRITS) {
      for (const b of TRITS) {
        expect(combine(a, b)).toEqual(combine(b, a));
      }
    }
  });

  it('classifies by the sum of the inputs', () => {
    expect(combine(-1, -1)).toEqual({ resultClass: ResultClass.OVERFLOW_NEG, sum: -2, label: 520, overflow: true });
    expect(combine(-1, 0)).toEqual({ resultClass: ResultClass.NEG, sum: -1, label: 515, overflow: false });
    expect(combine(0, 0)).toEqual({ resultClass: ResultClass.ZERO, sum: 0, label: 510, overflow: false });
    expect(combine(0, 1)).toEqual({ resultClass: ResultClass.POS, sum: 1, label: 505, overflow: false });
    expect(combine(1, 1)).toEqual({ resultClass: ResultClass.OVERFLOW_POS, sum: 2, label: 500, overflow: true });
  });

  it('lands (-1,+1) and (0,0) on the same detector', () => {
    expect(combine(-1, 1).label).toBe(combine(0, 0).label);
    expect(physicalLabel(-1, 1)).toBe(510);
    expect(physicalLabel(0, 0)).toBe(510);
  });

  it('subtracts through the same table', () => {
    expect(classify(1, 1, ArithOp.SUB)).toBe(ResultClass.ZERO);
    expect(classify(-1, 1, ArithOp.SUB)).toBe(ResultClass.OVERFLOW_NEG);
    expect(classify(1, -1, ArithOp.SUB)).toBe(ResultClass.OVERFLOW_POS);
    expect(classify(0, 1, ArithOp.SUB)).toBe(ResultClass.NEG);
  });

  it('labels each lane 5 nm apart', () => {
    expect(laneLabels(WDM_TRIPLETS[0])).toEqual([520, 515, 510, 505, 500]);
    expect(laneLabels(WDM_TRIPLETS[1])).toEqual([550, 545, 540, 535, 530]);
    expect(combine(1, 1, ArithOp.ADD, WDM_TRIPLETS[5]).label).toBe(650);
  });

  it('mixes wavelengths by reciprocal sum', () => {
    expect(sfgWavelength(1000, 1000)).toBe(500);
  });

  it('multiplies trits by sign', () => {
    expect(multiplyTrits(-1, -1)).toBe(1);
    expect(multiplyTrits(1, -1)).toBe(-1);
    expect(multiplyTrits(0, 1)).toBe(0);
    expect(Object.is(multiplyTrits(0, -1), 0)).toBe(true);
  });
});

describe('word arithmetic', () => {
  const w = (n: number, width = 4) => Word.fromNumber(n, width);

  it('adds with ripple carry', () => {
    const r = addWords(w(5), w(3));
    expect(r.value.toNumber()).toBe(8);
    expect(r.overflow).toBeNull();
  });

  it('reports a carry out of the top trit', () => {
    const r = addWords(w(40), w(1));
    expect(r.overflow).toBe(ResultClass.OVERFLOW_POS);
    expect(r.value.toNumber()).toBe(-40);
    expect(addWords(w(-40), w(-1)).overflow).toBe(ResultClass.OVERFLOW_NEG);
  });

  it('subtracts', () => {
    expect(addWords(w(3), w(5), ArithOp.SUB).value.toNumber()).toBe(-2);
  });

  it('multiplies by shift and add', () => {
    const r = mulWords(w(6, 5), w(-7, 5));
    expect(r.value.toNumber()).toBe(-42);
    expect(r.overflow).toBeNull();
    expect(mulWords(w(20), w(20)).overflow).toBe(ResultClass.OVERFLOW_POS);
    expect(mulWords(w(20), w(-20)).overflow).toBe(ResultClass.OVERFLOW_NEG);
  });

  it('divides with truncation toward zero', () => {
    const q = (a: number, b: number) => {
      const r = divWords(w(a), w(b));
      return r === null ? null : [r.quotient.toNumber(), r.remainder.toNumber()];
    };
    expect(q(17, 5)).toEqual([3, 2]);
    expect(q(-17, 5)).toEqual([-3, -2]);
    expect(q(17, -5)).toEqual([-3, 2]);
    expect(q(4, 5)).toEqual([0, 4]);
    expect(q(1, 0)).toBeNull();
  });

  it('divides across signs and widths', () => {
    const q = (a: Word, b: Word) => {
      const r = divWords(a, b);
      return r === null ? null : [r.quotient.toNumber(), r.remainder.toNumber(), r.quotient.width];
    };
    expect(q(w(-17), w(-5))).toEqual([3, -2, 4]);
    expect(q(w(-4), w(5))).toEqual([0, -4, 4]);
    expect(q(w(-40), w(3))).toEqual([-13, -1, 4]);
    expect(q(w(40), w(1))).toEqual([40, 0, 4]);
    expect(q(w(-13), w(13))).toEqual([-1, 0, 4]);
    expect(q(w(0), w(-7))).toEqual([0, 0, 4]);
    expect(q(w(100, 6), w(-7, 3))).toEqual([-14, 2, 6]);
    expect(q(w(-1), w(0))).toBeNull();
  });
});
