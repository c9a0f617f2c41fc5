import { describe, it, expect } from 'vitest';
import { Word, toTrit, isTrit, negateTrit, maxMagnitude } from './word';

describe('trits', () => {
  it('accepts only -1, 0 and +1', () => {
    expect(isTrit(-1)).toBe(true);
    expect(isTrit(0)).toBe(true);
    expect(isTrit(1)).toBe(true);
    expect(isTrit(2)).toBe(false);
    expect(isTrit(0.5)).toBe(false);
    expect(() => toTrit(2)).toThrow(RangeError);
    expect(() => toTrit(-2)).toThrow(RangeError);
  });

  it('normalises negative zero', () => {
    expect(Object.is(toTrit(-0), 0)).toBe(true);
    expect(Object.is(negateTrit(0), 0)).toBe(true);
  });

  it('computes the largest magnitude of a width', () => {
    expect(maxMagnitude(1)).toBe(1n);
    expect(maxMagnitude(4)).toBe(40n);
  });
});

describe('Word', () => {
  it('converts numbers to balanced ternary', () => {
    const five = Word.fromNumber(5, 4);
    expect(five.trits).toEqual([-1, -1, 1, 0]);
    expect(five.toString()).toBe('+--');
    expect(five.toBigInt()).toBe(5n);
    expect(Word.fromNumber(-5, 4).toString()).toBe('-++');
  });

  it('parses text most significant trit first', () => {
    expect(Word.parse('+0-').toNumber()).toBe(8);
    expect(Word.parse('+0-').width).toBe(3);
    expect(Word.parse('00+', 1).toNumber()).toBe(1);
    expect(() => Word.parse('+x')).toThrow(RangeError);
    expect(() => Word.parse('')).toThrow(RangeError);
    expect(() => Word.parse('++', 1)).toThrow(RangeError);
  });

  it('rejects values that do not fit', () => {
    expect(Word.fromBigInt(40n, 4).toString()).toBe('++++');
    expect(Word.fromBigInt(-40n, 4).toString()).toBe('----');
    expect(() => Word.fromBigInt(41n, 4)).toThrow(RangeError);
    expect(() => Word.fromNumber(1.5)).toThrow(RangeError);
    expect(() => Word.fromTrits([1, 0, 1], 2)).toThrow(RangeError);
  });

  it('renders zero as a single digit', () => {
    const z = Word.zero(3);
    expect(z.toString()).toBe('0');
    expect(z.isZero()).toBe(true);
    expect(z.sign()).toBe(0);
  });

  it('takes its sign from the most significant non-zero trit', () => {
    expect(Word.parse('0+--').sign()).toBe(1);
    expect(Word.parse('-++').sign()).toBe(-1);
  });

  it('negates trit by trit', () => {
    expect(Word.fromNumber(7).negate().toNumber()).toBe(-7);
    expect(Word.zero(2).negate().trits).toEqual([0, 0]);
  });

  it('resizes without losing non-zero trits', () => {
    const one = Word.fromNumber(1, 4);
    expect(one.resize(2).trits).toEqual([1, 0]);
    expect(one.resize(6).width).toBe(6);
    expect(() => Word.fromNumber(9, 4).resize(2)).toThrow(RangeError);
  });

  it('compares across widths', () => {
    expect(Word.fromNumber(4, 3).equals(Word.fromNumber(4, 9))).toBe(true);
    expect(Word.fromNumber(4, 3).equals(Word.fromNumber(-4, 3))).toBe(false);
  });

  it('replaces single trits and reads low trits', () => {
    const w = Word.zero(3).withTrit(1, -1);
    expect(w.toNumber()).toBe(-3);
    expect(w.low(2)).toEqual([0, -1]);
    expect(w.low(5)).toEqual([0, -1, 0, 0, 0]);
    expect(() => w.withTrit(3, 1)).toThrow(RangeError);
  });

  it('keeps its trits frozen', () => {
    expect(Object.isFrozen(Word.fromNumber(3).trits)).toBe(true);
  });
});
