import { describe, it, expect } from 'vitest';
import { floatToTrits, tritsToFloat, packTrits, unpackTrits } from './codec';

describe('float codec', () => {
  it('encodes most significant trit first', () => {
    expect(floatToTrits(0.25, 5)).toEqual([0, 1, 0, 1, 0]);
    expect(floatToTrits(-0.25, 5)).toEqual([0, -1, 0, -1, 0]);
    expect(floatToTrits(1, 3)).toEqual([1, 1, 1]);
  });

  it('clamps to [-1, 1]', () => {
    expect(floatToTrits(2, 3)).toEqual([1, 1, 1]);
    expect(floatToTrits(-7, 3)).toEqual([-1, -1, -1]);
  });

  it('decodes to the nearest representable value', () => {
    expect(tritsToFloat([0, 1, 0, 1, 0])).toBe(30 / 121);
    expect(tritsToFloat([-1, -1, -1])).toBe(-1);
    expect(tritsToFloat([0, 0, 0])).toBe(0);
    expect(tritsToFloat([])).toBe(0);
  });

  it('rejects NaN and bad widths', () => {
    expect(() => floatToTrits(Number.NaN)).toThrow(RangeError);
    expect(() => floatToTrits(0.5, 0)).toThrow(RangeError);
  });
});

describe('packed codec', () => {
  it('packs five trits per byte behind a length header', () => {
    expect([...packTrits([1, 0, -1, 1, 0])]).toEqual([0, 5, 196]);
    expect([...packTrits([1])]).toEqual([0, 1, 202]);
    expect([...packTrits([])]).toEqual([0, 0]);
  });

  it('unpacks to the original length', () => {
    expect(unpackTrits(Uint8Array.from([0, 5, 196]))).toEqual([1, 0, -1, 1, 0]);
    expect(unpackTrits(Uint8Array.from([0, 1, 202]))).toEqual([1]);
    const trits = [-1, 0, 1, 1, -1, 0, 0, 1];
    expect(unpackTrits(packTrits(trits))).toEqual(trits);
  });

  it('rejects corrupt payloads', () => {
    expect(() => unpackTrits(Uint8Array.from([0, 1, 243]))).toThrow(RangeError);
    expect(() => unpackTrits(Uint8Array.from([0, 6, 196]))).toThrow(RangeError);
  });
});
