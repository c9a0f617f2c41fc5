/**
 * Trit codecs for host I/O: fixed-point floats in [-1, 1] and a packed
 * byte form (5 trits per byte, since 3^5 = 243 fits a byte) behind a
 * big-endian 16-bit trit count.
 */
import { toTrit } from './word';
import type { Trit } from './types';

function maxValue(numTrits: number): number {
  return (3 ** numTrits - 1) / 2;
}

/** Clamp to [-1, 1] and encode, most significant trit first. */
export function floatToTrits(value: number, numTrits: number = 9): Trit[] {
  if (!Number.isInteger(numTrits) || numTrits < 1) throw new RangeError(`Invalid trit count ${numTrits}`);
  if (Number.isNaN(value)) throw new RangeError('Cannot encode NaN');
  const clamped = Math.max(-1, Math.min(1, value));
  let remaining = Math.round(clamped * maxValue(numTrits));
  const trits: Trit[] = [];
  for (let i = 0; i < numTrits; i++) {
    const rem = ((remaining % 3) + 3) % 3;
    const t: Trit = rem === 0 ? 0 : rem === 1 ? 1 : -1;
    trits.push(t);
    remaining = (remaining - t) / 3;
  }
  return trits.reverse();
}

/** Inverse of floatToTrits. */
export function tritsToFloat(trits: readonly number[]): number {
  if (trits.length === 0) return 0;
  let value = 0;
  for (const t of trits) value = value * 3 + toTrit(t);
  return value === 0 ? 0 : value / maxValue(trits.length);
}

export function packTrits(trits: readonly number[]): Uint8Array {
  if (trits.length > 0xFFFF) throw new RangeError(`Too many trits to pack: ${trits.length}`);
  const groups = Math.ceil(trits.length / 5);
  const out = new Uint8Array(2 + groups);
  out[0] = (trits.length >> 8) & 0xFF;
  out[1] = trits.length & 0xFF;
  for (let g = 0; g < groups; g++) {
    let packed = 0;
    for (let k = 0; k < 5; k++) {
      const i = g * 5 + k;
      const t = i < trits.length ? toTrit(trits[i]) : 0;
      packed = packed * 3 + (t + 1);
    }
    out[2 + g] = packed;
  }
  return out;
}

export function unpackTrits(data: Uint8Array): Trit[] {
  if (data.length < 2) return [];
  const length = (data[0] << 8) | data[1];
  const trits: Trit[] = [];
  for (let b = 2; b < data.length && trits.length < length; b++) {
    let remaining = data[b];
    if (remaining >= 243) throw new RangeError(`Byte ${b} (${remaining}) is not a packed trit group`);
    const chunk: Trit[] = [];
    for (let k = 0; k < 5; k++) {
      chunk.push(toTrit((remaining % 3) - 1));
      remaining = Math.floor(remaining / 3);
    }
    trits.push(...chunk.reverse());
  }
  if (trits.length < length) throw new RangeError(`Packed data holds ${trits.length} trits, header says ${length}`);
  return trits.slice(0, length);
}
