/**
 * Immutable balanced-ternary word.
 * Trit 0 is the least significant; text form is most significant first
 * using '+', '0' and '-'.
 */
import type { Trit } from './types';

export const DEFAULT_WORD_TRITS = 81;

export function isTrit(n: number): n is Trit {
  return n === -1 || n === 0 || n === 1;
}

export function toTrit(n: number): Trit {
  // -0 normalises to 0 so it never leaks into a word
  if (Object.is(n, -1)) return -1;
  if (Object.is(n, 0) || Object.is(n, -0)) return 0;
  if (Object.is(n, 1)) return 1;
  throw new RangeError(`Not a trit: ${n}`);
}

export function negateTrit(t: Trit): Trit {
  if (t === 0) return 0;
  return t === 1 ? -1 : 1;
}

function tritChar(t: Trit): string {
  if (t === 0) return '0';
  return t === 1 ? '+' : '-';
}

function charToTrit(ch: string): Trit {
  switch (ch) {
    case '+': return 1;
    case '0': return 0;
    case '-': return -1;
    default: throw new RangeError(`Invalid ternary digit '${ch}'`);
  }
}

/** Largest magnitude representable in `width` trits: (3^width − 1) / 2. */
export function maxMagnitude(width: number): bigint {
  return (3n ** BigInt(width) - 1n) / 2n;
}

export class Word {
  readonly trits: readonly Trit[];

  private constructor(trits: Trit[]) {
    this.trits = Object.freeze(trits);
  }

  static zero(width: number = DEFAULT_WORD_TRITS): Word {
    checkWidth(width);
    return new Word(new Array<Trit>(width).fill(0));
  }

  /** Least significant trit first; missing high trits are zero. */
  static fromTrits(trits: readonly number[], width: number = trits.length): Word {
    checkWidth(width);
    if (trits.length > width) {
      throw new RangeError(`${trits.length} trits do not fit a ${width}-trit word`);
    }
    const out = new Array<Trit>(width).fill(0);
    for (let i = 0; i < trits.length; i++) out[i] = toTrit(trits[i]);
    return new Word(out);
  }

  static fromBigInt(value: bigint, width: number = DEFAULT_WORD_TRITS): Word {
    checkWidth(width);
    const out = new Array<Trit>(width).fill(0);
    let v = value;
    for (let i = 0; i < width && v !== 0n; i++) {
      let r = v % 3n;
      if (r < 0n) r += 3n;
      if (r === 2n) {
        out[i] = -1;
        v = (v + 1n) / 3n;
      } else if (r === 1n) {
        out[i] = 1;
        v = (v - 1n) / 3n;
      } else {
        v = v / 3n;
      }
    }
    if (v !== 0n) throw new RangeError(`${value} does not fit a ${width}-trit word`);
    return new Word(out);
  }

  static fromNumber(value: number, width: number = DEFAULT_WORD_TRITS): Word {
    if (!Number.isSafeInteger(value)) throw new RangeError(`Not a safe integer: ${value}`);
    return Word.fromBigInt(BigInt(value), width);
  }

  /** Parse '+0-' text, most significant trit first. */
  static parse(text: string, width?: number): Word {
    if (text.length === 0) throw new RangeError('Empty ternary literal');
    const trits: Trit[] = [];
    for (let i = text.length - 1; i >= 0; i--) trits.push(charToTrit(text[i]));
    // Leading zeros may exceed the width without loss
    while (width !== undefined && trits.length > width && trits[trits.length - 1] === 0) trits.pop();
    return Word.fromTrits(trits, width ?? trits.length);
  }

  get width(): number {
    return this.trits.length;
  }

  trit(index: number): Trit {
    return index < this.trits.length ? this.trits[index] : 0;
  }

  toBigInt(): bigint {
    let acc = 0n;
    for (let i = this.trits.length - 1; i >= 0; i--) {
      acc = acc * 3n + BigInt(this.trits[i]);
    }
    return acc;
  }

  toNumber(): number {
    const v = this.toBigInt();
    if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new RangeError(`Word value ${v} exceeds the safe integer range`);
    }
    return Number(v);
  }

  /** Sign of the value: the most significant non-zero trit. */
  sign(): Trit {
    for (let i = this.trits.length - 1; i >= 0; i--) {
      if (this.trits[i] !== 0) return this.trits[i];
    }
    return 0;
  }

  isZero(): boolean {
    return this.trits.every(t => t === 0);
  }

  negate(): Word {
    return new Word(this.trits.map(negateTrit));
  }

  withTrit(index: number, t: Trit): Word {
    if (index < 0 || index >= this.trits.length) throw new RangeError(`Trit index ${index} out of range`);
    const copy = [...this.trits];
    copy[index] = t;
    return new Word(copy);
  }

  /** Trits `0..count-1`, zero padded. */
  low(count: number): Trit[] {
    const out: Trit[] = [];
    for (let i = 0; i < count; i++) out.push(this.trit(i));
    return out;
  }

  /** Change width; dropping a non-zero trit is an error. */
  resize(width: number): Word {
    if (width === this.trits.length) return this;
    checkWidth(width);
    for (let i = width; i < this.trits.length; i++) {
      if (this.trits[i] !== 0) throw new RangeError(`Resizing to ${width} trits would drop trit ${i}`);
    }
    return Word.fromTrits(this.trits.slice(0, width), width);
  }

  equals(other: Word): boolean {
    const n = Math.max(this.width, other.width);
    for (let i = 0; i < n; i++) {
      if (this.trit(i) !== other.trit(i)) return false;
    }
    return true;
  }

  toString(): string {
    let end = this.trits.length - 1;
    while (end > 0 && this.trits[end] === 0) end--;
    let s = '';
    for (let i = end; i >= 0; i--) s += tritChar(this.trits[i]);
    return s.length > 0 ? s : '0';
  }
}

function checkWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1) throw new RangeError(`Invalid word width ${width}`);
}
