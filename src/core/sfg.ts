/**
 * Ternary arithmetic unit modelled on sum-frequency generation (SFG).
 *
 * Two input trits arrive as wavelengths from a lane's triplet; the mixer
 * emits light at 1/λout = 1/λa + 1/λb and a detector bins that output into
 * a result class. The classification depends only on a + b, so the unit is
 * commutative by construction. (−1,+1) and (0,0) both land in the ZERO bin:
 * λ0 is the harmonic mean of λ−1 and λ+1, so one detector resolves both.
 *
 * Words are added by rippling the unit across trits with a carry. MUL and
 * DIV have no native primitive; they decompose into ADD/SUB sub-cycles.
 */
import { WDM_TRIPLETS } from './constants';
import { Word, negateTrit } from './word';
import type { Trit, TritSum, WavelengthTriplet } from './types';

export const ArithOp = {
  ADD: 'add',
  SUB: 'sub',
} as const;
export type ArithOp = typeof ArithOp[keyof typeof ArithOp];

export const ResultClass = {
  OVERFLOW_NEG: 'overflow_neg',
  NEG: 'neg',
  ZERO: 'zero',
  POS: 'pos',
  OVERFLOW_POS: 'overflow_pos',
} as const;
export type ResultClass = typeof ResultClass[keyof typeof ResultClass];

// Truth table indexed by a + b + 2
const CLASS_BY_SUM: readonly ResultClass[] = [
  ResultClass.OVERFLOW_NEG,
  ResultClass.NEG,
  ResultClass.ZERO,
  ResultClass.POS,
  ResultClass.OVERFLOW_POS,
];

const SUM_OF_CLASS: Record<ResultClass, TritSum> = {
  overflow_neg: -2,
  neg: -1,
  zero: 0,
  pos: 1,
  overflow_pos: 2,
};

// Input pair whose SFG output defines each class's detector label
const CANONICAL_PAIR: Record<ResultClass, readonly [Trit, Trit]> = {
  overflow_neg: [-1, -1],
  neg: [-1, 0],
  zero: [0, 0],
  pos: [0, 1],
  overflow_pos: [1, 1],
};

export const DEFAULT_TRIPLET: WavelengthTriplet = WDM_TRIPLETS[0];

export interface SfgResult {
  resultClass: ResultClass;
  sum: TritSum;
  /** Detector label: SFG output wavelength in nm */
  label: number;
  overflow: boolean;
}

export function inputWavelength(t: Trit, triplet: WavelengthTriplet): number {
  if (t === 0) return triplet.zero;
  return t === 1 ? triplet.pos : triplet.neg;
}

/** 1/λout = 1/λa + 1/λb */
export function sfgWavelength(a: number, b: number): number {
  return (a * b) / (a + b);
}

export function classLabel(resultClass: ResultClass, triplet: WavelengthTriplet = DEFAULT_TRIPLET): number {
  const [a, b] = CANONICAL_PAIR[resultClass];
  return Math.round(sfgWavelength(inputWavelength(a, triplet), inputWavelength(b, triplet)));
}

/** All five detector labels of a lane, most negative class first. */
export function laneLabels(triplet: WavelengthTriplet): number[] {
  return CLASS_BY_SUM.map(c => classLabel(c, triplet));
}

/** Raw SFG output for the actual input pair, rounded to the detector's 1 nm bin. */
export function physicalLabel(a: Trit, b: Trit, triplet: WavelengthTriplet = DEFAULT_TRIPLET): number {
  return Math.round(sfgWavelength(inputWavelength(a, triplet), inputWavelength(b, triplet)));
}

export function classify(a: Trit, b: Trit, op: ArithOp = ArithOp.ADD): ResultClass {
  const rhs = op === ArithOp.SUB ? negateTrit(b) : b;
  return CLASS_BY_SUM[a + rhs + 2];
}

export function combine(
  a: Trit,
  b: Trit,
  op: ArithOp = ArithOp.ADD,
  triplet: WavelengthTriplet = DEFAULT_TRIPLET,
): SfgResult {
  const resultClass = classify(a, b, op);
  return {
    resultClass,
    sum: SUM_OF_CLASS[resultClass],
    label: classLabel(resultClass, triplet),
    overflow: resultClass === ResultClass.OVERFLOW_NEG || resultClass === ResultClass.OVERFLOW_POS,
  };
}

/** Trit product used by the PEs in log-domain mode. */
export function multiplyTrits(a: Trit, b: Trit): Trit {
  if (a === 0 || b === 0) return 0;
  return a === b ? 1 : -1;
}

// ============================================================================
// Word arithmetic
// ============================================================================

export interface WordResult {
  value: Word;
  /** Carry out of the top trit, reported rather than dropped */
  overflow: ResultClass | null;
}

// Split −3..3 into (digit, carry) with digit in −1..1
function splitDigit(total: number): [Trit, Trit] {
  switch (total) {
    case -3: return [0, -1];
    case -2: return [1, -1];
    case -1: return [-1, 0];
    case 0: return [0, 0];
    case 1: return [1, 0];
    case 2: return [-1, 1];
    case 3: return [0, 1];
    default: throw new RangeError(`Digit total ${total} out of range`);
  }
}

export function addWords(a: Word, b: Word, op: ArithOp = ArithOp.ADD): WordResult {
  const width = Math.max(a.width, b.width);
  const out: Trit[] = [];
  let carry: Trit = 0;
  for (let i = 0; i < width; i++) {
    const { sum } = combine(a.trit(i), b.trit(i), op);
    const [digit, next] = splitDigit(sum + carry);
    out.push(digit);
    carry = next;
  }
  let overflow: ResultClass | null = null;
  if (carry !== 0) overflow = carry > 0 ? ResultClass.OVERFLOW_POS : ResultClass.OVERFLOW_NEG;
  return { value: Word.fromTrits(out, width), overflow };
}

/** Shift toward the most significant end; reports trits pushed out. */
function shiftUp(w: Word, places: number): { value: Word; lost: boolean } {
  const out: Trit[] = new Array<Trit>(w.width).fill(0);
  let lost = false;
  for (let i = 0; i < w.width; i++) {
    const t = w.trit(i);
    if (i + places < w.width) out[i + places] = t;
    else if (t !== 0) lost = true;
  }
  return { value: Word.fromTrits(out, w.width), lost };
}

/** Shift-and-add: one ADD or SUB of the shifted multiplicand per non-zero trit. */
export function mulWords(a: Word, b: Word): WordResult {
  const width = Math.max(a.width, b.width);
  const multiplicand = a.resize(width);
  let acc = Word.zero(width);
  let overflowed = false;
  for (let i = 0; i < width; i++) {
    const t = b.trit(i);
    if (t === 0) continue;
    const shifted = shiftUp(multiplicand, i);
    const step = addWords(acc, shifted.value, t > 0 ? ArithOp.ADD : ArithOp.SUB);
    acc = step.value;
    if (shifted.lost || step.overflow !== null) overflowed = true;
  }
  let overflow: ResultClass | null = null;
  if (overflowed) {
    overflow = a.sign() === b.sign() ? ResultClass.OVERFLOW_POS : ResultClass.OVERFLOW_NEG;
  }
  return { value: acc, overflow };
}

export interface DivResult {
  quotient: Word;
  remainder: Word;
}

/**
 * Long division on magnitudes: at each place, from the top, SUB the shifted
 * divisor while the running remainder stays non-negative.
 * Quotient truncates toward zero; the remainder takes the dividend's sign.
 * Returns null for a zero divisor.
 */
export function divWords(a: Word, b: Word): DivResult | null {
  if (b.isZero()) return null;
  const width = Math.max(a.width, b.width);
  const dividend = a.resize(width);
  const divisor = b.resize(width);
  const magnitude = divisor.sign() < 0 ? divisor.negate() : divisor;
  let rem = dividend.sign() < 0 ? dividend.negate() : dividend;
  let q = Word.zero(width);
  for (let i = width - 1; i >= 0; i--) {
    const shifted = shiftUp(magnitude, i);
    // Trits pushed out mean the shifted divisor exceeds any remainder
    if (shifted.lost) continue;
    const place = Word.zero(width).withTrit(i, 1);
    let diff = addWords(rem, shifted.value, ArithOp.SUB).value;
    while (diff.sign() >= 0) {
      rem = diff;
      q = addWords(q, place).value;
      diff = addWords(rem, shifted.value, ArithOp.SUB).value;
    }
  }
  return {
    quotient: dividend.sign() !== divisor.sign() ? q.negate() : q,
    remainder: dividend.sign() < 0 ? rem.negate() : rem,
  };
}
