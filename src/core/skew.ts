/**
 * H-tree clock skew budget.
 *
 * Skew grows with log2 of the PE count, scaled from a measured baseline
 * (729 PEs at 2.4 % of the period). The budget is checked once per
 * configuration; it bounds how large an array the clock can reach.
 */
import { DEFAULT_SKEW_BASELINE, DEFAULT_SKEW_THRESHOLD } from './constants';
import { ConfigurationError } from './errors';
import type { ClockSkewBudget } from './types';

export interface SkewBaseline {
  pes: number;
  fraction: number;
}

/** Skew as a fraction of the clock period. */
export function skew(nPEs: number, baseline: SkewBaseline = DEFAULT_SKEW_BASELINE): number {
  if (!Number.isInteger(nPEs) || nPEs <= 1) {
    throw new ConfigurationError(`PE count must be an integer greater than 1, got ${nPEs}`);
  }
  if (!(baseline.pes > 1) || !(baseline.fraction > 0)) {
    throw new ConfigurationError(`Invalid skew baseline ${baseline.pes} PEs / ${baseline.fraction}`);
  }
  return baseline.fraction * Math.log2(nPEs) / Math.log2(baseline.pes);
}

export function validateSkew(
  nPEs: number,
  threshold: number = DEFAULT_SKEW_THRESHOLD,
  baseline: SkewBaseline = DEFAULT_SKEW_BASELINE,
): ClockSkewBudget {
  const s = skew(nPEs, baseline);
  return { nPEs, skew: s, threshold, pass: s <= threshold };
}

/** Largest PE count whose skew stays within the threshold. */
export function maxArrayPEs(
  threshold: number = DEFAULT_SKEW_THRESHOLD,
  baseline: SkewBaseline = DEFAULT_SKEW_BASELINE,
): number {
  if (skew(2, baseline) > threshold) return 1;
  let n = Math.max(2, Math.floor(baseline.pes ** (threshold / baseline.fraction)));
  // Float error in the power can land one either side of the boundary
  while (n > 2 && skew(n, baseline) > threshold) n--;
  while (skew(n + 1, baseline) <= threshold) n++;
  return n;
}

/** Largest side of a square array within the threshold. */
export function maxSquareSide(
  threshold: number = DEFAULT_SKEW_THRESHOLD,
  baseline: SkewBaseline = DEFAULT_SKEW_BASELINE,
): number {
  let side = Math.floor(Math.sqrt(maxArrayPEs(threshold, baseline)));
  while (skew((side + 1) * (side + 1), baseline) <= threshold) side++;
  while (side > 1 && skew(side * side, baseline) > threshold) side--;
  return side;
}

export function skewPicoseconds(budget: ClockSkewBudget, periodPs: number): number {
  return budget.skew * periodPs;
}
