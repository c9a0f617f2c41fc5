/**
 * Three-way branch predictor: one saturating counter per BR3 site.
 * The counter moves one step toward each observed outcome, so it takes
 * two consecutive opposite outcomes to flip a prediction end to end.
 */
import type { Trit } from './types';

export const BranchBias = {
  NEG: 'neg-bias',
  ZERO: 'zero-bias',
  POS: 'pos-bias',
} as const;
export type BranchBias = typeof BranchBias[keyof typeof BranchBias];

export function biasPrediction(bias: BranchBias): Trit {
  switch (bias) {
    case BranchBias.NEG: return -1;
    case BranchBias.ZERO: return 0;
    case BranchBias.POS: return 1;
  }
}

export function nextBias(bias: BranchBias, outcome: Trit): BranchBias {
  switch (bias) {
    case BranchBias.NEG:
      return outcome === -1 ? BranchBias.NEG : BranchBias.ZERO;
    case BranchBias.ZERO:
      if (outcome === 0) return BranchBias.ZERO;
      return outcome === 1 ? BranchBias.POS : BranchBias.NEG;
    case BranchBias.POS:
      return outcome === 1 ? BranchBias.POS : BranchBias.ZERO;
  }
}

export class BranchPredictor {
  private sites: Map<number, BranchBias> = new Map();
  private _predictions = 0;
  private _mispredictions = 0;

  bias(pc: number): BranchBias {
    return this.sites.get(pc) ?? BranchBias.ZERO;
  }

  predict(pc: number): Trit {
    return biasPrediction(this.bias(pc));
  }

  /** Record the resolved outcome; returns whether the prediction was right. */
  update(pc: number, outcome: Trit): boolean {
    const predicted = this.predict(pc);
    const hit = predicted === outcome;
    this._predictions++;
    if (!hit) this._mispredictions++;
    this.sites.set(pc, nextBias(this.bias(pc), outcome));
    return hit;
  }

  get predictions(): number {
    return this._predictions;
  }

  get mispredictions(): number {
    return this._mispredictions;
  }
}
