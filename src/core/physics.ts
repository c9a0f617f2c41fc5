/**
 * Physics validation contract. The simulator never solves fields itself;
 * before a run it hands the lane wavelength assignment to a validator and
 * refuses to start unless the verdict says the assignment is collision free.
 */
import { ConfigurationError } from './errors';
import type { LaneId, WavelengthTriplet } from './types';

export interface LaneAssignment {
  lanes: {
    laneId: LaneId;
    triplet: WavelengthTriplet;
    /** Detector labels, most negative result class first */
    labels: number[];
  }[];
}

export interface PhysicsVerdict {
  collisionFree: boolean;
  confidence?: number;
  /** Smallest spacing between distinct output labels, nm */
  margin?: number;
}

export interface PhysicsValidator {
  verify(assignment: LaneAssignment): Promise<PhysicsVerdict | undefined>;
}

/** Passes when every pair of distinct labels is at least `minSpacingNm` apart. */
export class AnalyticPhysicsValidator implements PhysicsValidator {
  private readonly minSpacingNm: number;

  constructor(minSpacingNm: number = 1) {
    this.minSpacingNm = minSpacingNm;
  }

  async verify(assignment: LaneAssignment): Promise<PhysicsVerdict> {
    const labels = [...new Set(assignment.lanes.flatMap(l => l.labels))].sort((a, b) => a - b);
    let margin = Infinity;
    for (let i = 1; i < labels.length; i++) margin = Math.min(margin, labels[i] - labels[i - 1]);
    if (!Number.isFinite(margin)) return { collisionFree: true, confidence: 1 };
    return { collisionFree: margin >= this.minSpacingNm, confidence: 1, margin };
  }
}

export function requireCollisionFree(verdict: PhysicsVerdict | undefined): PhysicsVerdict {
  if (verdict === undefined) throw new ConfigurationError('Physics validator returned no verdict');
  if (!verdict.collisionFree) {
    const detail = verdict.margin !== undefined ? ` (margin ${verdict.margin} nm)` : '';
    throw new ConfigurationError(`Lane assignment is not collision free${detail}`);
  }
  return verdict;
}
