// Balanced-ternary digit. Nothing else is representable.
export type Trit = -1 | 0 | 1;

// Sum of two trits before classification
export type TritSum = -2 | -1 | 0 | 1 | 2;

export type OpcodeTuple = readonly [Trit, Trit, Trit];

export type LaneId = number;

export type TierId = 1 | 2 | 3;

export const PeState = {
  IDLE: 'idle',
  LOADING: 'loading',
  READY: 'ready',
  ACCUMULATING: 'accumulating',
  DRAINING: 'draining',
} as const;
export type PeState = typeof PeState[keyof typeof PeState];

export const SequencerPhase = {
  FETCH: 'fetch',
  DECODE: 'decode',
  EXECUTE: 'execute',
  WRITEBACK: 'writeback',
  HALTED: 'halted',
} as const;
export type SequencerPhase = typeof SequencerPhase[keyof typeof SequencerPhase];

export const HaltReason = {
  HALT: 'halt',
  END_OF_PROGRAM: 'end-of-program',
  INTERRUPTED: 'interrupted',
  CYCLE_LIMIT: 'cycle-limit',
} as const;
export type HaltReason = typeof HaltReason[keyof typeof HaltReason];

export interface TierSpec {
  capacity: number;
  /** Access latency in time units, charged to the clock per read/write */
  latency: number;
  /** Cycles an LD/ST against this tier blocks the sequencer */
  accessCycles: number;
}

/** Input wavelengths (nm) encoding −1, 0 and +1 on one lane. */
export interface WavelengthTriplet {
  neg: number;
  zero: number;
  pos: number;
}

export interface ClockSkewBudget {
  nPEs: number;
  skew: number;
  threshold: number;
  pass: boolean;
}

export interface TimingViolation {
  nPEs: number;
  skew: number;
  threshold: number;
  skewPs: number;
  periodPs: number;
}

export type OverflowKind = 'overflow_pos' | 'overflow_neg' | 'divide_by_zero';

export interface OverflowEvent {
  cycle: number;
  kind: OverflowKind;
  source: 'sequencer' | 'lane';
  pc?: number;
  mnemonic?: string;
  laneId?: LaneId;
  row?: number;
  col?: number;
}

export interface SpillEvent {
  handle: number;
  from: TierId;
  to: TierId;
}

export interface LaneThroughput {
  laneId: LaneId;
  enabled: boolean;
  subChannels: number;
  vectors: number;
  macs: number;
  activeCycles: number;
  macsPerCycle: number;
  /** macsPerCycle scaled by the lane's sub-channel count */
  effectiveMacsPerCycle: number;
}

export interface TheoreticalThroughput {
  clockMhz: number;
  macsPerCycle: number;
  opsPerCycle: number;
  gops: number;
  tops: number;
}

export interface RegisterSnapshot {
  name: string;
  tier: TierId;
  value: string;     // decimal
  trits: string;     // balanced ternary, most significant first
}

export interface TierSnapshot {
  tier: TierId;
  capacity: number;
  latency: number;
  occupied: number;
  handles: number[];  // LRU first
}

export interface DataSnapshot {
  addr: number;
  value: string;
  trits: string;
}

export interface RunReport {
  haltReason: HaltReason;
  totalCycles: number;
  timeUnits: number;
  instructionsRetired: number;
  registers: RegisterSnapshot[];
  tiers: TierSnapshot[];
  spills: number;
  skew: ClockSkewBudget;
  timingViolations: TimingViolation[];
  lanes: LaneThroughput[];
  theoretical: TheoreticalThroughput;
  effectiveChannels: number;
  overflows: OverflowEvent[];
  branches: { predictions: number; mispredictions: number };
  logDomain: {
    enabled: boolean;
    addMultiplier: number;
    addSubCycles: number;
    effectiveAddSubCycles: number;
  };
  physics: { collisionFree: boolean; confidence?: number; margin?: number };
  data: DataSnapshot[];
}
