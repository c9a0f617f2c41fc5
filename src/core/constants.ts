import type { OpcodeTuple, TierId, TierSpec, WavelengthTriplet } from './types';

// Collision-free WDM triplets (nm): 60 nm between triplets, 20 nm within.
// λ0 sits at the harmonic mean of λ−1 and λ+1 to within the detector's 1 nm bin.
export const WDM_TRIPLETS: readonly WavelengthTriplet[] = [
  { neg: 1040, zero: 1020, pos: 1000 },
  { neg: 1100, zero: 1080, pos: 1060 },
  { neg: 1160, zero: 1140, pos: 1120 },
  { neg: 1220, zero: 1200, pos: 1180 },
  { neg: 1280, zero: 1260, pos: 1240 },
  { neg: 1340, zero: 1320, pos: 1300 },
];

export const MAX_LANES = WDM_TRIPLETS.length;

// Kerr clock, 617 MHz
export const DEFAULT_CLOCK_PERIOD_PS = 1621;

export const DEFAULT_SKEW_BASELINE = { pes: 729, fraction: 0.024 } as const;
export const DEFAULT_SKEW_THRESHOLD = 0.05;

// Time units per weight-row write
export const WEIGHT_WRITE_LATENCY = 10;

export const DEFAULT_DATA_WORDS = 243;

export const DEFAULT_TIERS: readonly TierSpec[] = [
  { capacity: 4, latency: 1, accessCycles: 2 },
  { capacity: 16, latency: 10, accessCycles: 4 },
  { capacity: 32, latency: 100, accessCycles: 8 },
];

// ============================================================================
// Registers
// ============================================================================

export const TIER1_REGISTERS: readonly string[] = ['ACC', 'TMP', 'A', 'B'];
export const TIER2_REGISTERS: readonly string[] = Array.from({ length: 16 }, (_, i) => `R${i}`);
export const TIER3_REGISTERS: readonly string[] = Array.from({ length: 32 }, (_, i) => `P${i}`);

export const REGISTER_BANKS: Record<TierId, readonly string[]> = {
  1: TIER1_REGISTERS,
  2: TIER2_REGISTERS,
  3: TIER3_REGISTERS,
};

export function homeTier(name: string): TierId | null {
  if (TIER1_REGISTERS.includes(name)) return 1;
  if (TIER2_REGISTERS.includes(name)) return 2;
  if (TIER3_REGISTERS.includes(name)) return 3;
  return null;
}

export function isRegisterName(name: string): boolean {
  return homeTier(name) !== null;
}

// ============================================================================
// Opcodes
// ============================================================================

export const OperandKind = {
  REG: 'reg',        // register name
  ADDR: 'addr',      // program address
  DATA: 'data',      // data memory address
  IMM: 'imm',        // immediate word
  LANE: 'lane',      // lane id
} as const;
export type OperandKind = typeof OperandKind[keyof typeof OperandKind];

export type Mnemonic =
  | 'NOP' | 'HALT' | 'JMP' | 'LDI'
  | 'LD1' | 'LD2' | 'LD3' | 'ST1' | 'ST2' | 'ST3'
  | 'ADD' | 'SUB' | 'MUL' | 'DIV' | 'NEG' | 'MOV'
  | 'BR3' | 'PROMOTE' | 'DEMOTE'
  | 'WLOAD' | 'STREAM' | 'DRAIN' | 'RETI';

export interface OpcodeInfo {
  mnemonic: Mnemonic;
  opcode: OpcodeTuple;
  /** Fixed cycle count; null when the memory tier or a lane decides it */
  cycles: number | null;
  operands: readonly OperandKind[];
}

const { REG, ADDR, DATA, IMM, LANE } = OperandKind;

export const OPCODES: readonly OpcodeInfo[] = [
  { mnemonic: 'NOP',     opcode: [0, 0, 0],    cycles: 1,    operands: [] },
  { mnemonic: 'HALT',    opcode: [0, 0, -1],   cycles: 1,    operands: [] },
  { mnemonic: 'JMP',     opcode: [0, 0, 1],    cycles: 1,    operands: [ADDR] },
  { mnemonic: 'LDI',     opcode: [0, 1, -1],   cycles: 1,    operands: [REG, IMM] },
  { mnemonic: 'LD1',     opcode: [0, 1, 0],    cycles: null, operands: [REG, DATA] },
  { mnemonic: 'LD2',     opcode: [0, 1, 1],    cycles: null, operands: [REG, DATA] },
  { mnemonic: 'LD3',     opcode: [1, -1, -1],  cycles: null, operands: [REG, DATA] },
  { mnemonic: 'ST1',     opcode: [1, -1, 0],   cycles: null, operands: [REG, DATA] },
  { mnemonic: 'ST2',     opcode: [1, -1, 1],   cycles: null, operands: [REG, DATA] },
  { mnemonic: 'ST3',     opcode: [1, 0, -1],   cycles: null, operands: [REG, DATA] },
  { mnemonic: 'ADD',     opcode: [1, 0, 0],    cycles: 1,    operands: [REG, REG, REG] },
  { mnemonic: 'SUB',     opcode: [1, 0, 1],    cycles: 1,    operands: [REG, REG, REG] },
  { mnemonic: 'MUL',     opcode: [1, 1, -1],   cycles: 3,    operands: [REG, REG, REG] },
  { mnemonic: 'DIV',     opcode: [1, 1, 0],    cycles: 5,    operands: [REG, REG, REG] },
  { mnemonic: 'BR3',     opcode: [1, 1, 1],    cycles: 1,    operands: [REG, ADDR, ADDR, ADDR] },
  { mnemonic: 'NEG',     opcode: [0, -1, 1],   cycles: 1,    operands: [REG, REG] },
  { mnemonic: 'MOV',     opcode: [0, -1, 0],   cycles: 1,    operands: [REG, REG] },
  { mnemonic: 'PROMOTE', opcode: [0, -1, -1],  cycles: null, operands: [REG] },
  { mnemonic: 'DEMOTE',  opcode: [-1, 1, 1],   cycles: null, operands: [REG] },
  { mnemonic: 'WLOAD',   opcode: [-1, 1, 0],   cycles: 1,    operands: [LANE, REG] },
  { mnemonic: 'STREAM',  opcode: [-1, 1, -1],  cycles: null, operands: [LANE, DATA] },
  { mnemonic: 'DRAIN',   opcode: [-1, 0, 1],   cycles: 1,    operands: [LANE, DATA] },
  { mnemonic: 'RETI',    opcode: [-1, 0, 0],   cycles: 1,    operands: [] },
];

/** Opcode tuple as a balanced-ternary integer in −13..13. */
export function opcodeIndex(op: OpcodeTuple): number {
  return op[0] * 9 + op[1] * 3 + op[2];
}

export const OPCODE_BY_INDEX: ReadonlyMap<number, OpcodeInfo> = new Map(
  OPCODES.map(info => [opcodeIndex(info.opcode), info])
);

export const OPCODE_BY_MNEMONIC: ReadonlyMap<string, OpcodeInfo> = new Map(
  OPCODES.map(info => [info.mnemonic, info])
);

export function formatOpcode(op: readonly number[]): string {
  return `(${op.map(t => (t > 0 ? '+1' : t < 0 ? '-1' : '0')).join(',')})`;
}
