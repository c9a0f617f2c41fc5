/**
 * Instruction decoder. A program is decoded in full before the first cycle,
 * so every malformed instruction is reported up front with its address.
 *
 * Encoded form: [[t2, t1, t0], ...fields], where a field is a register name,
 * an integer, or (for immediates) a balanced-ternary literal string.
 */
import { OPCODE_BY_INDEX, OperandKind, REGISTER_BANKS, formatOpcode, homeTier, opcodeIndex } from './constants';
import { DecodeError } from './errors';
import { Word, isTrit } from './word';
import type { OpcodeInfo } from './constants';
import type { LaneId, OpcodeTuple, TierId } from './types';

export type EncodedField = string | number;
export type EncodedInstruction = readonly [readonly number[], ...EncodedField[]];

interface Base {
  pc: number;
  opcode: OpcodeTuple;
}

export type Instruction = Base & (
  | { op: 'NOP' | 'HALT' | 'RETI' }
  | { op: 'JMP'; target: number }
  | { op: 'LDI'; dst: string; imm: Word }
  | { op: 'LD1' | 'LD2' | 'LD3' | 'ST1' | 'ST2' | 'ST3'; tier: TierId; reg: string; addr: number }
  | { op: 'ADD' | 'SUB' | 'MUL' | 'DIV'; ra: string; rb: string; rd: string }
  | { op: 'BR3'; reg: string; targets: readonly [number, number, number] }
  | { op: 'NEG' | 'MOV'; src: string; dst: string }
  | { op: 'PROMOTE' | 'DEMOTE'; reg: string }
  | { op: 'WLOAD'; lane: LaneId; base: string }
  | { op: 'STREAM' | 'DRAIN'; lane: LaneId; addr: number }
);

export interface DecodeContext {
  rows: number;
  cols: number;
  laneCount: number;
  dataWords: number;
  wordTrits: number;
  /** Defaults to the length of the program being decoded */
  programLength?: number;
}

function decodeOpcode(raw: readonly number[], pc: number): OpcodeInfo {
  if (raw.length !== 3) throw new DecodeError(`Opcode must have 3 trits, got ${raw.length}`, pc);
  const [t2, t1, t0] = raw;
  if (!isTrit(t2) || !isTrit(t1) || !isTrit(t0)) {
    throw new DecodeError(`Opcode ${JSON.stringify(raw)} is not a trit tuple`, pc);
  }
  const info = OPCODE_BY_INDEX.get(opcodeIndex([t2, t1, t0]));
  if (info === undefined) throw new DecodeError(`Unknown opcode ${formatOpcode(raw)}`, pc);
  return info;
}

class OperandReader {
  private readonly fields: readonly EncodedField[];
  private readonly pc: number;
  private readonly ctx: Required<DecodeContext>;
  private readonly mnemonic: string;

  constructor(fields: readonly EncodedField[], pc: number, ctx: Required<DecodeContext>, info: OpcodeInfo) {
    this.fields = fields;
    this.pc = pc;
    this.ctx = ctx;
    this.mnemonic = info.mnemonic;
    if (fields.length !== info.operands.length) {
      throw this.error(`expects ${info.operands.length} operand(s), got ${fields.length}`);
    }
    fields.forEach((f, i) => {
      const kind = info.operands[i];
      const wantsString = kind === OperandKind.REG || (kind === OperandKind.IMM && typeof f === 'string');
      if (wantsString !== (typeof f === 'string')) throw this.error(`operand ${i + 1} must be ${kind}`);
    });
  }

  private error(message: string): DecodeError {
    return new DecodeError(`${this.mnemonic}: ${message}`, this.pc);
  }

  private integer(i: number): number {
    const f = this.fields[i];
    if (typeof f !== 'number' || !Number.isInteger(f)) throw this.error(`operand ${i + 1} must be an integer`);
    return f;
  }

  reg(i: number): string {
    const f = this.fields[i];
    if (typeof f !== 'string' || homeTier(f) === null) throw this.error(`invalid register ${String(f)}`);
    return f;
  }

  addr(i: number): number {
    const a = this.integer(i);
    if (a < 0 || a > this.ctx.programLength) {
      throw this.error(`jump target ${a} outside program (0..${this.ctx.programLength})`);
    }
    return a;
  }

  data(i: number, span: number = 1): number {
    const a = this.integer(i);
    if (a < 0 || a + span > this.ctx.dataWords) {
      throw this.error(`data address ${a}${span > 1 ? `+${span}` : ''} outside data memory (${this.ctx.dataWords} words)`);
    }
    return a;
  }

  lane(i: number): LaneId {
    const l = this.integer(i);
    if (l < 1 || l > this.ctx.laneCount) throw this.error(`lane ${l} outside 1..${this.ctx.laneCount}`);
    return l;
  }

  imm(i: number): Word {
    const f = this.fields[i];
    try {
      return typeof f === 'string' ? Word.parse(f, this.ctx.wordTrits) : Word.fromNumber(f, this.ctx.wordTrits);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw this.error(`bad immediate ${JSON.stringify(f)}: ${reason}`);
    }
  }

  /** DIV destination: TMP is taken by the remainder. */
  quotientReg(i: number): string {
    const name = this.reg(i);
    if (name === 'TMP') throw this.error('TMP receives the remainder and cannot hold the quotient');
    return name;
  }

  /** Register that must live in `tier` (LDn/STn). */
  tierReg(i: number, tier: TierId): string {
    const name = this.reg(i);
    if (homeTier(name) !== tier) throw this.error(`register ${name} is not a tier-${tier} register`);
    return name;
  }

  /** First of `count` consecutive registers in one bank. */
  regRun(i: number, count: number): string {
    const name = this.reg(i);
    const tier = homeTier(name);
    const bank = tier !== null ? REGISTER_BANKS[tier] : [];
    const start = bank.indexOf(name);
    if (start + count > bank.length) {
      throw this.error(`needs ${count} registers from ${name}, bank has ${bank.length - start}`);
    }
    return name;
  }
}

function tierOfMnemonic(op: string): TierId {
  const digit = op.charAt(2);
  if (digit === '1') return 1;
  if (digit === '2') return 2;
  return 3;
}

export function decodeInstruction(raw: EncodedInstruction, pc: number, ctx: Required<DecodeContext>): Instruction {
  const [opTrits, ...fields] = raw;
  const info = decodeOpcode(opTrits, pc);
  const r = new OperandReader(fields, pc, ctx, info);
  const base: Base = { pc, opcode: info.opcode };

  switch (info.mnemonic) {
    case 'NOP':
    case 'HALT':
    case 'RETI':
      return { ...base, op: info.mnemonic };
    case 'JMP':
      return { ...base, op: 'JMP', target: r.addr(0) };
    case 'LDI':
      return { ...base, op: 'LDI', dst: r.reg(0), imm: r.imm(1) };
    case 'LD1':
    case 'LD2':
    case 'LD3':
    case 'ST1':
    case 'ST2':
    case 'ST3': {
      const tier = tierOfMnemonic(info.mnemonic);
      return { ...base, op: info.mnemonic, tier, reg: r.tierReg(0, tier), addr: r.data(1) };
    }
    case 'ADD':
    case 'SUB':
    case 'MUL':
      return { ...base, op: info.mnemonic, ra: r.reg(0), rb: r.reg(1), rd: r.reg(2) };
    case 'DIV':
      return { ...base, op: 'DIV', ra: r.reg(0), rb: r.reg(1), rd: r.quotientReg(2) };
    case 'BR3':
      return { ...base, op: 'BR3', reg: r.reg(0), targets: [r.addr(1), r.addr(2), r.addr(3)] };
    case 'NEG':
    case 'MOV':
      return { ...base, op: info.mnemonic, src: r.reg(0), dst: r.reg(1) };
    case 'PROMOTE':
    case 'DEMOTE':
      return { ...base, op: info.mnemonic, reg: r.reg(0) };
    case 'WLOAD':
      return { ...base, op: 'WLOAD', lane: r.lane(0), base: r.regRun(1, ctx.rows) };
    case 'STREAM':
      return { ...base, op: 'STREAM', lane: r.lane(0), addr: r.data(1) };
    case 'DRAIN':
      return { ...base, op: 'DRAIN', lane: r.lane(0), addr: r.data(1, ctx.rows) };
  }
}

export function decodeProgram(program: readonly EncodedInstruction[], ctx: DecodeContext): Instruction[] {
  const full: Required<DecodeContext> = { ...ctx, programLength: ctx.programLength ?? program.length };
  return program.map((raw, pc) => decodeInstruction(raw, pc, full));
}
