/**
 * Instruction sequencer.
 *
 * FETCH → DECODE → EXECUTE → WRITEBACK → FETCH, one tick per cycle. Only the
 * very first fetch/decode costs a cycle of its own; every later fetch
 * overlaps the last execute cycle of the instruction before it, unless a
 * BR3 mispredicted, in which case FETCH stalls for the penalty. Interrupts
 * are only taken at FETCH.
 *
 * An instruction's effects are applied atomically on its first EXECUTE tick;
 * the remaining ticks only hold the sequencer for the instruction's cost.
 */
import { addWords, ArithOp, divWords, mulWords, ResultClass } from './sfg';
import { REGISTER_BANKS, homeTier } from './constants';
import { StateError } from './errors';
import { HaltReason, SequencerPhase } from './types';
import type { TickClock } from './clock';
import type { DataMemory } from './data-memory';
import type { Instruction } from './decoder';
import type { LaneMultiplexer } from './lanes';
import type { BranchPredictor } from './predictor';
import type { RegisterFile } from './registers';
import type { SystolicArray } from './systolic';
import type { OverflowEvent, OverflowKind, Trit } from './types';
import type { Word } from './word';

export interface SequencerOptions {
  rows: number;
  cols: number;
  mispredictPenalty: number;
  /** Program address of the interrupt handler; null halts on interrupt */
  interruptHandler: number | null;
}

export interface SequencerDeps {
  clock: TickClock;
  registers: RegisterFile;
  data: DataMemory;
  lanes: LaneMultiplexer;
  predictor: BranchPredictor;
}

export class Sequencer {
  private readonly program: readonly Instruction[];
  private readonly deps: SequencerDeps;
  private readonly options: SequencerOptions;

  private _phase: SequencerPhase = SequencerPhase.FETCH;
  private _pc = 0;
  private _haltReason: HaltReason | null = null;

  private current: Instruction | null = null;
  private started = false;
  private remaining = 0;
  private nextPc = 0;
  private blockedOnLane: number | null = null;

  // Cycles left in a stalled FETCH; the first fetch/decode costs one
  private fetchCycles = 1;
  private pendingPenalty = 0;

  private interruptPending = false;
  private returnAddress: number | null = null;

  private _retired = 0;
  private _addSubCycles = 0;
  private overflows: OverflowEvent[] = [];

  constructor(program: readonly Instruction[], deps: SequencerDeps, options: SequencerOptions) {
    this.program = program;
    this.deps = deps;
    this.options = options;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get phase(): SequencerPhase {
    return this._phase;
  }

  get pc(): number {
    return this._pc;
  }

  get haltReason(): HaltReason | null {
    return this._haltReason;
  }

  get halted(): boolean {
    return this._phase === SequencerPhase.HALTED;
  }

  get instructionsRetired(): number {
    return this._retired;
  }

  get addSubCycles(): number {
    return this._addSubCycles;
  }

  getOverflows(): readonly OverflowEvent[] {
    return this.overflows;
  }

  raiseInterrupt(): void {
    this.interruptPending = true;
  }

  halt(reason: HaltReason): void {
    this._phase = SequencerPhase.HALTED;
    this._haltReason = reason;
    this.current = null;
  }

  // ==========================================================================
  // Tick
  // ==========================================================================

  tick(): void {
    if (this._phase === SequencerPhase.HALTED) return;

    if (this._phase === SequencerPhase.FETCH) {
      this.fetchCycles--;
      if (this.fetchCycles <= 0) this.fetch();
      return;
    }

    const instr = this.current;
    if (instr === null) throw new StateError('Execute with no instruction');

    if (!this.started) {
      this.started = true;
      this.remaining = this.execute(instr);
    }

    if (this.blockedOnLane !== null) {
      // STREAM holds until its pass has been fully accumulated
      if (!this.deps.lanes.getArray(this.blockedOnLane).isPassComplete()) return;
      this.blockedOnLane = null;
      this.remaining = 1;
    }

    this.remaining--;
    if (this.remaining > 0) return;
    this.retire(instr);
  }

  private retire(instr: Instruction): void {
    this._phase = SequencerPhase.WRITEBACK;
    this._retired++;
    this.current = null;
    if (instr.op === 'HALT') {
      this.halt(HaltReason.HALT);
      return;
    }
    this._pc = this.nextPc;
    if (this.pendingPenalty > 0) {
      this._phase = SequencerPhase.FETCH;
      this.fetchCycles = this.pendingPenalty;
      this.pendingPenalty = 0;
      return;
    }
    // Overlapped with this instruction's last cycle
    this.fetch();
  }

  private fetch(): void {
    if (this.interruptPending && this.returnAddress === null) {
      this.interruptPending = false;
      if (this.options.interruptHandler === null) {
        this.halt(HaltReason.INTERRUPTED);
        return;
      }
      this.returnAddress = this._pc;
      this._pc = this.options.interruptHandler;
    }
    if (this._pc >= this.program.length) {
      this.halt(HaltReason.END_OF_PROGRAM);
      return;
    }
    this._phase = SequencerPhase.DECODE;
    this.current = this.program[this._pc];
    this.started = false;
    this._phase = SequencerPhase.EXECUTE;
  }

  // ==========================================================================
  // Execute
  // ==========================================================================

  /** Extra cycles for reading or writing registers outside tier 1. */
  private stall(names: readonly string[]): number {
    const { registers } = this.deps;
    const fast = registers.tier1AccessCycles();
    let extra = 0;
    for (const name of names) extra += Math.max(0, registers.accessCycles(name) - fast);
    return extra;
  }

  private recordOverflow(instr: Instruction, kind: OverflowKind): void {
    this.overflows.push({
      cycle: this.deps.clock.cycles,
      kind,
      source: 'sequencer',
      pc: instr.pc,
      mnemonic: instr.op,
    });
  }

  private overflowKind(cls: ResultClass): OverflowKind {
    return cls === ResultClass.OVERFLOW_POS ? 'overflow_pos' : 'overflow_neg';
  }

  /** Apply the instruction's effects; returns its cycle cost. */
  private execute(instr: Instruction): number {
    const { registers, data, lanes, predictor } = this.deps;
    this.nextPc = instr.pc + 1;

    switch (instr.op) {
      case 'NOP':
      case 'HALT':
        return 1;

      case 'JMP':
        this.nextPc = instr.target;
        return 1;

      case 'LDI': {
        const cycles = 1 + this.stall([instr.dst]);
        registers.write(instr.dst, instr.imm);
        return cycles;
      }

      case 'LD1':
      case 'LD2':
      case 'LD3': {
        const cycles = registers.accessCycles(instr.reg);
        registers.write(instr.reg, data.read(instr.addr));
        return cycles;
      }

      case 'ST1':
      case 'ST2':
      case 'ST3': {
        const cycles = registers.accessCycles(instr.reg);
        data.write(instr.addr, registers.read(instr.reg));
        return cycles;
      }

      case 'ADD':
      case 'SUB': {
        const cycles = 1 + this.stall([instr.ra, instr.rb, instr.rd]);
        const op = instr.op === 'ADD' ? ArithOp.ADD : ArithOp.SUB;
        const { value, overflow } = addWords(registers.read(instr.ra), registers.read(instr.rb), op);
        if (overflow !== null) this.recordOverflow(instr, this.overflowKind(overflow));
        registers.write(instr.rd, value);
        this._addSubCycles += cycles;
        return cycles;
      }

      case 'MUL': {
        const cycles = 3 + this.stall([instr.ra, instr.rb, instr.rd]);
        const { value, overflow } = mulWords(registers.read(instr.ra), registers.read(instr.rb));
        if (overflow !== null) this.recordOverflow(instr, this.overflowKind(overflow));
        registers.write(instr.rd, value);
        return cycles;
      }

      case 'DIV': {
        const cycles = 5 + this.stall([instr.ra, instr.rb, instr.rd, 'TMP']);
        const result = divWords(registers.read(instr.ra), registers.read(instr.rb));
        if (result === null) {
          this.recordOverflow(instr, 'divide_by_zero');
          return cycles;
        }
        registers.write(instr.rd, result.quotient);
        registers.write('TMP', result.remainder);
        return cycles;
      }

      case 'BR3': {
        const cycles = 1 + this.stall([instr.reg]);
        const outcome: Trit = registers.read(instr.reg).sign();
        const hit = predictor.update(instr.pc, outcome);
        this.nextPc = instr.targets[outcome + 1];
        if (!hit) this.pendingPenalty = this.options.mispredictPenalty;
        return cycles;
      }

      case 'NEG':
      case 'MOV': {
        const cycles = 1 + this.stall([instr.src, instr.dst]);
        const src: Word = registers.read(instr.src);
        registers.write(instr.dst, instr.op === 'NEG' ? src.negate() : src);
        return cycles;
      }

      case 'PROMOTE':
      case 'DEMOTE': {
        const before = registers.accessCycles(instr.reg);
        if (instr.op === 'PROMOTE') registers.promote(instr.reg);
        else registers.demote(instr.reg);
        return Math.max(before, registers.accessCycles(instr.reg));
      }

      case 'WLOAD': {
        const names = this.weightRegisters(instr.base);
        const cycles = 1 + this.stall(names);
        const matrix = names.map(name => registers.read(name).low(this.options.cols));
        this.enabledArray(instr.lane).beginLoad(matrix);
        return cycles;
      }

      case 'STREAM': {
        const vector = data.read(instr.addr).low(this.options.cols);
        this.enabledArray(instr.lane).beginPass(vector);
        this.blockedOnLane = instr.lane;
        return 1;
      }

      case 'DRAIN': {
        const outputs = lanes.getArray(instr.lane).drain();
        outputs.forEach((w, r) => data.write(instr.addr + r, w));
        return 1;
      }

      case 'RETI': {
        if (this.returnAddress === null) throw new StateError(`RETI at ${instr.pc} outside an interrupt handler`);
        this.nextPc = this.returnAddress;
        this.returnAddress = null;
        return 1;
      }
    }
  }

  private weightRegisters(base: string): string[] {
    const tier = homeTier(base);
    if (tier === null) throw new StateError(`Unknown register ${base}`);
    const bank = REGISTER_BANKS[tier];
    const start = bank.indexOf(base);
    return bank.slice(start, start + this.options.rows);
  }

  private enabledArray(laneId: number): SystolicArray {
    if (!this.deps.lanes.getLane(laneId).enabled) throw new StateError(`Lane ${laneId} is disabled`);
    return this.deps.lanes.getArray(laneId);
  }
}
