/**
 * Top-level accelerator: owns the clock and wires memory, lanes, arrays and
 * the sequencer together. Everything that can be rejected (configuration,
 * wavelength plan, physics verdict, program) is rejected in create(),
 * before the first cycle.
 *
 * One tick: scheduled interrupts → lanes step → sequencer steps → clock.
 */
import { assemble } from './assembler/assembler';
import { TickClock } from './clock';
import { parseConfig } from './config';
import { DataMemory } from './data-memory';
import { decodeProgram } from './decoder';
import { ConfigurationError, DecodeError } from './errors';
import { LaneMultiplexer } from './lanes';
import { TieredMemory } from './memory';
import { requireCollisionFree } from './physics';
import { BranchPredictor } from './predictor';
import { RegisterFile } from './registers';
import { Sequencer } from './sequencer';
import { skewPicoseconds, validateSkew } from './skew';
import { SystolicArray } from './systolic';
import { Word } from './word';
import { homeTier } from './constants';
import { HaltReason } from './types';
import type { SimulatorConfig } from './config';
import type { EncodedInstruction, Instruction } from './decoder';
import type { PhysicsValidator, PhysicsVerdict } from './physics';
import type { ClockSkewBudget, OverflowEvent, RunReport, TimingViolation } from './types';

interface AcceleratorParts {
  config: SimulatorConfig;
  clock: TickClock;
  lanes: LaneMultiplexer;
  verdict: PhysicsVerdict;
  program: Instruction[];
  skew: ClockSkewBudget;
}

function toWord(value: number | string, width: number, what: string): Word {
  try {
    return typeof value === 'string' ? Word.parse(value, width) : Word.fromNumber(value, width);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Invalid ${what}`, [reason]);
  }
}

export class Accelerator {
  readonly config: SimulatorConfig;
  readonly clock: TickClock;
  readonly memory: TieredMemory;
  readonly registers: RegisterFile;
  readonly data: DataMemory;
  readonly lanes: LaneMultiplexer;
  readonly predictor: BranchPredictor;
  readonly sequencer: Sequencer;
  readonly program: readonly Instruction[];
  readonly skewBudget: ClockSkewBudget;

  private readonly verdict: PhysicsVerdict;
  private readonly timingViolations: TimingViolation[] = [];
  private readonly interruptAt: Set<number>;

  private constructor(parts: AcceleratorParts, programData: Record<string, number | string>) {
    const { config, clock } = parts;
    this.config = config;
    this.clock = clock;
    this.lanes = parts.lanes;
    this.verdict = parts.verdict;
    this.program = parts.program;
    this.skewBudget = parts.skew;

    this.memory = new TieredMemory(clock, config.tiers, config.wordTrits);
    this.registers = new RegisterFile(this.memory, config.wordTrits);
    this.data = new DataMemory(config.dataWords, config.wordTrits);
    this.predictor = new BranchPredictor();

    for (const [name, value] of Object.entries(config.registers)) {
      if (homeTier(name) === null) throw new ConfigurationError(`Unknown register ${name}`);
      this.registers.seed(name, toWord(value, config.wordTrits, `value for register ${name}`));
    }
    // Explicit config data wins over .data lines in the program source
    for (const [addr, value] of Object.entries({ ...programData, ...config.data })) {
      const a = Number(addr);
      if (a >= config.dataWords) throw new ConfigurationError(`Data address ${a} outside data memory`);
      this.data.write(a, toWord(value, config.wordTrits, `data word ${addr}`));
    }

    for (const laneId of this.lanes.laneIds()) {
      const array = new SystolicArray(config.array.rows, config.array.cols, clock, {
        accumulatorTrits: config.wordTrits,
        weightWriteLatency: config.weightWriteLatency,
      });
      this.lanes.bindLane(laneId, array);
    }

    if (!this.skewBudget.pass) {
      this.timingViolations.push({
        nPEs: this.skewBudget.nPEs,
        skew: this.skewBudget.skew,
        threshold: this.skewBudget.threshold,
        skewPs: skewPicoseconds(this.skewBudget, config.clock.periodPs),
        periodPs: config.clock.periodPs,
      });
    }

    this.interruptAt = new Set(config.interrupts.at);
    this.sequencer = new Sequencer(
      this.program,
      {
        clock,
        registers: this.registers,
        data: this.data,
        lanes: this.lanes,
        predictor: this.predictor,
      },
      {
        rows: config.array.rows,
        cols: config.array.cols,
        mispredictPenalty: config.mispredictPenalty,
        interruptHandler: config.interrupts.handler ?? null,
      },
    );
  }

  static async create(input: unknown, validator: PhysicsValidator): Promise<Accelerator> {
    const config = parseConfig(input);
    const clock = new TickClock();

    const lanes = LaneMultiplexer.fromTriplets(config.lanes.count, config.lanes.subChannels, clock, {
      triplets: config.lanes.triplets,
      disabled: config.lanes.disabled,
    });
    let answer: PhysicsVerdict | undefined;
    try {
      answer = await validator.verify(lanes.assignment());
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigurationError('Physics validator failed', [reason]);
    }
    const verdict = requireCollisionFree(answer);

    let encoded: EncodedInstruction[];
    let programData: Record<string, number | string> = {};
    if (typeof config.program === 'string') {
      const assembled = assemble(config.program);
      if (assembled.errors.length > 0) {
        const detail = assembled.errors.map(e => `${e.line}:${e.col} ${e.message}`).join('; ');
        throw new DecodeError(`Assembly failed: ${detail}`);
      }
      encoded = assembled.program;
      programData = assembled.data;
    } else {
      encoded = config.program;
    }

    const program = decodeProgram(encoded, {
      rows: config.array.rows,
      cols: config.array.cols,
      laneCount: config.lanes.count,
      dataWords: config.dataWords,
      wordTrits: config.wordTrits,
    });

    const handler = config.interrupts.handler;
    if (handler !== undefined && handler >= program.length) {
      throw new ConfigurationError(`Interrupt handler ${handler} outside program (${program.length} instructions)`);
    }

    const { rows, cols } = config.array;
    const skew = validateSkew(rows * cols, config.clock.skewThreshold, config.clock.skewBaseline);

    return new Accelerator({ config, clock, lanes, verdict, program, skew }, programData);
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  raiseInterrupt(): void {
    this.sequencer.raiseInterrupt();
  }

  tick(): void {
    if (this.interruptAt.has(this.clock.cycles)) this.sequencer.raiseInterrupt();
    this.lanes.stepAll();
    this.sequencer.tick();
    this.clock.advance();
  }

  run(maxCycles: number = this.config.maxCycles): RunReport {
    while (!this.sequencer.halted) {
      if (this.clock.cycles >= maxCycles) {
        this.sequencer.halt(HaltReason.CYCLE_LIMIT);
        break;
      }
      this.tick();
    }
    return this.report();
  }

  // ==========================================================================
  // Report
  // ==========================================================================

  private laneOverflows(): OverflowEvent[] {
    const out: OverflowEvent[] = [];
    for (const laneId of this.lanes.laneIds()) {
      for (const o of this.lanes.getArray(laneId).getOverflows()) {
        out.push({ cycle: o.cycle, kind: o.kind, source: 'lane', laneId, row: o.row, col: o.col });
      }
    }
    return out;
  }

  report(): RunReport {
    const { logDomain } = this.config;
    const addSubCycles = this.sequencer.addSubCycles;
    const overflows = [...this.sequencer.getOverflows(), ...this.laneOverflows()]
      .sort((a, b) => a.cycle - b.cycle);

    return {
      haltReason: this.sequencer.haltReason ?? HaltReason.CYCLE_LIMIT,
      totalCycles: this.clock.cycles,
      timeUnits: this.clock.timeUnits,
      instructionsRetired: this.sequencer.instructionsRetired,
      registers: this.registers.snapshot(),
      tiers: this.memory.snapshot(),
      spills: this.memory.getSpills().length,
      skew: { ...this.skewBudget },
      timingViolations: [...this.timingViolations],
      lanes: this.lanes.throughput(),
      theoretical: this.lanes.theoreticalThroughput(this.config.clock.periodPs),
      effectiveChannels: this.lanes.effectiveChannels(),
      overflows,
      branches: {
        predictions: this.predictor.predictions,
        mispredictions: this.predictor.mispredictions,
      },
      logDomain: {
        enabled: logDomain.enabled,
        addMultiplier: logDomain.addMultiplier,
        addSubCycles,
        effectiveAddSubCycles: logDomain.enabled ? addSubCycles * logDomain.addMultiplier : addSubCycles,
      },
      physics: { ...this.verdict },
      data: this.data.snapshot(),
    };
  }
}
