/**
 * Weight-stationary systolic array.
 *
 * Weights are written one row per cycle. Activations stream in as a vector
 * of C trits; each row forms Σ_c w[r][c]·x[c] with the partial sum handed
 * from column to column, and the row result is read at the trailing edge
 * of the pass. A row accumulates only in a cycle after the one that wrote
 * its weights, so loading row r+1 overlaps with accumulating row r.
 *
 * step() does one cycle of work and never advances the clock itself; the
 * owner (a lane multiplexer or the convenience drivers below) does that.
 */
import { ConfigurationError, StateError } from './errors';
import { addWords, multiplyTrits, ResultClass } from './sfg';
import { Word, toTrit } from './word';
import { WEIGHT_WRITE_LATENCY } from './constants';
import { PeState } from './types';
import type { TickClock } from './clock';
import type { Trit } from './types';

export class ProcessingElement {
  state: PeState = PeState.IDLE;
  weight: Trit | null = null;
  accumulator: Word;

  constructor(accumulatorTrits: number) {
    this.accumulator = Word.zero(accumulatorTrits);
  }
}

export interface SystolicOptions {
  accumulatorTrits?: number;
  /** Time units charged per weight-row write */
  weightWriteLatency?: number;
}

export interface PeOverflow {
  cycle: number;
  row: number;
  col: number;
  kind: 'overflow_pos' | 'overflow_neg';
}

export interface ArrayStats {
  vectors: number;
  macs: number;
  activeCycles: number;
}

export class SystolicArray {
  readonly rows: number;
  readonly cols: number;
  private readonly clock: TickClock;
  private readonly accumulatorTrits: number;
  private readonly weightWriteLatency: number;
  private pes: ProcessingElement[][];

  // Local step counter; rowWrittenAt is expressed in it
  private localCycle = 0;
  private rowWrittenAt: number[];

  private pendingLoad: Trit[][] | null = null;
  private nextLoadRow = 0;
  private hasWeights = false;
  // Set by a load, cleared by the next drain
  private loadedSinceDrain = false;

  private passVector: Trit[] | null = null;
  private nextAccRow = 0;

  private overflows: PeOverflow[] = [];
  private _stats: ArrayStats = { vectors: 0, macs: 0, activeCycles: 0 };

  // Global cycle of each row's most recent write / accumulation
  readonly loadCycle: number[];
  readonly accumulateCycle: number[];

  constructor(rows: number, cols: number, clock: TickClock, options: SystolicOptions = {}) {
    if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(cols) || cols < 1) {
      throw new ConfigurationError(`Invalid array shape ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.clock = clock;
    this.accumulatorTrits = options.accumulatorTrits ?? 81;
    this.weightWriteLatency = options.weightWriteLatency ?? WEIGHT_WRITE_LATENCY;
    this.pes = Array.from({ length: rows }, () =>
      Array.from({ length: cols }, () => new ProcessingElement(this.accumulatorTrits))
    );
    this.rowWrittenAt = new Array<number>(rows).fill(-1);
    this.loadCycle = new Array<number>(rows).fill(-1);
    this.accumulateCycle = new Array<number>(rows).fill(-1);
  }

  // ==========================================================================
  // Cycle-level interface
  // ==========================================================================

  beginLoad(matrix: readonly (readonly number[])[]): void {
    if (this.passVector !== null) throw new StateError('Cannot load weights during a pass');
    if (this.pendingLoad !== null) throw new StateError('Weight load already in progress');
    if (this.loadedSinceDrain) throw new StateError('Weights already loaded: drain a pass before reloading');
    if (matrix.length !== this.rows || matrix.some(row => row.length !== this.cols)) {
      throw new RangeError(`Weight matrix must be ${this.rows}x${this.cols}`);
    }
    this.pendingLoad = matrix.map(row => row.map(toTrit));
    this.loadedSinceDrain = true;
    this.nextLoadRow = 0;
    this.rowWrittenAt.fill(-1);
    for (const row of this.pes) {
      for (const pe of row) pe.state = PeState.LOADING;
    }
  }

  beginPass(vector: readonly number[]): void {
    if (this.passVector !== null) throw new StateError('Previous pass not drained (stream before drain)');
    if (!this.hasWeights && this.pendingLoad === null) throw new StateError('No weights loaded');
    if (vector.length !== this.cols) {
      throw new RangeError(`Activation vector must have ${this.cols} trits, got ${vector.length}`);
    }
    this.passVector = vector.map(toTrit);
    this.nextAccRow = 0;
    for (const row of this.pes) {
      for (const pe of row) pe.accumulator = Word.zero(this.accumulatorTrits);
    }
  }

  /** One cycle of work. Returns whether anything happened. */
  step(): boolean {
    const now = this.localCycle++;
    let worked = false;

    if (this.passVector !== null && this.nextAccRow < this.rows) {
      const r = this.nextAccRow;
      const written = this.rowWrittenAt[r];
      if (written !== -1 && written < now) {
        this.accumulateRow(r, this.passVector);
        this.nextAccRow++;
        worked = true;
      }
    }

    if (this.pendingLoad !== null) {
      const r = this.nextLoadRow;
      const weights = this.pendingLoad[r];
      for (let c = 0; c < this.cols; c++) {
        const pe = this.pes[r][c];
        pe.weight = weights[c];
        pe.state = PeState.READY;
      }
      this.clock.charge(this.weightWriteLatency);
      this.rowWrittenAt[r] = now;
      this.loadCycle[r] = this.clock.cycles;
      this.nextLoadRow++;
      if (this.nextLoadRow === this.rows) {
        this.pendingLoad = null;
        this.hasWeights = true;
      }
      worked = true;
    }

    if (worked) this._stats.activeCycles++;
    return worked;
  }

  private accumulateRow(r: number, x: readonly Trit[]): void {
    let partial = Word.zero(this.accumulatorTrits);
    for (let c = 0; c < this.cols; c++) {
      const pe = this.pes[r][c];
      pe.state = PeState.ACCUMULATING;
      const product = multiplyTrits(pe.weight ?? 0, x[c]);
      const { value, overflow } = addWords(partial, Word.fromTrits([product], this.accumulatorTrits));
      if (overflow !== null) {
        this.overflows.push({
          cycle: this.clock.cycles,
          row: r,
          col: c,
          kind: overflow === ResultClass.OVERFLOW_POS ? 'overflow_pos' : 'overflow_neg',
        });
      }
      partial = value;
      pe.accumulator = partial;
    }
    this.accumulateCycle[r] = this.clock.cycles;
    this._stats.macs += this.cols;
  }

  isLoading(): boolean {
    return this.pendingLoad !== null;
  }

  isPassOpen(): boolean {
    return this.passVector !== null;
  }

  isPassComplete(): boolean {
    return this.passVector !== null && this.nextAccRow === this.rows;
  }

  hasWork(): boolean {
    return this.pendingLoad !== null || (this.passVector !== null && this.nextAccRow < this.rows);
  }

  /** Row results of the completed pass; weights stay stationary. */
  drain(): Word[] {
    if (this.passVector === null) throw new StateError('Nothing to drain: no pass in flight');
    if (this.nextAccRow < this.rows) {
      throw new StateError(`Pass incomplete: ${this.nextAccRow}/${this.rows} rows accumulated`);
    }
    const out: Word[] = [];
    for (const row of this.pes) {
      for (const pe of row) pe.state = PeState.DRAINING;
      out.push(row[this.cols - 1].accumulator);
    }
    for (const row of this.pes) {
      for (const pe of row) pe.state = PeState.READY;
    }
    this.passVector = null;
    this.loadedSinceDrain = false;
    this._stats.vectors++;
    return out;
  }

  // ==========================================================================
  // Convenience drivers (advance the clock themselves)
  // ==========================================================================

  loadWeights(matrix: readonly (readonly number[])[]): void {
    this.beginLoad(matrix);
    while (this.isLoading()) {
      this.step();
      this.clock.advance();
    }
  }

  *streamActivations(vectors: Iterable<readonly number[]>): Generator<Word[]> {
    for (const v of vectors) {
      this.beginPass(v);
      while (!this.isPassComplete()) {
        this.step();
        this.clock.advance();
      }
      yield this.drain();
    }
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  weights(): (Trit | null)[][] {
    return this.pes.map(row => row.map(pe => pe.weight));
  }

  peStates(): PeState[][] {
    return this.pes.map(row => row.map(pe => pe.state));
  }

  getOverflows(): readonly PeOverflow[] {
    return this.overflows;
  }

  stats(): ArrayStats {
    return { ...this._stats };
  }
}
