/**
 * Wavelength-division lane multiplexer.
 *
 * Each lane carries its own triplet of input wavelengths and drives its own
 * systolic array; lanes share nothing but the clock and advance in
 * lockstep, so N concurrent dispatches cost the cycles of the longest one.
 */
import { WDM_TRIPLETS } from './constants';
import { ConfigurationError, StateError } from './errors';
import { ResultClass, classLabel, laneLabels, physicalLabel } from './sfg';
import type { TickClock } from './clock';
import type { LaneAssignment } from './physics';
import type { SystolicArray } from './systolic';
import type { Word } from './word';
import type { LaneId, LaneThroughput, TheoreticalThroughput, WavelengthTriplet } from './types';

export interface WavelengthLane {
  readonly id: LaneId;
  readonly triplet: WavelengthTriplet;
  enabled: boolean;
}

export interface LaneHandle {
  readonly laneId: LaneId;
  readonly array: SystolicArray;
}

export interface DispatchOutcome {
  laneId: LaneId;
  accepted: boolean;
  /** One entry per vector: the row results of that pass */
  outputs: Word[][];
  vectors: number;
  cycles: number;
}

export interface BatchOutcome {
  /** Row results in batch order */
  outputs: Word[][];
  cycles: number;
}

/**
 * Labels may not repeat across lanes, and distinct result classes within a
 * lane may not share one. The only shared label allowed is the ZERO bin,
 * which the physical (−1,+1) output must actually hit.
 */
export function checkLaneCollisions(lanes: readonly WavelengthLane[]): void {
  const issues: string[] = [];
  const owner = new Map<number, LaneId>();
  for (const lane of lanes) {
    const { neg, zero, pos } = lane.triplet;
    if (!(neg > 0 && zero > 0 && pos > 0) || new Set([neg, zero, pos]).size !== 3) {
      issues.push(`lane ${lane.id}: triplet ${neg}/${zero}/${pos} is not three distinct wavelengths`);
      continue;
    }
    const labels = laneLabels(lane.triplet);
    if (new Set(labels).size !== labels.length) {
      issues.push(`lane ${lane.id}: result classes share a label (${labels.join(', ')})`);
    }
    const zeroLabel = classLabel(ResultClass.ZERO, lane.triplet);
    const mixed = physicalLabel(-1, 1, lane.triplet);
    if (mixed !== zeroLabel) {
      issues.push(`lane ${lane.id}: (-1,+1) lands at ${mixed} nm, not the zero bin at ${zeroLabel} nm`);
    }
    for (const label of labels) {
      const other = owner.get(label);
      if (other !== undefined && other !== lane.id) {
        issues.push(`lanes ${other} and ${lane.id} both emit ${label} nm`);
      }
      owner.set(label, lane.id);
    }
  }
  if (issues.length > 0) throw new ConfigurationError('Wavelength collision', issues);
}

export class LaneMultiplexer {
  private readonly lanes: Map<LaneId, WavelengthLane> = new Map();
  private readonly arrays: Map<LaneId, SystolicArray> = new Map();
  private readonly subChannels: number;
  private readonly clock: TickClock;

  constructor(lanes: readonly WavelengthLane[], subChannels: number, clock: TickClock) {
    if (lanes.length === 0) throw new ConfigurationError('At least one lane is required');
    if (!Number.isInteger(subChannels) || subChannels < 1) {
      throw new ConfigurationError(`Invalid sub-channel count ${subChannels}`);
    }
    checkLaneCollisions(lanes);
    for (const lane of lanes) {
      if (this.lanes.has(lane.id)) throw new ConfigurationError(`Duplicate lane id ${lane.id}`);
      this.lanes.set(lane.id, { ...lane });
    }
    this.subChannels = subChannels;
    this.clock = clock;
  }

  /** Lanes 1..count on the given triplets (the built-in WDM set by default). */
  static fromTriplets(
    count: number,
    subChannels: number,
    clock: TickClock,
    options: { triplets?: readonly WavelengthTriplet[]; disabled?: readonly LaneId[] } = {},
  ): LaneMultiplexer {
    const triplets = options.triplets ?? WDM_TRIPLETS;
    if (!Number.isInteger(count) || count < 1 || count > triplets.length) {
      throw new ConfigurationError(`Lane count must be 1..${triplets.length}, got ${count}`);
    }
    const disabled = new Set(options.disabled ?? []);
    const lanes: WavelengthLane[] = triplets.slice(0, count).map((triplet, i) => ({
      id: i + 1,
      triplet,
      enabled: !disabled.has(i + 1),
    }));
    return new LaneMultiplexer(lanes, subChannels, clock);
  }

  // ==========================================================================
  // Binding
  // ==========================================================================

  bindLane(laneId: LaneId, array: SystolicArray): LaneHandle {
    this.getLane(laneId);
    if (this.arrays.has(laneId)) throw new ConfigurationError(`Lane ${laneId} already has an array`);
    for (const [other, bound] of this.arrays) {
      if (bound === array) throw new ConfigurationError(`Array already bound to lane ${other}`);
    }
    this.arrays.set(laneId, array);
    return { laneId, array };
  }

  getLane(laneId: LaneId): WavelengthLane {
    const lane = this.lanes.get(laneId);
    if (lane === undefined) throw new ConfigurationError(`Unknown lane ${laneId}`);
    return lane;
  }

  getArray(laneId: LaneId): SystolicArray {
    const array = this.arrays.get(laneId);
    if (array === undefined) throw new StateError(`Lane ${laneId} has no bound array`);
    return array;
  }

  setEnabled(laneId: LaneId, enabled: boolean): void {
    this.getLane(laneId).enabled = enabled;
  }

  laneIds(): LaneId[] {
    return [...this.lanes.keys()];
  }

  enabledLaneIds(): LaneId[] {
    return [...this.lanes.values()].filter(l => l.enabled).map(l => l.id);
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /** Advance every enabled lane's array by one cycle. The clock is not advanced. */
  stepAll(): void {
    for (const [laneId, array] of this.arrays) {
      if (this.getLane(laneId).enabled && array.hasWork()) array.step();
    }
  }

  /** Load one matrix into every enabled lane at once. Returns the cycles taken. */
  broadcastWeights(matrix: readonly (readonly number[])[]): number {
    const targets = this.enabledLaneIds().map(id => this.getArray(id));
    for (const array of targets) array.beginLoad(matrix);
    const start = this.clock.cycles;
    while (targets.some(a => a.isLoading())) {
      this.stepAll();
      this.clock.advance();
    }
    return this.clock.cycles - start;
  }

  dispatch(laneId: LaneId, vectors: readonly (readonly number[])[]): DispatchOutcome {
    const [outcome] = this.dispatchConcurrent(new Map([[laneId, vectors]]));
    return outcome;
  }

  /**
   * Stream vectors through several lanes at once. Each cycle every busy
   * lane steps and the clock advances once.
   */
  dispatchConcurrent(streams: ReadonlyMap<LaneId, readonly (readonly number[])[]>): DispatchOutcome[] {
    interface Job {
      outcome: DispatchOutcome;
      array: SystolicArray;
      queue: (readonly number[])[];
      done: boolean;
    }
    const jobs: Job[] = [];
    const outcomes: DispatchOutcome[] = [];
    for (const [laneId, vectors] of streams) {
      const lane = this.getLane(laneId);
      const outcome: DispatchOutcome = { laneId, accepted: lane.enabled, outputs: [], vectors: 0, cycles: 0 };
      outcomes.push(outcome);
      if (!lane.enabled) continue;
      const array = this.getArray(laneId);
      if (array.isPassOpen()) throw new StateError(`Lane ${laneId} has a pass in flight`);
      jobs.push({ outcome, array, queue: [...vectors], done: vectors.length === 0 });
    }

    const start = this.clock.cycles;
    while (jobs.some(j => !j.done)) {
      for (const job of jobs) {
        if (job.done || job.array.isPassOpen()) continue;
        const next = job.queue.shift();
        if (next !== undefined) job.array.beginPass(next);
      }
      this.stepAll();
      this.clock.advance();
      for (const job of jobs) {
        if (job.done || !job.array.isPassComplete()) continue;
        job.outcome.outputs.push(job.array.drain());
        job.outcome.vectors++;
        if (job.queue.length === 0) {
          job.done = true;
          job.outcome.cycles = this.clock.cycles - start;
        }
      }
    }
    return outcomes;
  }

  /** The same vectors through every lane; disabled lanes come back unaccepted. */
  dispatchBroadcast(vectors: readonly (readonly number[])[]): DispatchOutcome[] {
    const streams = new Map<LaneId, readonly (readonly number[])[]>(this.laneIds().map(id => [id, vectors]));
    return this.dispatchConcurrent(streams);
  }

  /**
   * Split a batch over the enabled lanes in chunks of the lane count:
   * vector j of each chunk goes to the j-th enabled lane.
   */
  dispatchBatch(batch: readonly (readonly number[])[]): BatchOutcome {
    const ids = this.enabledLaneIds();
    if (ids.length === 0) throw new StateError('No enabled lane to take the batch');
    const streams = new Map<LaneId, (readonly number[])[]>(ids.map(id => [id, []]));
    batch.forEach((vector, i) => streams.get(ids[i % ids.length])?.push(vector));
    const outcomes = new Map<LaneId, DispatchOutcome>(this.dispatchConcurrent(streams).map(o => [o.laneId, o]));
    const outputs = batch.map((_, i) => {
      const lane = i % ids.length;
      return outcomes.get(ids[lane])?.outputs[Math.floor(i / ids.length)] ?? [];
    });
    const cycles = Math.max(0, ...[...outcomes.values()].map(o => o.cycles));
    return { outputs, cycles };
  }

  // ==========================================================================
  // Reporting
  // ==========================================================================

  effectiveChannels(): number {
    let enabled = 0;
    for (const lane of this.lanes.values()) if (lane.enabled) enabled++;
    return enabled * this.subChannels;
  }

  throughput(): LaneThroughput[] {
    return [...this.lanes.values()].map(lane => {
      const array = this.arrays.get(lane.id);
      const stats = array !== undefined ? array.stats() : { vectors: 0, macs: 0, activeCycles: 0 };
      const macsPerCycle = stats.activeCycles > 0 ? stats.macs / stats.activeCycles : 0;
      const subChannels = lane.enabled ? this.subChannels : 0;
      return {
        laneId: lane.id,
        enabled: lane.enabled,
        subChannels,
        vectors: stats.vectors,
        macs: stats.macs,
        activeCycles: stats.activeCycles,
        macsPerCycle,
        effectiveMacsPerCycle: macsPerCycle * subChannels,
      };
    });
  }

  /**
   * Peak rate with every PE of every enabled lane busy each cycle. One MAC
   * counts as two operations.
   */
  theoreticalThroughput(periodPs: number): TheoreticalThroughput {
    let macsPerCycle = 0;
    for (const laneId of this.enabledLaneIds()) {
      const array = this.arrays.get(laneId);
      if (array !== undefined) macsPerCycle += array.rows * array.cols * this.subChannels;
    }
    const clockMhz = 1e6 / periodPs;
    const opsPerCycle = macsPerCycle * 2;
    const gops = (opsPerCycle * clockMhz) / 1000;
    return { clockMhz, macsPerCycle, opsPerCycle, gops, tops: gops / 1000 };
  }

  assignment(): LaneAssignment {
    return {
      lanes: [...this.lanes.values()].map(lane => ({
        laneId: lane.id,
        triplet: { ...lane.triplet },
        labels: laneLabels(lane.triplet),
      })),
    };
  }
}
