import { describe, it, expect } from 'vitest';
import { LaneMultiplexer, checkLaneCollisions } from './lanes';
import { SystolicArray } from './systolic';
import { TickClock } from './clock';
import { WDM_TRIPLETS } from './constants';
import { ConfigurationError, StateError } from './errors';

function xorshift32(seed: number): () => number {
  let s = seed >>> 0 || 1;
  return () => {
    s ^= s << 13; s >>>= 0;
    s ^= s >>> 17;
    s ^= s << 5; s >>>= 0;
    return s;
  };
}

function randomVector(rng: () => number, length = 3): number[] {
  return Array.from({ length }, () => (rng() % 3) - 1);
}

const IDENTITY = [[1, 0, 0], [0, 1, 0], [0, 0, 1]];

function bound(count: number, subChannels = 1) {
  const clock = new TickClock();
  const mux = LaneMultiplexer.fromTriplets(count, subChannels, clock);
  const arrays = mux.laneIds().map(id => {
    const array = new SystolicArray(3, 3, clock);
    mux.bindLane(id, array);
    return array;
  });
  return { clock, mux, arrays };
}

describe('lane collision check', () => {
  it('accepts the built-in triplets', () => {
    expect(() => checkLaneCollisions(WDM_TRIPLETS.map((triplet, i) => ({ id: i + 1, triplet, enabled: true }))))
      .not.toThrow();
  });

  it('rejects two lanes on the same wavelengths', () => {
    const clock = new TickClock();
    const triplet = WDM_TRIPLETS[0];
    expect(() => new LaneMultiplexer([
      { id: 1, triplet, enabled: true },
      { id: 2, triplet, enabled: true },
    ], 1, clock)).toThrow(ConfigurationError);
  });

  it('rejects a triplet whose (-1,+1) output misses the zero bin', () => {
    const clock = new TickClock();
    expect(() => new LaneMultiplexer([
      { id: 1, triplet: { neg: 1100, zero: 1000, pos: 900 }, enabled: true },
    ], 1, clock)).toThrow(ConfigurationError);
  });

  it('limits the lane count to the available triplets', () => {
    expect(() => LaneMultiplexer.fromTriplets(7, 1, new TickClock())).toThrow(ConfigurationError);
  });
});

describe('LaneMultiplexer', () => {
  it('counts effective channels from enabled lanes only', () => {
    const clock = new TickClock();
    const mux = LaneMultiplexer.fromTriplets(3, 4, clock, { disabled: [2] });
    expect(mux.effectiveChannels()).toBe(8);
    mux.setEnabled(2, true);
    expect(mux.effectiveChannels()).toBe(12);
  });

  it('gives each lane its own array', () => {
    const { mux, arrays } = bound(2);
    expect(() => mux.bindLane(2, arrays[0])).toThrow(ConfigurationError);
    expect(mux.getArray(1)).toBe(arrays[0]);
  });

  it('runs lanes in lockstep without crosstalk', () => {
    const { clock, mux, arrays } = bound(2);
    arrays[0].loadWeights([[1, 0, 0], [0, 1, 0], [0, 0, 1]]);
    arrays[1].loadWeights([[-1, 0, 0], [0, -1, 0], [0, 0, -1]]);
    const start = clock.cycles;
    const [one, two] = mux.dispatchConcurrent(new Map([
      [1, [[1, 0, -1], [1, 1, 1]]],
      [2, [[1, 0, -1], [-1, 1, 0]]],
    ]));
    expect(one.outputs.map(v => v.map(w => w.toNumber()))).toEqual([[1, 0, -1], [1, 1, 1]]);
    expect(two.outputs.map(v => v.map(w => w.toNumber()))).toEqual([[-1, 0, 1], [1, -1, 0]]);
    expect(one.cycles).toBe(6);
    expect(two.cycles).toBe(6);
    expect(clock.cycles - start).toBe(6);
  });

  it('keeps lane 1 unchanged whatever lane 2 carries', () => {
    const weights = [[1, -1, 0], [0, 1, 1], [-1, 0, 1]];
    const stream = [[1, 1, 0], [-1, 0, 1], [0, 1, -1], [1, -1, 1]];
    const solo = bound(1);
    solo.arrays[0].loadWeights(weights);
    const expected = solo.mux.dispatch(1, stream);
    expect(expected.outputs.map(v => v.map(w => w.toNumber())))
      .toEqual([[0, 1, -1], [-1, 1, 2], [-1, 0, -1], [2, 0, 0]]);

    for (const seed of [3, 17, 99, 1234, 0xdecade]) {
      const rng = xorshift32(seed);
      const { mux, arrays } = bound(2);
      arrays[0].loadWeights(weights);
      arrays[1].loadWeights([randomVector(rng), randomVector(rng), randomVector(rng)]);
      const noise = Array.from({ length: 1 + (rng() % 6) }, () => randomVector(rng));
      const [one] = mux.dispatchConcurrent(new Map([[1, stream], [2, noise]]));
      expect(one.outputs).toEqual(expected.outputs);
      expect(one.cycles).toBe(expected.cycles);
    }
  });

  it('broadcasts weights and vectors to every enabled lane', () => {
    const { clock, mux, arrays } = bound(3);
    mux.setEnabled(3, false);
    const weights = [[1, 1, 0], [0, 1, 1], [1, 0, 1]];
    expect(mux.broadcastWeights(weights)).toBe(3);
    expect(clock.cycles).toBe(3);
    expect(arrays[0].weights()).toEqual(weights);
    expect(arrays[1].weights()).toEqual(weights);
    expect(arrays[2].weights()[0]).toEqual([null, null, null]);

    const [one, two, three] = mux.dispatchBroadcast([[1, 0, -1], [1, 1, 1]]);
    for (const lane of [one, two]) {
      expect(lane.accepted).toBe(true);
      expect(lane.outputs.map(v => v.map(w => w.toNumber()))).toEqual([[1, -1, 0], [2, 2, 2]]);
      expect(lane.cycles).toBe(6);
    }
    expect(three).toEqual({ laneId: 3, accepted: false, outputs: [], vectors: 0, cycles: 0 });
  });

  it('splits a batch across lanes in chunks of the lane count', () => {
    const { mux } = bound(2);
    mux.broadcastWeights(IDENTITY);
    const batch = [[1, 0, 0], [0, -1, 0], [1, 1, 1], [-1, 0, 1], [0, 0, 1]];
    const { outputs, cycles } = mux.dispatchBatch(batch);
    expect(outputs.map(v => v.map(w => w.toNumber()))).toEqual(batch);
    expect(cycles).toBe(9);
    expect(mux.throughput().map(t => t.vectors)).toEqual([3, 2]);
  });

  it('keeps a batch off disabled lanes', () => {
    const { mux } = bound(2);
    mux.setEnabled(2, false);
    mux.broadcastWeights(IDENTITY);
    const batch = [[1, 0, 0], [0, 1, 0], [0, 0, -1]];
    const { outputs, cycles } = mux.dispatchBatch(batch);
    expect(outputs.map(v => v.map(w => w.toNumber()))).toEqual(batch);
    expect(cycles).toBe(9);
    expect(mux.throughput().map(t => t.vectors)).toEqual([3, 0]);
    mux.setEnabled(1, false);
    expect(() => mux.dispatchBatch(batch)).toThrow(StateError);
  });

  it('computes the theoretical peak from enabled lanes', () => {
    const { mux } = bound(2, 2);
    const peak = mux.theoreticalThroughput(1250);
    expect(peak).toMatchObject({ clockMhz: 800, macsPerCycle: 36, opsPerCycle: 72, gops: 57.6 });
    expect(peak.tops).toBeCloseTo(0.0576, 6);
    mux.setEnabled(2, false);
    expect(mux.theoreticalThroughput(1250).macsPerCycle).toBe(18);
  });

  it('reports throughput per lane', () => {
    const { mux, arrays } = bound(2, 2);
    arrays[0].loadWeights([[1, 1, 1], [1, 1, 1], [1, 1, 1]]);
    mux.dispatch(1, [[1, 1, 1], [0, 0, 0]]);
    const [lane1, lane2] = mux.throughput();
    expect(lane1).toEqual({
      laneId: 1,
      enabled: true,
      subChannels: 2,
      vectors: 2,
      macs: 18,
      activeCycles: 9,
      macsPerCycle: 2,
      effectiveMacsPerCycle: 4,
    });
    expect(lane2.macs).toBe(0);
    expect(lane2.macsPerCycle).toBe(0);
  });

  it('declines work on a disabled lane', () => {
    const { mux } = bound(2);
    mux.setEnabled(2, false);
    expect(mux.dispatch(2, [[1, 1, 1]])).toEqual({ laneId: 2, accepted: false, outputs: [], vectors: 0, cycles: 0 });
  });

  it('fails on a lane with no array', () => {
    const mux = LaneMultiplexer.fromTriplets(1, 1, new TickClock());
    expect(() => mux.dispatch(1, [[1]])).toThrow(StateError);
  });

  it('describes its wavelength assignment', () => {
    const { mux } = bound(2);
    const { lanes } = mux.assignment();
    expect(lanes.map(l => l.laneId)).toEqual([1, 2]);
    expect(lanes[0].labels).toEqual([520, 515, 510, 505, 500]);
    expect(lanes[1].triplet).toEqual({ neg: 1100, zero: 1080, pos: 1060 });
  });
});
