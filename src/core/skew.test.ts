import { describe, it, expect } from 'vitest';
import { skew, validateSkew, maxArrayPEs, maxSquareSide, skewPicoseconds } from './skew';
import { ConfigurationError } from './errors';
import { TickClock } from './clock';

describe('clock skew', () => {
  it('matches the 729-PE baseline', () => {
    expect(skew(729)).toBeCloseTo(0.024, 10);
  });

  it('reaches the 5% limit around 960x960', () => {
    expect(skew(921600)).toBeCloseTo(0.05, 3);
    const budget = validateSkew(921600);
    expect(budget.nPEs).toBe(921600);
    expect(budget.threshold).toBe(0.05);
    expect(budget.pass).toBe(false);
    expect(validateSkew(959 * 959).pass).toBe(true);
  });

  it('finds the largest array within the threshold', () => {
    const n = maxArrayPEs();
    expect(skew(n)).toBeLessThanOrEqual(0.05);
    expect(skew(n + 1)).toBeGreaterThan(0.05);
    expect(maxSquareSide()).toBe(959);
  });

  it('rejects PE counts that are not integers above 1', () => {
    expect(() => skew(1)).toThrow(ConfigurationError);
    expect(() => skew(0)).toThrow(ConfigurationError);
    expect(() => skew(2.5)).toThrow(ConfigurationError);
  });

  it('honours a custom baseline', () => {
    expect(skew(1024, { pes: 32, fraction: 0.01 })).toBeCloseTo(0.02, 10);
  });

  it('converts skew to picoseconds of the clock period', () => {
    expect(skewPicoseconds(validateSkew(729), 1621)).toBeCloseTo(38.904, 6);
  });
});

describe('TickClock', () => {
  it('counts cycles and time units separately', () => {
    const clock = new TickClock();
    clock.advance();
    clock.advance(3);
    clock.charge(10);
    expect(clock.cycles).toBe(4);
    expect(clock.timeUnits).toBe(10);
    clock.reset();
    expect(clock.cycles).toBe(0);
    expect(clock.timeUnits).toBe(0);
    expect(() => clock.advance(-1)).toThrow(RangeError);
  });
});
