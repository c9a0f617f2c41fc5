/**
 * Runs the programs under samples/ the way the CLI does: the JSON file is
 * the configuration and the .tasm file replaces its program.
 */
import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { Accelerator } from './accelerator';
import { AnalyticPhysicsValidator } from './physics';
import type { RunReport } from './types';

const SAMPLES = new URL('../../samples/', import.meta.url);

async function runSample(name: string): Promise<RunReport> {
  const parsed: unknown = JSON.parse(readFileSync(new URL(`${name}.json`, SAMPLES), 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) throw new Error(`${name}.json is not an object`);
  const program = readFileSync(new URL(`${name}.tasm`, SAMPLES), 'utf-8');
  const accelerator = await Accelerator.create({ ...parsed, program }, new AnalyticPhysicsValidator());
  return accelerator.run();
}

function dataAt(report: RunReport, addr: number): string | undefined {
  return report.data.find(d => d.addr === addr)?.value;
}

describe('samples', () => {
  it('matvec: two lanes, opposite weights', async () => {
    const report = await runSample('matvec');
    expect(report.haltReason).toBe('halt');
    expect([8, 9, 10].map(a => dataAt(report, a))).toEqual(['-1', '-1', '1']);
    expect([12, 13, 14].map(a => dataAt(report, a))).toEqual(['1', '1', '-1']);
    expect(report.lanes.map(l => l.vectors)).toEqual([1, 1]);
    expect(report.physics.collisionFree).toBe(true);
  });

  it('countdown: loop on BR3', async () => {
    const report = await runSample('countdown');
    expect(report.haltReason).toBe('halt');
    expect(dataAt(report, 0)).toBe('15');
    expect(report.branches).toEqual({ predictions: 5, mispredictions: 2 });
    expect(report.totalCycles).toBe(25);
  });

  it('tiers: promote, add, demote', async () => {
    const report = await runSample('tiers');
    expect(dataAt(report, 1)).toBe('42');
    expect(report.registers.find(r => r.name === 'R0')?.tier).toBe(2);
    expect(report.totalCycles).toBe(19);
    expect(report.logDomain.effectiveAddSubCycles).toBe(9);
  });
});
