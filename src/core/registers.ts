/**
 * Named registers over tiered memory. The file only maps names to memory
 * handles; the values, their tier and their access cost belong to memory.
 */
import { REGISTER_BANKS, homeTier } from './constants';
import { StateError } from './errors';
import type { TieredMemory } from './memory';
import type { Word } from './word';
import type { RegisterSnapshot, TierId } from './types';

export class RegisterFile {
  private readonly memory: TieredMemory;
  private readonly wordTrits: number;
  private handles: Map<string, number> = new Map();

  constructor(memory: TieredMemory, wordTrits: number) {
    this.memory = memory;
    this.wordTrits = wordTrits;
  }

  // Bound on first use, in the register's home tier
  private handle(name: string): number {
    const existing = this.handles.get(name);
    if (existing !== undefined) return existing;
    const tier = homeTier(name);
    if (tier === null) throw new StateError(`Unknown register ${name}`);
    const h = this.memory.allocate(this.wordTrits, tier);
    this.handles.set(name, h);
    return h;
  }

  read(name: string): Word {
    return this.memory.read(this.handle(name));
  }

  write(name: string, value: Word): void {
    this.memory.write(this.handle(name), value);
  }

  /** Initial value; no latency is charged. */
  seed(name: string, value: Word): void {
    this.memory.poke(this.handle(name), value);
  }

  peek(name: string): Word {
    return this.memory.peek(this.handle(name));
  }

  tierOf(name: string): TierId {
    return this.memory.tierOf(this.handle(name));
  }

  accessCycles(name: string): number {
    return this.memory.accessCycles(this.handle(name));
  }

  tier1AccessCycles(): number {
    return this.memory.tierSpec(1).accessCycles;
  }

  promote(name: string): TierId {
    return this.memory.promote(this.handle(name));
  }

  demote(name: string): TierId {
    return this.memory.demote(this.handle(name));
  }

  /** Registers in bank order; unbound registers are omitted. */
  snapshot(): RegisterSnapshot[] {
    const out: RegisterSnapshot[] = [];
    for (const tier of [1, 2, 3] as const) {
      for (const name of REGISTER_BANKS[tier]) {
        const h = this.handles.get(name);
        if (h === undefined) continue;
        const value = this.memory.peek(h);
        out.push({
          name,
          tier: this.memory.tierOf(h),
          value: value.toBigInt().toString(),
          trits: value.toString(),
        });
      }
    }
    return out;
  }
}
