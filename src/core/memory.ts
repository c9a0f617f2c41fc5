/**
 * Three-tier memory: a small fast tier in front of two larger slow ones.
 *
 * Each stored value occupies one slot in exactly one tier. Placing into a
 * full tier demotes that tier's least recently used slot one level down,
 * cascading if the next tier is also full. Reads and writes charge the
 * current tier's latency to the shared clock.
 */
import { ConfigurationError, StateError } from './errors';
import { Word } from './word';
import type { TickClock } from './clock';
import type { SpillEvent, TierId, TierSpec, TierSnapshot } from './types';

interface Slot {
  value: Word;
  size: number;
  tier: TierId;
  lastUse: number;
}

const TIER_IDS: readonly TierId[] = [1, 2, 3];

function nextTier(tier: TierId): TierId | null {
  if (tier === 1) return 2;
  if (tier === 2) return 3;
  return null;
}

function prevTier(tier: TierId): TierId | null {
  if (tier === 3) return 2;
  if (tier === 2) return 1;
  return null;
}

export class TieredMemory {
  private readonly clock: TickClock;
  private readonly specs: readonly TierSpec[];
  private readonly wordTrits: number;
  private slots: Map<number, Slot> = new Map();
  private occupants: Map<TierId, Set<number>> = new Map();
  private spills: SpillEvent[] = [];
  private nextHandle = 1;
  private useCounter = 0;

  constructor(clock: TickClock, tiers: readonly TierSpec[], wordTrits: number) {
    if (tiers.length !== 3) {
      throw new ConfigurationError(`Tiered memory needs exactly 3 tiers, got ${tiers.length}`);
    }
    const issues: string[] = [];
    tiers.forEach((t, i) => {
      if (!Number.isInteger(t.capacity) || t.capacity <= 0) issues.push(`tier ${i + 1} capacity ${t.capacity}`);
      if (!(t.latency >= 0)) issues.push(`tier ${i + 1} latency ${t.latency}`);
      if (!Number.isInteger(t.accessCycles) || t.accessCycles < 1) issues.push(`tier ${i + 1} accessCycles ${t.accessCycles}`);
    });
    if (issues.length > 0) throw new ConfigurationError('Invalid tier specification', issues);
    this.clock = clock;
    this.specs = tiers.map(t => ({ ...t }));
    this.wordTrits = wordTrits;
    for (const id of TIER_IDS) this.occupants.set(id, new Set());
  }

  // ==========================================================================
  // Allocation
  // ==========================================================================

  allocate(size: number = this.wordTrits, tier: TierId = 1): number {
    if (!Number.isInteger(size) || size < 1) throw new RangeError(`Invalid allocation size ${size}`);
    const handle = this.nextHandle++;
    this.makeRoom(tier);
    this.place(handle, { value: Word.zero(size), size, tier, lastUse: this.touch() });
    return handle;
  }

  release(handle: number): void {
    const slot = this.slot(handle);
    this.tierSet(slot.tier).delete(handle);
    this.slots.delete(handle);
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  read(handle: number): Word {
    const slot = this.slot(handle);
    this.clock.charge(this.tierSpec(slot.tier).latency);
    slot.lastUse = this.touch();
    return slot.value;
  }

  write(handle: number, value: Word): void {
    const slot = this.slot(handle);
    slot.value = value.resize(slot.size);
    this.clock.charge(this.tierSpec(slot.tier).latency);
    slot.lastUse = this.touch();
  }

  /** Read without charging latency or updating recency. */
  peek(handle: number): Word {
    return this.slot(handle).value;
  }

  /** Write without charging latency or updating recency. */
  poke(handle: number, value: Word): void {
    const slot = this.slot(handle);
    slot.value = value.resize(slot.size);
  }

  // ==========================================================================
  // Tier movement
  // ==========================================================================

  /** Move one tier up. Returns the new tier; a tier-1 value stays put. */
  promote(handle: number): TierId {
    const slot = this.slot(handle);
    const from = slot.tier;
    const to = prevTier(from);
    if (to === null) return from;
    this.tierSet(from).delete(handle);
    this.makeRoom(to);
    slot.tier = to;
    slot.lastUse = this.touch();
    this.tierSet(to).add(handle);
    this.clock.charge(this.tierSpec(from).latency + this.tierSpec(to).latency);
    return to;
  }

  demote(handle: number): TierId {
    const slot = this.slot(handle);
    const from = slot.tier;
    const to = nextTier(from);
    if (to === null) throw new StateError(`Handle ${handle} is already in the last tier`);
    this.tierSet(from).delete(handle);
    this.makeRoom(to);
    slot.tier = to;
    this.tierSet(to).add(handle);
    this.clock.charge(this.tierSpec(from).latency + this.tierSpec(to).latency);
    return to;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  tierOf(handle: number): TierId {
    return this.slot(handle).tier;
  }

  tierSpec(tier: TierId): TierSpec {
    return this.specs[tier - 1];
  }

  accessCycles(handle: number): number {
    return this.tierSpec(this.tierOf(handle)).accessCycles;
  }

  has(handle: number): boolean {
    return this.slots.has(handle);
  }

  getSpills(): readonly SpillEvent[] {
    return this.spills;
  }

  snapshot(): TierSnapshot[] {
    return TIER_IDS.map(tier => {
      const spec = this.tierSpec(tier);
      return {
        tier,
        capacity: spec.capacity,
        latency: spec.latency,
        occupied: this.tierSet(tier).size,
        handles: this.lruOrder(tier),
      };
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private touch(): number {
    return ++this.useCounter;
  }

  private slot(handle: number): Slot {
    const slot = this.slots.get(handle);
    if (slot === undefined) throw new StateError(`Unknown memory handle ${handle}`);
    return slot;
  }

  private tierSet(tier: TierId): Set<number> {
    const set = this.occupants.get(tier);
    if (set === undefined) throw new StateError(`Unknown tier ${tier}`);
    return set;
  }

  private place(handle: number, slot: Slot): void {
    this.slots.set(handle, slot);
    this.tierSet(slot.tier).add(handle);
  }

  private lruOrder(tier: TierId): number[] {
    return [...this.tierSet(tier)].sort((a, b) => this.slot(a).lastUse - this.slot(b).lastUse);
  }

  /** Ensure `tier` has a free slot, demoting its LRU occupant down the chain. */
  private makeRoom(tier: TierId): void {
    const occupants = this.tierSet(tier);
    if (occupants.size < this.tierSpec(tier).capacity) return;
    const below = nextTier(tier);
    if (below === null) throw new StateError(`Tier ${tier} is full (${occupants.size} slots)`);
    const [victim] = this.lruOrder(tier);
    this.makeRoom(below);
    occupants.delete(victim);
    this.slot(victim).tier = below;
    this.tierSet(below).add(victim);
    this.spills.push({ handle: victim, from: tier, to: below });
  }
}
