/**
 * Shared time base. One instance is owned by the Accelerator and handed to
 * every component; cycles advance once per tick, time units accumulate the
 * latency charged by memory accesses and weight writes.
 */
export class TickClock {
  private _cycles = 0;
  private _timeUnits = 0;

  get cycles(): number {
    return this._cycles;
  }

  get timeUnits(): number {
    return this._timeUnits;
  }

  advance(cycles: number = 1): void {
    if (!Number.isInteger(cycles) || cycles < 0) throw new RangeError(`Invalid cycle count ${cycles}`);
    this._cycles += cycles;
  }

  charge(units: number): void {
    if (!(units >= 0)) throw new RangeError(`Invalid time-unit charge ${units}`);
    this._timeUnits += units;
  }

  reset(): void {
    this._cycles = 0;
    this._timeUnits = 0;
  }
}
