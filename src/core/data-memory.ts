import { StateError } from './errors';
import { Word } from './word';
import type { DataSnapshot } from './types';

/** Flat word-addressed data memory behind LDn/STn, STREAM and DRAIN. */
export class DataMemory {
  readonly size: number;
  readonly wordTrits: number;
  private words: Word[];

  constructor(size: number, wordTrits: number) {
    this.size = size;
    this.wordTrits = wordTrits;
    this.words = Array.from({ length: size }, () => Word.zero(wordTrits));
  }

  private check(addr: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr >= this.size) {
      throw new StateError(`Data address ${addr} out of range (0..${this.size - 1})`);
    }
  }

  read(addr: number): Word {
    this.check(addr);
    return this.words[addr];
  }

  write(addr: number, value: Word): void {
    this.check(addr);
    this.words[addr] = value.resize(this.wordTrits);
  }

  /** Non-zero words only, in address order. */
  snapshot(): DataSnapshot[] {
    const out: DataSnapshot[] = [];
    this.words.forEach((w, addr) => {
      if (!w.isZero()) out.push({ addr, value: w.toBigInt().toString(), trits: w.toString() });
    });
    return out;
  }
}
