/**
 * Xsm32 — XSM by Chris Doty-Humphrey (PractRand), 32-bit version.
 *
 * Period 2^64, 95 bits of state, 32-bit words, 96-bit seed.
 */

import type { CloneableSource } from "../types";
import { checkSeedLength, fillBytesViaNext, readU32LE } from "../serialize";
import { add32, mul32, pack64, rotl32 } from "@/utils/bits";

const K = 0x6595a395;

export class Xsm32 implements CloneableSource<Xsm32> {
  static readonly SEED_LENGTH = 12;

  private lcgLow: number;
  private lcgHigh: number;
  private readonly lcgAdder: number;
  private history: number;

  private constructor(lcgLow: number, lcgHigh: number, lcgAdder: number, history: number) {
    this.lcgLow = lcgLow;
    this.lcgHigh = lcgHigh;
    this.lcgAdder = lcgAdder;
    this.history = history;
  }

  static fromSeed(seed: Uint8Array): Xsm32 {
    checkSeedLength("xsm32", seed, Xsm32.SEED_LENGTH);
    const [low, high, adder] = readU32LE(seed, 3);
    const rng = new Xsm32(low, high, (adder | 1) >>> 0, 0);
    // mix history before the first visible output
    rng.nextU32();
    return rng;
  }

  get adderWord(): number {
    return this.lcgAdder;
  }

  nextU32(): number {
    let rv = mul32(this.history, K);
    const tmp = mul32(add32(this.lcgHigh, rotl32(this.lcgHigh ^ this.lcgLow, 11)), K);

    const oldLow = this.lcgLow;
    this.lcgLow = add32(this.lcgLow, this.lcgAdder);
    const carry = this.lcgLow < this.lcgAdder ? 1 : 0;
    this.lcgHigh = add32(this.lcgHigh, add32(oldLow, carry));

    rv = (rv ^ (rv >>> 16)) >>> 0;
    this.history = (tmp ^ (tmp >>> 16)) >>> 0;
    return add32(rv, this.history);
  }

  nextU64(): bigint {
    const lo = this.nextU32();
    const hi = this.nextU32();
    return pack64(lo, hi);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 4, next: () => this.nextU32() });
  }

  clone(): Xsm32 {
    return new Xsm32(this.lcgLow, this.lcgHigh, this.lcgAdder, this.history);
  }
}
