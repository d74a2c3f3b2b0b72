/**
 * Xsm64 — XSM by Chris Doty-Humphrey (PractRand), 64-bit version.
 *
 * Period 2^128, 191 bits of state, 64-bit words, 192-bit seed.
 */

import type { CloneableSource } from "../types";
import { checkSeedLength, fillBytesViaNext, readU64LE } from "../serialize";
import { low32, rotl64, u64 } from "@/utils/bits";

const K = 0xa3ec647659359acdn;

export class Xsm64 implements CloneableSource<Xsm64> {
  static readonly SEED_LENGTH = 24;

  private lcgLow: bigint;
  private lcgHigh: bigint;
  private readonly lcgAdder: bigint;
  private history: bigint;

  private constructor(lcgLow: bigint, lcgHigh: bigint, lcgAdder: bigint, history: bigint) {
    this.lcgLow = lcgLow;
    this.lcgHigh = lcgHigh;
    this.lcgAdder = lcgAdder;
    this.history = history;
  }

  static fromSeed(seed: Uint8Array): Xsm64 {
    checkSeedLength("xsm64", seed, Xsm64.SEED_LENGTH);
    const [low, high, adder] = readU64LE(seed, 3);
    const rng = new Xsm64(low, high, adder | 1n, 0n);
    rng.nextU64();
    return rng;
  }

  get adderWord(): bigint {
    return this.lcgAdder;
  }

  nextU32(): number {
    return low32(this.nextU64());
  }

  nextU64(): bigint {
    const h = u64(this.history * K);
    const tmp = u64(u64(this.lcgHigh + rotl64(this.lcgHigh ^ this.lcgLow, 19)) * K);

    const oldLow = this.lcgLow;
    this.lcgLow = u64(this.lcgLow + this.lcgAdder);
    const carry = this.lcgLow < this.lcgAdder ? 1n : 0n;
    this.lcgHigh = u64(this.lcgHigh + oldLow + carry);

    const oldMixed = h ^ (h >> 32n);
    this.history = tmp ^ (tmp >> 32n);
    return u64(tmp + oldMixed);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 8, next: () => this.nextU64() });
  }

  clone(): Xsm64 {
    return new Xsm64(this.lcgLow, this.lcgHigh, this.lcgAdder, this.history);
  }
}
