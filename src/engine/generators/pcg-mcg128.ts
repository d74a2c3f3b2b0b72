/** PCG XSL RR 128/64 over a 128-bit multiplicative congruential generator. */

import type { CloneableSource } from "../types";
import { checkSeedLength, fillBytesViaNext, readU64LE } from "../serialize";
import { low32, rotr64, u128, u64 } from "@/utils/bits";

export const PCG_MULTIPLIER_128 = (2549297995355413924n << 64n) | 4865540595714422341n;

export class PcgXsl128Mcg implements CloneableSource<PcgXsl128Mcg> {
  static readonly SEED_LENGTH = 16;

  private state: bigint;

  private constructor(state: bigint) {
    this.state = state;
  }

  /** First seed word fills the high half of the state, second the low half */
  static fromSeed(seed: Uint8Array): PcgXsl128Mcg {
    checkSeedLength("pcg_xsl_128_mcg", seed, PcgXsl128Mcg.SEED_LENGTH);
    const [high, low] = readU64LE(seed, 2);
    return new PcgXsl128Mcg(u128(((high << 64n) | low) * PCG_MULTIPLIER_128));
  }

  nextU32(): number {
    return low32(this.nextU64());
  }

  nextU64(): bigint {
    const old = this.state;
    this.state = u128(old * PCG_MULTIPLIER_128);
    const xsl = u64(old >> 64n) ^ u64(old);
    return rotr64(xsl, Number(old >> 122n));
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 8, next: () => this.nextU64() });
  }

  clone(): PcgXsl128Mcg {
    return new PcgXsl128Mcg(this.state);
  }
}
