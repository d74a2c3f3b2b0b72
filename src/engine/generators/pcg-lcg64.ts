/**
 * PCG generators over a 64-bit LCG with 32-bit output.
 *
 * Both variants share seeding and the LCG advance; they differ only in the
 * output permutation (xorshift-high vs xorshift-low, then a random rotate).
 */

import type { CloneableSource } from "../types";
import { checkSeedLength, fillBytesViaNext, readU64LE } from "../serialize";
import { pack64, u64 } from "@/utils/bits";
import { PCG_MULTIPLIER_64, xshRr, xslRr } from "../permute";

function seedLcg(name: string, seed: Uint8Array): { state: bigint; increment: bigint } {
  checkSeedLength(name, seed, 16);
  const [state, inc] = readU64LE(seed, 2);
  const increment = inc | 1n;
  // first round
  return { state: u64(state * PCG_MULTIPLIER_64 + increment), increment };
}

/** PCG XSH RR 64/32 (LCG) */
export class PcgXsh64Lcg implements CloneableSource<PcgXsh64Lcg> {
  static readonly SEED_LENGTH = 16;

  private state: bigint;
  private readonly increment: bigint;

  private constructor(state: bigint, increment: bigint) {
    this.state = state;
    this.increment = increment;
  }

  static fromSeed(seed: Uint8Array): PcgXsh64Lcg {
    const { state, increment } = seedLcg("pcg_xsh_64_lcg", seed);
    return new PcgXsh64Lcg(state, increment);
  }

  get stateWord(): bigint {
    return this.state;
  }

  get incrementWord(): bigint {
    return this.increment;
  }

  nextU32(): number {
    const old = this.state;
    this.state = u64(old * PCG_MULTIPLIER_64 + this.increment);
    return xshRr(old);
  }

  nextU64(): bigint {
    const lo = this.nextU32();
    const hi = this.nextU32();
    return pack64(lo, hi);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 4, next: () => this.nextU32() });
  }

  clone(): PcgXsh64Lcg {
    return new PcgXsh64Lcg(this.state, this.increment);
  }
}

/** PCG XSL RR 64/32 (LCG) */
export class PcgXsl64Lcg implements CloneableSource<PcgXsl64Lcg> {
  static readonly SEED_LENGTH = 16;

  private state: bigint;
  private readonly increment: bigint;

  private constructor(state: bigint, increment: bigint) {
    this.state = state;
    this.increment = increment;
  }

  static fromSeed(seed: Uint8Array): PcgXsl64Lcg {
    const { state, increment } = seedLcg("pcg_xsl_64_lcg", seed);
    return new PcgXsl64Lcg(state, increment);
  }

  get stateWord(): bigint {
    return this.state;
  }

  get incrementWord(): bigint {
    return this.increment;
  }

  nextU32(): number {
    const old = this.state;
    this.state = u64(old * PCG_MULTIPLIER_64 + this.increment);
    return xslRr(old);
  }

  nextU64(): bigint {
    const lo = this.nextU32();
    const hi = this.nextU32();
    return pack64(lo, hi);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 4, next: () => this.nextU32() });
  }

  clone(): PcgXsl64Lcg {
    return new PcgXsl64Lcg(this.state, this.increment);
  }
}
