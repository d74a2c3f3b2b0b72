/**
 * Mwp — a 64-bit MCG xor'd with a Weyl sequence, then permuted.
 *
 * The 32-bit and 64-bit outputs use different permutations (XSH RR and
 * RXS M XS) over the same advance, so `nextU64` is not two `nextU32` calls.
 */

import type { CloneableSource } from "../types";
import { checkSeedLength, fillBytesViaNext, readU64LE } from "../serialize";
import { u64 } from "@/utils/bits";
import { PCG_MULTIPLIER_64, xshRr } from "../permute";

const WEYL_INCREMENT = 1442695040888963407n;

export class Mwp implements CloneableSource<Mwp> {
  static readonly SEED_LENGTH = 16;

  private m: bigint;
  private w: bigint;

  private constructor(m: bigint, w: bigint) {
    this.m = m;
    this.w = w;
  }

  static fromSeed(seed: Uint8Array): Mwp {
    checkSeedLength("mwp", seed, Mwp.SEED_LENGTH);
    const [m, w] = readU64LE(seed, 2);
    return new Mwp(m | 1n, w);
  }

  get multiplierWord(): bigint {
    return this.m;
  }

  private advance(): bigint {
    this.m = u64(this.m * PCG_MULTIPLIER_64);
    this.w = u64(this.w + WEYL_INCREMENT);
    return this.m ^ this.w;
  }

  nextU32(): number {
    return xshRr(this.advance());
  }

  nextU64(): bigint {
    let state = this.advance();
    // RXS M XS: random xorshift, multiply, fixed xorshift
    const rshift = state >> 59n;
    state ^= state >> (5n + rshift);
    state = u64(state * PCG_MULTIPLIER_64);
    return state ^ (state >> 42n);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 8, next: () => this.nextU64() });
  }

  clone(): Mwp {
    return new Mwp(this.m, this.w);
  }
}
