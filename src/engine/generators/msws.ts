/**
 * Msws — Middle Square Weyl Sequence (Bernard Widynski).
 *
 * Period 2^64, 192 bits of state, 64-bit words, 128-bit seed.
 */

import type { CloneableSource, RandomSource } from "../types";
import { SeedValueError } from "../errors";
import { checkSeedLength, fillBytesViaNext, readU64LE } from "../serialize";
import { low32, rotl64, u64 } from "@/utils/bits";

const NAME = "msws";
const HIGH_BITS = 0xffffffff00000000n;

export class Msws implements CloneableSource<Msws> {
  static readonly SEED_LENGTH = 16;

  private x: bigint;
  private w: bigint;
  /** Weyl increment: odd, with non-zero high half */
  private readonly s: bigint;

  private constructor(x: bigint, w: bigint, s: bigint) {
    this.x = x;
    this.w = w;
    this.s = s;
  }

  static fromSeed(seed: Uint8Array): Msws {
    checkSeedLength(NAME, seed, Msws.SEED_LENGTH);
    const [first, second] = readU64LE(seed, 2);
    const stream = first | 1n;
    if ((stream & HIGH_BITS) === 0n) {
      throw new SeedValueError(NAME, first, "high 32 bits of the stream constant are zero");
    }
    return new Msws(second, 0n, stream);
  }

  /** Seed from another generator, redrawing the stream constant until it is usable */
  static fromRng(source: RandomSource): Msws {
    let stream: bigint;
    do {
      stream = source.nextU64() | 1n;
    } while ((stream & HIGH_BITS) === 0n);
    return new Msws(source.nextU64(), 0n, stream);
  }

  nextU32(): number {
    return low32(this.nextU64());
  }

  nextU64(): bigint {
    this.x = u64(this.x * this.x);
    this.w = u64(this.w + this.s);
    this.x = u64(this.x + this.w);
    return rotl64(this.x, 32);
  }

  fillBytes(dest: Uint8Array): void {
    fillBytesViaNext(dest, { bytes: 8, next: () => this.nextU64() });
  }

  clone(): Msws {
    return new Msws(this.x, this.w, this.s);
  }
}
