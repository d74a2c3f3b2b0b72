/** Contracts shared by every generator engine. */

/**
 * A deterministic source of random words.
 *
 * `nextU64` values are bigints in [0, 2^64); `nextU32` values are numbers
 * in [0, 2^32). Each engine derives one width from the other, except MWP,
 * which has two independent output functions.
 */
export interface RandomSource {
  nextU32(): number;
  nextU64(): bigint;
  /** Fills `dest` completely, advancing the generator */
  fillBytes(dest: Uint8Array): void;
}

/** A RandomSource whose state can be copied */
export interface CloneableSource<G extends RandomSource> extends RandomSource {
  clone(): G;
}

/** Static side of an engine class: a fixed seed size and a constructor from it */
export interface SeedableGenerator<G extends RandomSource> {
  readonly SEED_LENGTH: number;
  fromSeed(seed: Uint8Array): G;
}

/** Native output width, used when serializing to bytes */
export type WordBits = 32 | 64;
