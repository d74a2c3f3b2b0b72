/** Seed decoding and word-to-byte serialization shared by all engines. */

import { SeedLengthError } from "./errors";

type WordSource =
  | { bytes: 4; next: () => number }
  | { bytes: 8; next: () => bigint };

/**
 * Fill `dest` with successive little-endian words from `source.next`.
 * When `dest.length` is not a multiple of the word size, only the leading
 * bytes of the final word are written and the rest of it is dropped.
 */
export function fillBytesViaNext(dest: Uint8Array, source: WordSource): void {
  const view = new DataView(dest.buffer, dest.byteOffset, dest.byteLength);
  const full = dest.length - (dest.length % source.bytes);
  let offset = 0;

  if (source.bytes === 4) {
    for (; offset < full; offset += 4) {
      view.setUint32(offset, source.next(), true);
    }
    if (offset < dest.length) {
      writeTail(dest, offset, BigInt(source.next()));
    }
  } else {
    for (; offset < full; offset += 8) {
      view.setBigUint64(offset, source.next(), true);
    }
    if (offset < dest.length) {
      writeTail(dest, offset, source.next());
    }
  }
}

function writeTail(dest: Uint8Array, offset: number, word: bigint): void {
  let w = word;
  for (let i = offset; i < dest.length; i++) {
    dest[i] = Number(w & 0xffn);
    w >>= 8n;
  }
}

/** Throws SeedLengthError unless `seed` is exactly `expected` bytes */
export function checkSeedLength(generator: string, seed: Uint8Array, expected: number): void {
  if (seed.length !== expected) {
    throw new SeedLengthError(generator, expected, seed.length);
  }
}

export function readU32LE(seed: Uint8Array, count: number): number[] {
  const view = new DataView(seed.buffer, seed.byteOffset, seed.byteLength);
  const words: number[] = [];
  for (let i = 0; i < count; i++) words.push(view.getUint32(i * 4, true));
  return words;
}

export function readU64LE(seed: Uint8Array, count: number): bigint[] {
  const view = new DataView(seed.buffer, seed.byteOffset, seed.byteLength);
  const words: bigint[] = [];
  for (let i = 0; i < count; i++) words.push(view.getBigUint64(i * 8, true));
  return words;
}
