/** Seed bytes 1, 2, 3, ... n */
export function countingSeed(n: number): Uint8Array {
  return Uint8Array.from({ length: n }, (_, i) => i + 1);
}

/** Seed built from little-endian 64-bit words */
export function seedFromWords(...words: bigint[]): Uint8Array {
  const seed = new Uint8Array(words.length * 8);
  const view = new DataView(seed.buffer);
  words.forEach((w, i) => view.setBigUint64(i * 8, w, true));
  return seed;
}

export function take<T>(n: number, next: () => T): T[] {
  return Array.from({ length: n }, () => next());
}
