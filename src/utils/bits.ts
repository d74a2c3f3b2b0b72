/** Wrapping unsigned arithmetic on 32-bit numbers and 64/128-bit bigints. */

export const MASK32 = 0xffffffffn;

export function u64(v: bigint): bigint {
  return BigInt.asUintN(64, v);
}

export function u128(v: bigint): bigint {
  return BigInt.asUintN(128, v);
}

/** Low 32 bits of a bigint as an unsigned number */
export function low32(v: bigint): number {
  return Number(v & MASK32);
}

export function rotl32(x: number, r: number): number {
  const n = r & 31;
  return ((x << n) | (x >>> ((32 - n) & 31))) >>> 0;
}

export function rotr32(x: number, r: number): number {
  const n = r & 31;
  return ((x >>> n) | (x << ((32 - n) & 31))) >>> 0;
}

export function rotl64(x: bigint, r: number): bigint {
  const n = BigInt(r & 63);
  return u64((x << n) | (x >> ((64n - n) & 63n)));
}

export function rotr64(x: bigint, r: number): bigint {
  const n = BigInt(r & 63);
  return u64((x >> n) | (x << ((64n - n) & 63n)));
}

export function mul32(a: number, b: number): number {
  return Math.imul(a, b) >>> 0;
}

export function add32(a: number, b: number): number {
  return (a + b) >>> 0;
}

/** Packs two 32-bit words low-word-first */
export function pack64(lo: number, hi: number): bigint {
  return (BigInt(hi >>> 0) << 32n) | BigInt(lo >>> 0);
}
