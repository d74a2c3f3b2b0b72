/** PCG output permutations and the 64-bit LCG multiplier they are used with. */

import { low32, rotr32 } from "@/utils/bits";

export const PCG_MULTIPLIER_64 = 6364136223846793005n;

/** XSH RR: xorshift high bits (shift 18, spare 27), rotate by bits 59..63 */
export function xshRr(state: bigint): number {
  const xsh = low32(((state >> 18n) ^ state) >> 27n);
  return rotr32(xsh, Number(state >> 59n));
}

/** XSL RR: high half xor low half, rotate by bits 59..63 */
export function xslRr(state: bigint): number {
  const xsl = (low32(state >> 32n) ^ low32(state)) >>> 0;
  return rotr32(xsl, Number(state >> 59n));
}
