export function formatHex64(v: bigint): string {
  return "0x" + v.toString(16).padStart(16, "0");
}

export function formatHex32(n: number): string {
  return "0x" + (n >>> 0).toString(16).padStart(8, "0");
}

/** Hex dump of a byte buffer, two lowercase digits per byte */
export function formatBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, "0")).join("");
}
