/**
 * One's complement of the modulo-256 byte sum.
 * For any bytes b: (sum(b) + computeChecksum(b)) % 256 === 0xFF
 */
export function computeChecksum(data: Uint8Array): number {
  let sum = 0;
  for (const byte of data) {
    sum = (sum + byte) & 0xFF;
  }
  return 0xFF - sum;
}

export function verifyChecksum(data: Uint8Array, claimed: number): boolean {
  return computeChecksum(data) === claimed;
}
