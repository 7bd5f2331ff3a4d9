/**
 * 64-bit FNV-1a
 *
 * Fast non-cryptographic digest used for change detection.
 */

const FNV64_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV64_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();

export function fnv1a64(input: string): bigint {
  let hash = FNV64_OFFSET_BASIS;
  for (const byte of encoder.encode(input)) {
    hash ^= BigInt(byte);
    hash = (hash * FNV64_PRIME) & MASK_64;
  }
  return hash;
}

/**
 * Hex digest, always 16 characters
 */
export function fnv1a64Hex(input: string): string {
  return fnv1a64(input).toString(16).padStart(16, '0');
}
