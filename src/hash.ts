import { asciiLowerCase } from './entry.js';

const MASK_64 = (1n << 64n) - 1n;

/**
 * 64-bit fingerprint of an entry name for the archive's trailing hash table.
 *
 * The low word XORs the first half of the characters into 32 bits. The high
 * word folds every character into a 64-bit accumulator that is rotated by a
 * 32-bit-style rotate after each step. Existing tools compare against these
 * exact bits, so the arithmetic must not be "fixed".
 */
export function nameHash(name: string): bigint {
  const codes: number[] = [];
  for (const ch of asciiLowerCase(name)) {
    codes.push(ch.codePointAt(0) ?? 0);
  }

  const half = codes.length >> 1;
  let low = 0;
  let shift = 0;
  for (let i = 0; i < half; i++) {
    low = (low ^ (codes[i] << (shift & 0x1f))) >>> 0;
    shift += 8;
  }

  let high = 0n;
  shift = 0;
  for (const code of codes) {
    const temp = (code << (shift & 0x1f)) >>> 0;
    high ^= BigInt(temp);
    const n = BigInt(temp & 0x1f);
    high = ((high << (32n - n)) | (high >> n)) & MASK_64;
    shift += 8;
  }

  return (BigInt(low) | (high << 32n)) & MASK_64;
}
