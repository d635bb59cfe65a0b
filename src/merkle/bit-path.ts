import type { BitPath } from './merkle-types.js';
import { MalformedPathError, MerkleTreeError } from './merkle-types.js';

/**
 * Convert a leaf index into a `depth`-bit path, most significant bit first.
 *
 * Only the low `depth` bits are used; higher bits are dropped, so
 * `bitsToIndex(convertToBits(d, i))` yields `i mod 2^d`.
 */
export function convertToBits(depth: number, index: number | bigint): boolean[] {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new MerkleTreeError(`Invalid path depth: ${depth}`);
  }
  if (typeof index === 'number' && !Number.isSafeInteger(index)) {
    throw new MerkleTreeError(`Invalid leaf index: ${index}`);
  }

  const value = BigInt(index);
  if (value < 0n) {
    throw new MerkleTreeError(`Invalid leaf index: ${index}`);
  }

  const bits: boolean[] = [];
  for (let i = 0; i < depth; i++) {
    bits.push(((value >> BigInt(i)) & 1n) === 1n);
  }
  bits.reverse();
  return bits;
}

/**
 * Reinterpret an MSB-first bit path as a leaf index.
 */
export function bitsToIndex(bits: BitPath): bigint {
  let index = 0n;
  for (const bit of bits) {
    index = (index << 1n) | (bit ? 1n : 0n);
  }
  return index;
}

export function assertPathLength(bits: BitPath, height: number): void {
  if (bits.length !== height) {
    throw new MalformedPathError(height, bits.length);
  }
}
