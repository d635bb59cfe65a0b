import crypto from 'crypto';
import type { Digest } from './merkle-types.js';

export const DIGEST_BYTES = 32;

/**
 * SHA-256 over the concatenation of the given byte chunks.
 */
export function hashBytes(chunks: readonly Uint8Array[]): Digest {
  const hasher = crypto.createHash('sha256');
  for (const chunk of chunks) {
    hasher.update(chunk);
  }
  return hasher.digest('hex');
}

/**
 * Parent digest of two children: SHA-256(left || right) over the raw bytes.
 */
export function combineHashes(left: Digest, right: Digest): Digest {
  return crypto
    .createHash('sha256')
    .update(Buffer.from(left, 'hex'))
    .update(Buffer.from(right, 'hex'))
    .digest('hex');
}

export function isDigest(value: string): boolean {
  return value.length === DIGEST_BYTES * 2 && /^[0-9a-f]+$/.test(value);
}
