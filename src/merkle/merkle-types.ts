import type { Element } from './element.js';

/**
 * SHA-256 digest as a lowercase 64-character hex string.
 */
export type Digest = string;

/**
 * Bit path from root to leaf, most significant bit first.
 * `true` selects the right child.
 */
export type BitPath = readonly boolean[];

export interface NodePair {
  readonly left: Digest;
  readonly right: Digest;
}

export interface MerkleVerificationRequest<F> {
  bitsIndex: BitPath;
  element: Element<F>;
  siblingHashes: readonly Digest[];
  root: Digest;
}

export interface MerkleVerificationResult {
  valid: boolean;
  recomputedRoot?: Digest;
  reason?: string;
}

export class MerkleTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MerkleTreeError';
  }
}

export class MalformedPathError extends MerkleTreeError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Malformed bit path: expected ${expected} bits, got ${actual}`);
    this.name = 'MalformedPathError';
  }
}

export class InconsistentStoreError extends MerkleTreeError {
  constructor(
    public readonly digest: Digest,
    public readonly depth: number
  ) {
    super(`Node ${digest} referenced at depth ${depth} is missing from the store`);
    this.name = 'InconsistentStoreError';
  }
}

export class UnknownRootError extends MerkleTreeError {
  constructor(public readonly root: Digest) {
    super(`Root ${root} was never held by this tree`);
    this.name = 'UnknownRootError';
  }
}

export class StoreCapacityError extends MerkleTreeError {
  constructor(
    public readonly limit: number,
    public readonly required: number
  ) {
    super(`Node store capacity exceeded: ${required} > ${limit}`);
    this.name = 'StoreCapacityError';
  }
}
