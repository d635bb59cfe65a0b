import { combineHashes } from './hashing.js';
import type { Digest, NodePair } from './merkle-types.js';
import { MerkleTreeError, StoreCapacityError } from './merkle-types.js';

/**
 * Content-addressed map from a node's digest to its child pair.
 *
 * Entries are insert-only and always keyed by `combineHashes(left, right)`.
 * Nodes orphaned by later updates are kept.
 */
export class NodeStore {
  private readonly nodes = new Map<Digest, NodePair>();

  /**
   * @param maxNodes - upper bound on entries, 0 for unbounded
   */
  constructor(readonly maxNodes = 0) {
    if (!Number.isInteger(maxNodes) || maxNodes < 0) {
      throw new MerkleTreeError(`Invalid store capacity: ${maxNodes}`);
    }
  }

  get size(): number {
    return this.nodes.size;
  }

  get(digest: Digest): NodePair | undefined {
    return this.nodes.get(digest);
  }

  has(digest: Digest): boolean {
    return this.nodes.has(digest);
  }

  /**
   * Store a pair under its own digest and return that digest.
   */
  put(pair: NodePair): Digest {
    const digest = combineHashes(pair.left, pair.right);
    this.ensureCapacity(this.nodes.has(digest) ? 0 : 1);
    this.nodes.set(digest, pair);
    return digest;
  }

  /**
   * Insert a batch of entries all-or-nothing. Every key is checked against
   * its pair and the capacity is checked before anything is written.
   */
  putAll(entries: ReadonlyArray<readonly [Digest, NodePair]>): void {
    const fresh = new Set<Digest>();
    for (const [digest, pair] of entries) {
      const expected = combineHashes(pair.left, pair.right);
      if (expected !== digest) {
        throw new MerkleTreeError(`Refusing node stored under ${digest}; its content hashes to ${expected}`);
      }
      if (!this.nodes.has(digest)) fresh.add(digest);
    }

    this.ensureCapacity(fresh.size);

    for (const [digest, pair] of entries) {
      this.nodes.set(digest, pair);
    }
  }

  entries(): IterableIterator<[Digest, NodePair]> {
    return this.nodes.entries();
  }

  private ensureCapacity(additional: number): void {
    if (this.maxNodes === 0) return;

    const required = this.nodes.size + additional;
    if (required > this.maxNodes) {
      throw new StoreCapacityError(this.maxNodes, required);
    }
  }
}
