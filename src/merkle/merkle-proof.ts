import { assertPathLength } from './bit-path.js';
import type { Element } from './element.js';
import { combineHashes, isDigest } from './hashing.js';
import type { BitPath, Digest } from './merkle-types.js';
import { MerkleTreeError } from './merkle-types.js';

/**
 * Sibling path captured from a tree, root-to-leaf order.
 *
 * Holds no reference to the tree it came from: anyone with the claimed root,
 * the bit path and the leaf element can check it.
 */
export class Proof {
  readonly siblingHashes: readonly Digest[];

  constructor(siblingHashes: readonly Digest[]) {
    for (const sibling of siblingHashes) {
      if (!isDigest(sibling)) {
        throw new MerkleTreeError(`Invalid sibling digest: ${sibling}`);
      }
    }
    this.siblingHashes = Object.freeze([...siblingHashes]);
  }

  get length(): number {
    return this.siblingHashes.length;
  }

  /**
   * Fold the siblings from the leaf upward, composing each level exactly as
   * `BinaryTree.addElement` does.
   */
  calculateRoot<F>(bitsIndex: BitPath, element: Element<F>): Digest {
    assertPathLength(bitsIndex, this.siblingHashes.length);

    let current = element.computeHash();
    for (let depth = bitsIndex.length - 1; depth >= 0; depth--) {
      const sibling = this.siblingHashes[depth];
      current = bitsIndex[depth]
        ? combineHashes(sibling, current)
        : combineHashes(current, sibling);
    }
    return current;
  }

  /**
   * A mismatch is an ordinary `false`, not an error.
   */
  validate<F>(bitsIndex: BitPath, element: Element<F>, claimedRoot: Digest): boolean {
    return this.calculateRoot(bitsIndex, element) === claimedRoot;
  }
}
