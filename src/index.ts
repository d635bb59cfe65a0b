import { getTreeConfig } from './config/tree-config.js';
import { BinaryTree } from './merkle/binary-tree.js';
import type { TreeOptions } from './merkle/binary-tree.js';
import type { Element } from './merkle/element.js';

export type { ScalarField } from './field/scalar-field.js';
export { pallasBase, toPallas, PALLAS_MODULUS } from './field/pallas.js';

export { Element } from './merkle/element.js';
export { BinaryTree, computeDefaultDigests } from './merkle/binary-tree.js';
export type { TreeOptions } from './merkle/binary-tree.js';
export { NodeStore } from './merkle/node-store.js';
export { Proof } from './merkle/merkle-proof.js';
export { verifyMerkleProof } from './merkle/merkle-validator.js';
export { convertToBits, bitsToIndex, assertPathLength } from './merkle/bit-path.js';
export { combineHashes, hashBytes, DIGEST_BYTES } from './merkle/hashing.js';
export {
  MerkleTreeError,
  MalformedPathError,
  InconsistentStoreError,
  UnknownRootError,
  StoreCapacityError,
} from './merkle/merkle-types.js';
export type {
  Digest,
  BitPath,
  NodePair,
  MerkleVerificationRequest,
  MerkleVerificationResult,
} from './merkle/merkle-types.js';

export { checkTreeInvariants, enforceTreeInvariants } from './invariants/checker.js';
export { TreeInvariantViolationError } from './invariants/violations.js';
export type { InvariantID, InvariantViolation, TreeSnapshot } from './invariants/types.js';

export { loadTreeConfig, getTreeConfig, resetTreeConfig, TREE_LIMITS } from './config/tree-config.js';
export type { TreeConfig } from './config/tree-config.js';
export { logger } from './observability/logger.js';
export { metrics } from './metrics/metrics.js';
export type { MetricsSnapshot } from './metrics/metrics.js';

/**
 * Empty tree at the configured default height (SMT_DEFAULT_HEIGHT).
 */
export function createTree<F>(emptyValue: Element<F>, options: TreeOptions = {}): BinaryTree<F> {
  return BinaryTree.initialize(emptyValue, getTreeConfig().defaultHeight, options);
}
