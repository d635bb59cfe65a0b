import { getTreeConfig, TREE_LIMITS } from '../config/tree-config.js';
import { enforceTreeInvariants } from '../invariants/checker.js';
import type { TreeSnapshot } from '../invariants/types.js';
import { TreeInvariantViolationError } from '../invariants/violations.js';
import { metrics } from '../metrics/metrics.js';
import { abbreviate, generateTreeId, logger } from '../observability/logger.js';
import { assertPathLength } from './bit-path.js';
import type { Element } from './element.js';
import { combineHashes } from './hashing.js';
import { Proof } from './merkle-proof.js';
import type { BitPath, Digest, NodePair } from './merkle-types.js';
import {
  InconsistentStoreError,
  MalformedPathError,
  MerkleTreeError,
  StoreCapacityError,
  UnknownRootError,
} from './merkle-types.js';
import { NodeStore } from './node-store.js';

export interface TreeOptions {
  /** Cap on store entries; 0 for unbounded. Defaults to SMT_MAX_STORE_NODES. */
  maxStoreNodes?: number;
  /** Run the invariant checker after every update. Defaults to SMT_VERIFY_INVARIANTS. */
  verifyInvariants?: boolean;
  treeId?: string;
}

/**
 * Fixed-height sparse Merkle tree over a content-addressed node store.
 *
 * Every empty subtree of a given depth shares one store entry, so an empty
 * tree costs `height` entries regardless of how many leaves it has.
 */
export class BinaryTree<F> {
  readonly treeId: string;
  readonly emptyLeafHash: Digest;

  private top: Digest;
  private readonly roots: Digest[];
  private readonly rootSet: Set<Digest>;
  private readonly defaultDigests: readonly Digest[];
  private readonly verifyInvariants: boolean;

  private constructor(
    readonly height: number,
    readonly emptyValue: Element<F>,
    private readonly store: NodeStore,
    root: Digest,
    options: TreeOptions
  ) {
    this.treeId = options.treeId ?? generateTreeId();
    this.emptyLeafHash = emptyValue.computeHash();
    this.top = root;
    this.roots = [root];
    this.rootSet = new Set([root]);
    this.defaultDigests = computeDefaultDigests(this.emptyLeafHash, height);
    this.verifyInvariants = options.verifyInvariants ?? getTreeConfig().verifyInvariants;
  }

  /**
   * Build the all-empty tree bottom up, one shared entry per level.
   */
  static initialize<F>(emptyValue: Element<F>, height: number, options: TreeOptions = {}): BinaryTree<F> {
    assertHeight(height);

    const store = new NodeStore(options.maxStoreNodes ?? getTreeConfig().maxStoreNodes);
    let current = emptyValue.computeHash();
    for (let level = 0; level < height; level++) {
      current = store.put({ left: current, right: current });
    }

    const tree = new BinaryTree(height, emptyValue, store, current, options);
    tree.enterContext();
    logger.info('tree_initialize', 'Initialized empty tree', {
      root: abbreviate(current),
      storeSize: store.size,
    });
    metrics.recordTreeInitialized(store.size);
    return tree;
  }

  /**
   * Attach a tree to an existing node store, e.g. one shared with another
   * tree of the same height. `root` must be reachable through `store`.
   */
  static fromStore<F>(
    store: NodeStore,
    root: Digest,
    emptyValue: Element<F>,
    height: number,
    options: Omit<TreeOptions, 'maxStoreNodes'> = {}
  ): BinaryTree<F> {
    assertHeight(height);
    return new BinaryTree(height, emptyValue, store, root, options);
  }

  get root(): Digest {
    return this.top;
  }

  get storeSize(): number {
    return this.store.size;
  }

  getNode(digest: Digest): NodePair | undefined {
    return this.store.get(digest);
  }

  /**
   * Every root this tree has had, oldest first.
   */
  getRootHistory(): readonly Digest[] {
    return [...this.roots];
  }

  hasRoot(digest: Digest): boolean {
    return this.rootSet.has(digest);
  }

  /**
   * Sibling digests along `bitsIndex`, in root-to-leaf order. Walks from the
   * current root unless `atRoot` names an earlier root of this tree.
   */
  getSiblingHashes(bitsIndex: BitPath, atRoot?: Digest): Digest[] {
    assertPathLength(bitsIndex, this.height);

    let nodeHash = atRoot ?? this.top;
    if (!this.rootSet.has(nodeHash)) {
      throw new UnknownRootError(nodeHash);
    }

    const siblings: Digest[] = [];
    for (let depth = 0; depth < bitsIndex.length; depth++) {
      const pair = this.store.get(nodeHash);
      if (!pair) {
        throw new InconsistentStoreError(nodeHash, depth);
      }
      if (bitsIndex[depth]) {
        nodeHash = pair.right;
        siblings.push(pair.left);
      } else {
        nodeHash = pair.left;
        siblings.push(pair.right);
      }
    }

    metrics.recordSiblingPathExtracted();
    return siblings;
  }

  createProof(bitsIndex: BitPath, atRoot?: Digest): Proof {
    return new Proof(this.getSiblingHashes(bitsIndex, atRoot));
  }

  /**
   * Set the leaf at `bitsIndex` to `element` and recompute its ancestors.
   *
   * All new nodes are computed before anything is written; a failure leaves
   * the store and root unchanged.
   */
  addElement(bitsIndex: BitPath, element: Element<F>): Digest {
    this.enterContext();

    let siblings: Digest[];
    try {
      siblings = this.getSiblingHashes(bitsIndex);
    } catch (error) {
      this.recordRejection(error);
      throw error;
    }

    const written: Array<[Digest, NodePair]> = [];
    let current = element.computeHash();

    // Leaf to root; siblings[depth] pairs with bitsIndex[depth].
    for (let depth = bitsIndex.length - 1; depth >= 0; depth--) {
      const sibling = siblings[depth];
      const pair: NodePair = bitsIndex[depth]
        ? { left: sibling, right: current }
        : { left: current, right: sibling };
      current = combineHashes(pair.left, pair.right);
      written.push([current, pair]);
    }

    if (this.verifyInvariants) {
      this.checkPending(current, written);
    }

    try {
      this.store.putAll(written);
    } catch (error) {
      this.recordRejection(error);
      throw error;
    }

    this.top = current;
    this.rootSet.add(current);
    this.roots.push(current);

    logger.info('tree_update', 'Leaf updated', {
      root: abbreviate(current),
      nodesWritten: written.length,
      storeSize: this.store.size,
    });
    metrics.recordUpdateApplied(written.length, this.store.size);

    return current;
  }

  /**
   * Structural view of the tree for the invariant checker.
   */
  snapshot(): TreeSnapshot {
    return {
      height: this.height,
      root: this.top,
      roots: [...this.roots],
      emptyLeafHash: this.emptyLeafHash,
      defaultDigests: this.defaultDigests,
      entries: [...this.store.entries()],
    };
  }

  /**
   * Run the invariant checker against the tree as it would be after the
   * update, before any of it is written.
   */
  private checkPending(root: Digest, written: ReadonlyArray<readonly [Digest, NodePair]>): void {
    try {
      enforceTreeInvariants({
        ...this.snapshot(),
        root,
        roots: [...this.roots, root],
        entries: [...this.store.entries(), ...written],
      });
    } catch (error) {
      this.recordRejection(error);
      throw error;
    }
  }

  private enterContext(): void {
    logger.setContext({ treeId: this.treeId, height: this.height });
  }

  private recordRejection(error: unknown): void {
    if (error instanceof MalformedPathError) {
      metrics.recordUpdateRejected('malformed_path');
    } else if (error instanceof InconsistentStoreError) {
      metrics.recordUpdateRejected('inconsistent_store');
    } else if (error instanceof StoreCapacityError) {
      metrics.recordUpdateRejected('store_capacity');
    } else if (error instanceof TreeInvariantViolationError) {
      metrics.recordUpdateRejected('invariant_violation');
    }

    logger.error('tree_update', 'Leaf update rejected', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

function assertHeight(height: number): void {
  if (!Number.isInteger(height) || height < 0 || height > TREE_LIMITS.MAX_TREE_HEIGHT) {
    throw new MerkleTreeError(
      `Invalid tree height: ${height} (must be an integer in 0..${TREE_LIMITS.MAX_TREE_HEIGHT})`
    );
  }
}

/**
 * Digest of the empty subtree at each level above the leaves, bottom first.
 */
export function computeDefaultDigests(emptyLeafHash: Digest, height: number): Digest[] {
  const digests: Digest[] = [];
  let current = emptyLeafHash;
  for (let level = 0; level < height; level++) {
    current = combineHashes(current, current);
    digests.push(current);
  }
  return digests;
}
