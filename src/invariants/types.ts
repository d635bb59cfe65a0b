import type { Digest, NodePair } from '../merkle/merkle-types.js';

export type InvariantSeverity = 'warn' | 'error' | 'fatal';

export type InvariantID =
  | 'STORE_KEYS_SELF_VERIFY'
  | 'ROOT_REACHABLE'
  | 'ROOT_HISTORY_RETAINED'
  | 'DEFAULT_SUBTREES_PRESENT';

/**
 * Structural view of a tree, detached from the live instance.
 */
export interface TreeSnapshot {
  height: number;
  root: Digest;
  roots: readonly Digest[];
  emptyLeafHash: Digest;
  /** Empty-subtree digest per level above the leaves, bottom first. */
  defaultDigests: readonly Digest[];
  entries: ReadonlyArray<readonly [Digest, NodePair]>;
}

export interface InvariantDefinition {
  id: InvariantID;
  description: string;
  severity: InvariantSeverity;
  evaluate: (snapshot: TreeSnapshot, keys: ReadonlySet<Digest>) => boolean;
}

export interface InvariantViolation {
  invariantId: InvariantID;
  description: string;
  severity: InvariantSeverity;
  root: Digest;
  height: number;
  timestamp: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
}
