import { combineHashes } from '../merkle/hashing.js';
import type { Digest } from '../merkle/merkle-types.js';
import type { InvariantDefinition, InvariantID, TreeSnapshot } from './types.js';

// At height 0 the root is a bare leaf digest and the store stays empty.
function isProvableRoot(snapshot: TreeSnapshot, keys: ReadonlySet<Digest>, root: Digest): boolean {
  if (snapshot.height === 0) return keys.size === 0;
  return keys.has(root);
}

const INVARIANTS: Record<InvariantID, InvariantDefinition> = {
  STORE_KEYS_SELF_VERIFY: {
    id: 'STORE_KEYS_SELF_VERIFY',
    description: 'Every store key must equal the hash of its child pair',
    severity: 'fatal',
    evaluate: (snapshot: TreeSnapshot) =>
      snapshot.entries.every(([digest, pair]) => combineHashes(pair.left, pair.right) === digest),
  },

  ROOT_REACHABLE: {
    id: 'ROOT_REACHABLE',
    description: 'Root must be a stored node unless the tree has height 0',
    severity: 'fatal',
    evaluate: (snapshot, keys) => isProvableRoot(snapshot, keys, snapshot.root),
  },

  ROOT_HISTORY_RETAINED: {
    id: 'ROOT_HISTORY_RETAINED',
    description: 'Every historical root must remain provable',
    severity: 'error',
    evaluate: (snapshot, keys) => snapshot.roots.every(root => isProvableRoot(snapshot, keys, root)),
  },

  DEFAULT_SUBTREES_PRESENT: {
    id: 'DEFAULT_SUBTREES_PRESENT',
    description: 'One shared empty-subtree node must exist per level',
    severity: 'warn',
    evaluate: (snapshot, keys) => snapshot.defaultDigests.every(digest => keys.has(digest)),
  },
};

export function getAllInvariants(): InvariantDefinition[] {
  return Object.values(INVARIANTS);
}

export function getInvariantsByIds(ids: InvariantID[]): InvariantDefinition[] {
  return ids.map(id => INVARIANTS[id]);
}
