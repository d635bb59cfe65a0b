import { describe, it, expect } from 'vitest';
import { pallasBase } from '../field/pallas.js';
import { BinaryTree } from '../merkle/binary-tree.js';
import { convertToBits } from '../merkle/bit-path.js';
import { Element } from '../merkle/element.js';
import { checkTreeInvariants, enforceTreeInvariants } from './checker.js';
import type { TreeSnapshot } from './types.js';
import { summarizeViolations, TreeInvariantViolationError } from './violations.js';

const empty = Element.default(pallasBase);

function healthySnapshot(): TreeSnapshot {
  const tree = BinaryTree.initialize(empty, 3);
  tree.addElement(convertToBits(3, 4), new Element(pallasBase, [5n]));
  return tree.snapshot();
}

describe('checkTreeInvariants', () => {
  it('passes for a tree built through the public API', () => {
    expect(checkTreeInvariants(healthySnapshot())).toEqual({ passed: true, violations: [] });
  });

  it('passes at height 0 after an update', () => {
    const tree = BinaryTree.initialize(empty, 0);
    tree.addElement([], new Element(pallasBase, [3n]));
    expect(checkTreeInvariants(tree.snapshot()).passed).toBe(true);
  });

  it('flags entries stored under the wrong key', () => {
    const snapshot = healthySnapshot();
    // The last entry written is the root pair, whose children differ
    const [digest, pair] = snapshot.entries[snapshot.entries.length - 1];
    const corrupted: TreeSnapshot = {
      ...snapshot,
      entries: [...snapshot.entries.slice(0, -1), [digest, { left: pair.right, right: pair.left }]],
    };

    const result = checkTreeInvariants(corrupted, ['STORE_KEYS_SELF_VERIFY']);
    expect(result.passed).toBe(false);
    expect(result.violations).toHaveLength(1);
    expect(result.violations[0].invariantId).toBe('STORE_KEYS_SELF_VERIFY');
    expect(result.violations[0].severity).toBe('fatal');
  });

  it('flags a root missing from the store', () => {
    const snapshot = healthySnapshot();
    const result = checkTreeInvariants({ ...snapshot, root: 'ee'.repeat(32) });

    expect(result.violations.map(v => v.invariantId)).toEqual(['ROOT_REACHABLE']);
    expect(result.violations[0].root).toBe('ee'.repeat(32));
  });

  it('flags lost historical roots and default subtrees', () => {
    const snapshot = healthySnapshot();
    const withoutDefaults: TreeSnapshot = {
      ...snapshot,
      entries: snapshot.entries.filter(([digest]) => !snapshot.defaultDigests.includes(digest)),
      root: snapshot.roots[1],
    };

    const ids = checkTreeInvariants(withoutDefaults).violations.map(v => v.invariantId);
    expect(ids).toEqual(['ROOT_HISTORY_RETAINED', 'DEFAULT_SUBTREES_PRESENT']);
  });
});

describe('enforceTreeInvariants', () => {
  it('throws only for fatal violations', () => {
    const snapshot = healthySnapshot();

    expect(() =>
      enforceTreeInvariants({ ...snapshot, defaultDigests: ['ff'.repeat(32)] })
    ).not.toThrow();

    try {
      enforceTreeInvariants({ ...snapshot, root: 'ee'.repeat(32) });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TreeInvariantViolationError);
      if (error instanceof TreeInvariantViolationError) {
        expect(error.hasFatalViolations()).toBe(true);
        expect(error.violations.map(v => v.invariantId)).toEqual(['ROOT_REACHABLE']);
        expect(error.message).toBe('Tree invariant violations: ROOT_REACHABLE');
      }
    }
  });
});

describe('summarizeViolations', () => {
  it('counts by severity', () => {
    const snapshot = healthySnapshot();
    const { violations } = checkTreeInvariants({
      ...snapshot,
      root: 'ee'.repeat(32),
      defaultDigests: ['ff'.repeat(32)],
    });

    expect(summarizeViolations(violations)).toEqual({ total: 2, warn: 1, error: 0, fatal: 1 });
  });
});
