import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pallasBase, toPallas } from '../field/pallas.js';
import { enforceTreeInvariants } from '../invariants/checker.js';
import { TreeInvariantViolationError } from '../invariants/violations.js';
import { metrics } from '../metrics/metrics.js';
import { BinaryTree } from './binary-tree.js';
import { convertToBits } from './bit-path.js';
import { Element } from './element.js';

vi.mock('../invariants/checker.js', async () => {
  const { TreeInvariantViolationError: ViolationError } = await import('../invariants/violations.js');
  return {
    checkTreeInvariants: vi.fn(),
    enforceTreeInvariants: vi.fn(() => {
      throw new ViolationError([
        {
          invariantId: 'ROOT_REACHABLE',
          description: 'Root must be a stored node unless the tree has height 0',
          severity: 'fatal',
          root: 'test-root',
          height: 4,
          timestamp: '2024-01-01T00:00:00.000Z',
        },
      ]);
    }),
  };
});

const empty = Element.default(pallasBase);

describe('BinaryTree.addElement with a failing invariant check', () => {
  beforeEach(() => {
    metrics.reset();
    vi.mocked(enforceTreeInvariants).mockClear();
  });

  it('leaves the store and root untouched', () => {
    const tree = BinaryTree.initialize(empty, 4, { verifyInvariants: true });
    const bits = convertToBits(4, 5);
    const value = new Element(pallasBase, [toPallas(9)]);
    const pendingRoot = tree.createProof(bits).calculateRoot(bits, value);
    const rootBefore = tree.root;

    expect(() => tree.addElement(bits, value)).toThrow(TreeInvariantViolationError);

    expect(tree.root).toBe(rootBefore);
    expect(tree.storeSize).toBe(4);
    expect(tree.getRootHistory()).toEqual([rootBefore]);
    expect(tree.hasRoot(pendingRoot)).toBe(false);
    expect(metrics.snapshot().updates.rejectedInvariantViolation).toBe(1);
    expect(metrics.snapshot().updates.applied).toBe(0);
  });

  it('checks the tree as it would be after the update', () => {
    const tree = BinaryTree.initialize(empty, 4, { verifyInvariants: true });
    const bits = convertToBits(4, 3);
    const value = new Element(pallasBase, [toPallas(4)]);
    const pendingRoot = tree.createProof(bits).calculateRoot(bits, value);

    expect(() => tree.addElement(bits, value)).toThrow(TreeInvariantViolationError);

    expect(enforceTreeInvariants).toHaveBeenCalledTimes(1);
    const [snapshot] = vi.mocked(enforceTreeInvariants).mock.calls[0];
    expect(snapshot.root).toBe(pendingRoot);
    expect(snapshot.roots).toEqual([tree.root, pendingRoot]);
    expect(snapshot.entries).toHaveLength(8);
    expect(snapshot.entries.some(([digest]) => digest === pendingRoot)).toBe(true);
  });

  it('skips the check when invariants are off', () => {
    const tree = BinaryTree.initialize(empty, 4, { verifyInvariants: false });

    tree.addElement(convertToBits(4, 1), new Element(pallasBase, [toPallas(2)]));

    expect(enforceTreeInvariants).not.toHaveBeenCalled();
    expect(tree.storeSize).toBe(8);
  });
});
