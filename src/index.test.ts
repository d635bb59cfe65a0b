import { describe, it, expect, afterEach } from 'vitest';
import {
  convertToBits,
  createTree,
  Element,
  pallasBase,
  Proof,
  resetTreeConfig,
  toPallas,
} from './index.js';

describe('createTree', () => {
  afterEach(() => {
    resetTreeConfig();
  });

  it('builds a tree at the configured default height', () => {
    const tree = createTree(Element.default(pallasBase));
    expect(tree.height).toBe(32);
    expect(tree.storeSize).toBe(32);
  });

  it('supports the full insert-prove-verify flow through the public surface', () => {
    const tree = createTree(Element.default(pallasBase));
    const bits = convertToBits(tree.height, 123456789);
    const value = new Element(pallasBase, [toPallas(2024), toPallas(10)]);

    tree.addElement(bits, value);

    const proof = new Proof(tree.getSiblingHashes(bits));
    expect(proof.validate(bits, value, tree.root)).toBe(true);
  });
});
