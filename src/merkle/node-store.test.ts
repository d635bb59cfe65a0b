import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { combineHashes, isDigest } from './hashing.js';
import { MerkleTreeError, StoreCapacityError } from './merkle-types.js';
import { NodeStore } from './node-store.js';

const A = 'aa'.repeat(32);
const B = 'bb'.repeat(32);
const C = 'cc'.repeat(32);

describe('combineHashes', () => {
  it('hashes the raw bytes of left followed by right', () => {
    const expected = crypto
      .createHash('sha256')
      .update(Buffer.concat([Buffer.alloc(32, 0xaa), Buffer.alloc(32, 0xbb)]))
      .digest('hex');

    expect(combineHashes(A, B)).toBe(expected);
  });

  it('is order sensitive', () => {
    expect(combineHashes(A, B)).not.toBe(combineHashes(B, A));
  });

  it('yields a well-formed digest', () => {
    expect(isDigest(combineHashes(A, B))).toBe(true);
    expect(isDigest('abc')).toBe(false);
    expect(isDigest('AA'.repeat(32))).toBe(false);
  });
});

describe('NodeStore', () => {
  it('keys every pair by its own digest', () => {
    const store = new NodeStore();
    const digest = store.put({ left: A, right: B });

    expect(digest).toBe(combineHashes(A, B));
    expect(store.get(digest)).toEqual({ left: A, right: B });
    expect(store.has(digest)).toBe(true);
    expect(store.size).toBe(1);
  });

  it('does not grow when the same pair is stored twice', () => {
    const store = new NodeStore();
    store.put({ left: A, right: B });
    store.put({ left: A, right: B });
    expect(store.size).toBe(1);
  });

  it('refuses entries keyed by anything but their content hash', () => {
    const store = new NodeStore();
    expect(() => store.putAll([[C, { left: A, right: B }]])).toThrow(MerkleTreeError);
    expect(store.size).toBe(0);
  });

  it('writes nothing from a batch that would exceed capacity', () => {
    const store = new NodeStore(2);
    store.put({ left: A, right: A });

    const batch: Array<[string, { left: string; right: string }]> = [
      [combineHashes(A, B), { left: A, right: B }],
      [combineHashes(B, C), { left: B, right: C }],
    ];

    try {
      store.putAll(batch);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StoreCapacityError);
      if (error instanceof StoreCapacityError) {
        expect(error.limit).toBe(2);
        expect(error.required).toBe(3);
      }
    }
    expect(store.size).toBe(1);
    expect(store.has(combineHashes(A, B))).toBe(false);
  });

  it('does not count already stored pairs against capacity', () => {
    const store = new NodeStore(1);
    const digest = store.put({ left: A, right: B });
    expect(() => store.putAll([[digest, { left: A, right: B }]])).not.toThrow();
  });

  it('rejects invalid capacities', () => {
    expect(() => new NodeStore(-1)).toThrow('Invalid store capacity: -1');
  });
});
