/**
 * Tests for DisjointSet
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DisjointSet } from '../../src/graphs/disjoint-set.js';

for (const [label, create] of [
  ['by size', DisjointSet.bySize],
  ['by rank', DisjointSet.byRank],
] as const) {
  describe(`DisjointSet ${label}`, () => {
    it('should start with every element alone', () => {
      const sets = create(4);

      assert.strictEqual(sets.count, 4);
      assert.strictEqual(sets.length, 4);
      assert.ok(!sets.connected(0, 1));
      assert.strictEqual(sets.setSize(2), 1);
    });

    it('should merge sets and report whether anything changed', () => {
      const sets = create(5);

      assert.strictEqual(sets.union(0, 1), true);
      assert.strictEqual(sets.union(3, 4), true);
      assert.strictEqual(sets.union(1, 0), false);
      assert.strictEqual(sets.count, 3);

      assert.strictEqual(sets.union(1, 4), true);
      assert.ok(sets.connected(0, 3));
      assert.ok(!sets.connected(0, 2));
      assert.strictEqual(sets.setSize(4), 4);
      assert.strictEqual(sets.count, 2);
    });

    it('should handle long chains', () => {
      const sets = create(1000);
      for (let i = 1; i < 1000; i++) sets.union(i - 1, i);

      assert.strictEqual(sets.count, 1);
      assert.strictEqual(sets.find(999), sets.find(0));
      assert.strictEqual(sets.setSize(500), 1000);
    });

    it('should reject indices outside the set', () => {
      const sets = create(3);

      assert.throws(() => sets.find(3), RangeError);
      assert.throws(() => sets.union(-1, 0), /outside 0\.\.2/);
    });
  });
}

describe('DisjointSet union strategies', () => {
  it('should attach the smaller set under the larger', () => {
    const sets = DisjointSet.bySize(4);
    sets.union(0, 1);
    sets.union(0, 2);
    sets.union(3, 0);

    assert.strictEqual(sets.find(3), 0);
  });

  it('should attach the shallower tree under the deeper', () => {
    const sets = DisjointSet.byRank(3);
    sets.union(0, 1);
    sets.union(2, 1);

    assert.strictEqual(sets.find(2), 0);
  });

  it('should reject an invalid element count', () => {
    assert.throws(() => DisjointSet.bySize(-1), RangeError);
    assert.throws(() => DisjointSet.byRank(2.5), /non-negative integer/);
  });
});
