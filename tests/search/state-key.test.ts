/**
 * Tests for state keys
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { stateKey, goalState } from '../../src/search/state-key.js';
import { Vec2D } from '../../src/measure/vec2d.js';

describe('State Keys', () => {
  it('should tell numbers and strings apart', () => {
    assert.strictEqual(stateKey(1), '1');
    assert.strictEqual(stateKey('1'), '"1"');
  });

  it('should treat -0 and 0 as the same state', () => {
    assert.strictEqual(stateKey(-0), stateKey(0));
  });

  it('should ignore object property order', () => {
    assert.strictEqual(stateKey({ a: 1, b: 2 }), '{"a":1,"b":2}');
    assert.strictEqual(stateKey({ b: 2, a: 1 }), '{"a":1,"b":2}');
  });

  it('should keep array order', () => {
    assert.strictEqual(stateKey([1, [2, 3]]), '[1,[2,3]]');
    assert.notStrictEqual(stateKey([1, 2]), stateKey([2, 1]));
  });

  it('should not confuse a string containing a comma with an array', () => {
    assert.notStrictEqual(stateKey(['1,2']), stateKey([1, 2]));
  });

  it('should use the key of keyed states', () => {
    assert.strictEqual(stateKey(new Vec2D(2, 3)), '2,3');
    assert.strictEqual(stateKey([new Vec2D(1, 2), 'a']), '[<1,2>,"a"]');
  });

  it('should ignore insertion order of sets', () => {
    assert.strictEqual(stateKey(new Set([2, 1])), 'Set[1,2]');
    assert.strictEqual(stateKey(new Set([1, 2])), 'Set[1,2]');
  });

  it('should key maps by their entries', () => {
    const a = new Map([['x', 1], ['y', 2]]);
    const b = new Map([['y', 2], ['x', 1]]);
    assert.strictEqual(stateKey(a), stateKey(b));
  });

  it('should key null, undefined, booleans and bigints', () => {
    assert.strictEqual(stateKey(null), 'null');
    assert.strictEqual(stateKey(undefined), 'undefined');
    assert.strictEqual(stateKey(true), 'true');
    assert.strictEqual(stateKey(10n), '10n');
  });

  it('should reject functions', () => {
    assert.throws(() => stateKey(() => 1), TypeError);
  });
});

describe('Goal State', () => {
  it('should match states equal to the target', () => {
    const isGoal = goalState(new Vec2D(1, 1));

    assert.strictEqual(isGoal(new Vec2D(1, 1)), true);
    assert.strictEqual(isGoal(new Vec2D(1, 2)), false);
  });

  it('should honour a custom key function', () => {
    const isGoal = goalState({ id: 3, label: 'target' }, state => state.id);

    assert.strictEqual(isGoal({ id: 3, label: 'other' }), true);
    assert.strictEqual(isGoal({ id: 4, label: 'target' }), false);
  });
});
