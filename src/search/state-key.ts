/**
 * State keys for duplicate detection during search
 */

import { GoalTest, KeyFn, StateKey, isKeyed } from '../domain/types.js';

/**
 * Derive a key for an arbitrary state.
 *
 * A state exposing `key()` is identified by that key. Anything else is
 * serialized structurally: primitives are type-tagged (so `1` and `'1'`
 * differ), arrays keep their order and object entries are sorted by name,
 * so two structurally equal states always share a key.
 */
export function stateKey(state: unknown): StateKey {
  if (isKeyed(state)) {
    return state.key();
  }
  return serialize(state);
}

function serialize(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return serializePrimitive(value);

  if (isKeyed(value)) {
    return `<${String(value.key())}>`;
  }

  if (Array.isArray(value)) {
    return `[${value.map(serialize).join(',')}]`;
  }

  if (value instanceof Set) {
    const members = [...value].map(serialize).sort();
    return `Set[${members.join(',')}]`;
  }

  if (value instanceof Map) {
    const entries = [...value].map(([k, v]) => `${serialize(k)}=>${serialize(v)}`).sort();
    return `Map[${entries.join(',')}]`;
  }

  const entries = Object.entries(value)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, field]) => `${JSON.stringify(name)}:${serialize(field)}`);

  return `{${entries.join(',')}}`;
}

function serializePrimitive(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      return Object.is(value, -0) ? '0' : String(value);
    case 'bigint':
      return `${value}n`;
    case 'boolean':
    case 'undefined':
      return String(value);
    default:
      throw new TypeError(`Cannot derive a state key from a ${typeof value}`);
  }
}

/**
 * Build a goal test matching one explicit goal state
 */
export function goalState<S>(target: S, key: KeyFn<S> = stateKey): GoalTest<S> {
  const targetKey = key(target);
  return (state: S) => key(state) === targetKey;
}
