/**
 * Search tree bookkeeping shared by every algorithm
 */

import { SearchOptions, StateKey } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS } from '../domain/constants.js';
import { stateKey } from './state-key.js';

/**
 * A visited state and the key of the state it was reached from
 */
export interface Visit<S> {
  state: S;
  key: StateKey;
  parent: StateKey | null; // null for the start state
}

export function createVisit<S>(state: S, key: StateKey, parent: StateKey | null): Visit<S> {
  return { state, key, parent };
}

/**
 * Walk predecessors from the goal back to the start.
 * Returns the states in start-to-goal order.
 */
export function reconstructPath<S>(visits: Map<StateKey, Visit<S>>, goalKey: StateKey): S[] {
  const path: S[] = [];
  let current = visits.get(goalKey);

  while (current !== undefined) {
    path.push(current.state);
    current = current.parent === null ? undefined : visits.get(current.parent);
  }

  return path.reverse();
}

/**
 * Fill in option defaults
 */
export function resolveOptions<S>(options: Partial<SearchOptions<S>> = {}): SearchOptions<S> {
  return {
    key: options.key ?? stateKey,
    validate: options.validate ?? DEFAULT_SEARCH_OPTIONS.validate,
  };
}
