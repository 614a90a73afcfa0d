/**
 * Dijkstra's shortest path search
 */

import {
  GoalTest,
  SearchOptions,
  StateKey,
  WeightedNeighbors,
  WeightedPathResult,
} from '../domain/types.js';
import { PriorityQueue } from './frontier.js';
import { Visit, createVisit, reconstructPath, resolveOptions } from './search-node.js';
import { checkEdgeCost } from './preconditions.js';

export interface FrontierEntry<S> {
  visit: Visit<S>;
  cost: number; // accumulated cost from the start when pushed
}

/**
 * Lowest-cost path from `start` to the first state passing `isGoal`.
 *
 * Edge costs must be non-negative. That is not checked unless
 * `options.validate` is set; with a negative cost the result is undefined.
 *
 * No decrease-key: a cheaper path re-pushes the state and the outdated
 * heap entry is dropped when it surfaces.
 */
export function dijkstra<S>(
  start: S,
  neighbors: WeightedNeighbors<S>,
  isGoal: GoalTest<S>,
  options: Partial<SearchOptions<S>> = {}
): WeightedPathResult<S> | null {
  const { key, validate } = resolveOptions(options);
  const visits = new Map<StateKey, Visit<S>>();
  const best = new Map<StateKey, number>();
  const open = new PriorityQueue<FrontierEntry<S>>();
  let explored = 0;

  const origin = createVisit(start, key(start), null);
  visits.set(origin.key, origin);
  best.set(origin.key, 0);
  open.push({ visit: origin, cost: 0 }, 0);

  let entry: FrontierEntry<S> | undefined;
  while ((entry = open.pop()) !== undefined) {
    const { visit, cost } = entry;

    // Already have a better path to this state
    if (cost > (best.get(visit.key) ?? Infinity)) continue;

    if (isGoal(visit.state)) {
      return { path: reconstructPath(visits, visit.key), cost, explored };
    }

    explored++;

    for (const [next, weight] of neighbors(visit.state)) {
      if (validate) checkEdgeCost(weight);

      const nextCost = cost + weight;
      const nextKey = key(next);

      if (nextCost < (best.get(nextKey) ?? Infinity)) {
        const nextVisit = createVisit(next, nextKey, visit.key);
        best.set(nextKey, nextCost);
        visits.set(nextKey, nextVisit);
        open.push({ visit: nextVisit, cost: nextCost }, nextCost);
      }
    }
  }

  return null;
}
