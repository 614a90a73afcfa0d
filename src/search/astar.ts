/**
 * A* search
 */

import {
  GoalTest,
  Heuristic,
  SearchOptions,
  StateKey,
  WeightedNeighbors,
  WeightedPathResult,
} from '../domain/types.js';
import { PriorityQueue } from './frontier.js';
import { Visit, createVisit, reconstructPath, resolveOptions } from './search-node.js';
import { FrontierEntry } from './dijkstra.js';
import { checkConsistency, checkEdgeCost, checkHeuristicValue } from './preconditions.js';

/**
 * Dijkstra ordered by `cost + heuristic(state)`.
 *
 * The result is the lowest-cost path only if the heuristic is admissible
 * (never overestimates the remaining cost) and edge costs are non-negative.
 * A state re-enters the frontier whenever a strictly cheaper path to it
 * turns up, so an admissible but inconsistent heuristic still yields the
 * optimum at the price of re-expansions.
 *
 * With `options.validate`, edge costs and heuristic values are checked for
 * sign and finiteness, and every edge that improves a path for consistency; a violation
 * throws PreconditionError. Admissibility itself cannot be verified.
 */
export function astar<S>(
  start: S,
  neighbors: WeightedNeighbors<S>,
  isGoal: GoalTest<S>,
  heuristic: Heuristic<S>,
  options: Partial<SearchOptions<S>> = {}
): WeightedPathResult<S> | null {
  const { key, validate } = resolveOptions(options);
  const visits = new Map<StateKey, Visit<S>>();
  const best = new Map<StateKey, number>();
  const open = new PriorityQueue<FrontierEntry<S>>();
  let explored = 0;

  const estimate = (state: S): number => {
    const value = heuristic(state);
    if (validate) checkHeuristicValue(value);
    return value;
  };

  const origin = createVisit(start, key(start), null);
  visits.set(origin.key, origin);
  best.set(origin.key, 0);
  open.push({ visit: origin, cost: 0 }, estimate(start));

  let entry: FrontierEntry<S> | undefined;
  while ((entry = open.pop()) !== undefined) {
    const { visit, cost } = entry;

    if (cost > (best.get(visit.key) ?? Infinity)) continue;

    if (isGoal(visit.state)) {
      return { path: reconstructPath(visits, visit.key), cost, explored };
    }

    explored++;

    const currentEstimate = validate ? estimate(visit.state) : 0;

    for (const [next, weight] of neighbors(visit.state)) {
      if (validate) checkEdgeCost(weight);

      const nextCost = cost + weight;
      const nextKey = key(next);

      if (nextCost < (best.get(nextKey) ?? Infinity)) {
        const nextEstimate = estimate(next);
        if (validate) checkConsistency(currentEstimate, weight, nextEstimate);

        const nextVisit = createVisit(next, nextKey, visit.key);
        best.set(nextKey, nextCost);
        visits.set(nextKey, nextVisit);
        open.push({ visit: nextVisit, cost: nextCost }, nextCost + nextEstimate);
      }
    }
  }

  return null;
}
