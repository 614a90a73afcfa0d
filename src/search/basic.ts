/**
 * Unweighted search: depth-first and breadth-first
 */

import { GoalTest, Neighbors, PathResult, SearchOptions, StateKey } from '../domain/types.js';
import { Queue } from './frontier.js';
import { Visit, createVisit, reconstructPath, resolveOptions } from './search-node.js';

/**
 * Depth-first search with an explicit stack.
 *
 * Returns the first path found under LIFO expansion order, which is not
 * necessarily the shortest, or null once the stack runs dry.
 */
export function dfs<S>(
  start: S,
  neighbors: Neighbors<S>,
  isGoal: GoalTest<S>,
  options: Partial<SearchOptions<S>> = {}
): PathResult<S> | null {
  const { key } = resolveOptions(options);
  const visits = new Map<StateKey, Visit<S>>();
  const stack: Visit<S>[] = [createVisit(start, key(start), null)];
  let explored = 0;

  let current: Visit<S> | undefined;
  while ((current = stack.pop()) !== undefined) {
    // Stale entry pushed before the state was reached another way
    if (visits.has(current.key)) continue;
    visits.set(current.key, current);

    if (isGoal(current.state)) {
      return { path: reconstructPath(visits, current.key), explored };
    }

    explored++;

    for (const next of neighbors(current.state)) {
      const nextKey = key(next);
      if (!visits.has(nextKey)) {
        stack.push(createVisit(next, nextKey, current.key));
      }
    }
  }

  return null;
}

/**
 * Breadth-first search. The returned path has the fewest edges.
 *
 * States are marked visited when enqueued, so each one enters the queue
 * at most once.
 */
export function bfs<S>(
  start: S,
  neighbors: Neighbors<S>,
  isGoal: GoalTest<S>,
  options: Partial<SearchOptions<S>> = {}
): PathResult<S> | null {
  const { key } = resolveOptions(options);
  const visits = new Map<StateKey, Visit<S>>();
  const queue = new Queue<Visit<S>>();
  let explored = 0;

  const origin = createVisit(start, key(start), null);
  visits.set(origin.key, origin);
  queue.enqueue(origin);

  let current: Visit<S> | undefined;
  while ((current = queue.dequeue()) !== undefined) {
    if (isGoal(current.state)) {
      return { path: reconstructPath(visits, current.key), explored };
    }

    explored++;

    for (const next of neighbors(current.state)) {
      const nextKey = key(next);
      if (visits.has(nextKey)) continue;

      const visit = createVisit(next, nextKey, current.key);
      visits.set(nextKey, visit);
      queue.enqueue(visit);
    }
  }

  return null;
}
