/**
 * Search entry point bound to a graph
 */

import {
  Heuristic,
  SearchAlgorithm,
  SearchOptions,
  WeightedGraph,
  WeightedNeighbors,
  WeightedPathResult,
  PathResult,
} from '../domain/types.js';
import { bfs, dfs } from './basic.js';
import { dijkstra } from './dijkstra.js';
import { astar } from './astar.js';

/**
 * Runs any of the four searches over one weighted graph
 */
export class PathFinder<S> {
  constructor(
    private readonly graph: WeightedGraph<S>,
    private readonly options: Partial<SearchOptions<S>> = {}
  ) {}

  dfs(start: S): PathResult<S> | null {
    return dfs(start, state => this.graph.moves(state), state => this.graph.isDone(state), this.options);
  }

  bfs(start: S): PathResult<S> | null {
    return bfs(start, state => this.graph.moves(state), state => this.graph.isDone(state), this.options);
  }

  dijkstra(start: S): WeightedPathResult<S> | null {
    return dijkstra(start, weightedMoves(this.graph), state => this.graph.isDone(state), this.options);
  }

  astar(start: S, heuristic: Heuristic<S>): WeightedPathResult<S> | null {
    return astar(start, weightedMoves(this.graph), state => this.graph.isDone(state), heuristic, this.options);
  }

  /**
   * Run the named algorithm. Unweighted results are priced with the
   * graph's edge weights so every algorithm reports a comparable cost.
   * Without a heuristic, A* degrades to Dijkstra.
   */
  find(
    algorithm: SearchAlgorithm,
    start: S,
    heuristic: Heuristic<S> = () => 0
  ): WeightedPathResult<S> | null {
    switch (algorithm) {
      case 'dfs':
        return this.priced(this.dfs(start));
      case 'bfs':
        return this.priced(this.bfs(start));
      case 'dijkstra':
        return this.dijkstra(start);
      case 'astar':
        return this.astar(start, heuristic);
    }
  }

  private priced(result: PathResult<S> | null): WeightedPathResult<S> | null {
    if (result === null) return null;
    return { ...result, cost: pathCost(this.graph, result.path) };
  }
}

/**
 * Pair each move of a graph with its edge weight
 */
export function weightedMoves<S>(graph: WeightedGraph<S>): WeightedNeighbors<S> {
  return function* (state: S) {
    for (const next of graph.moves(state)) {
      yield [next, graph.weight(state, next)] as const;
    }
  };
}

/**
 * Sum of edge weights along a path
 */
export function pathCost<S>(graph: WeightedGraph<S>, path: readonly S[]): number {
  let cost = 0;
  for (let i = 1; i < path.length; i++) {
    cost += graph.weight(path[i - 1], path[i]);
  }
  return cost;
}
