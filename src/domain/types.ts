/**
 * Core type definitions for the search toolkit
 */

// Key used to store a state in visited / predecessor maps
export type StateKey = string | number;

// Maps a state to its identity; equal states must share a key
export type KeyFn<S> = (state: S) => StateKey;

// A state that knows its own identity (Vec2D, Vec3D, ...)
export interface Keyed {
  key(): StateKey;
}

export type Neighbors<S> = (state: S) => Iterable<S>;

// Neighbour paired with the cost of the edge leading to it
export type WeightedNeighbors<S> = (state: S) => Iterable<readonly [S, number]>;

export type GoalTest<S> = (state: S) => boolean;

// Estimate of the remaining cost from a state to the goal
export type Heuristic<S> = (state: S) => number;

export type SearchAlgorithm = 'dfs' | 'bfs' | 'dijkstra' | 'astar';

export const SEARCH_ALGORITHMS: readonly SearchAlgorithm[] = ['dfs', 'bfs', 'dijkstra', 'astar'];

// Unweighted search result
export interface PathResult<S> {
  path: S[];       // start to goal, inclusive
  explored: number; // states expanded before the goal was reached
}

// Weighted search result
export interface WeightedPathResult<S> extends PathResult<S> {
  cost: number;
}

// Search options
export interface SearchOptions<S> {
  key: KeyFn<S>;
  validate: boolean;
}

/**
 * Adjacency view over a state space
 */
export interface Graph<S> {
  moves(state: S): Iterable<S>;
  isDone(state: S): boolean;
}

/**
 * Graph whose edges carry a cost
 */
export interface WeightedGraph<S> extends Graph<S> {
  weight(from: S, to: S): number;
}

// Bounds of a 0-based row/column grid
export interface GridBounds {
  rows: number;
  cols: number;
}

// Normal axis of a plane in 3D space
export type Axis = 'X' | 'Y' | 'Z';

export function isSearchAlgorithm(value: string): value is SearchAlgorithm {
  return SEARCH_ALGORITHMS.some(algorithm => algorithm === value);
}

export function isKeyed(value: unknown): value is Keyed {
  return (
    typeof value === 'object' &&
    value !== null &&
    'key' in value &&
    typeof value.key === 'function'
  );
}
