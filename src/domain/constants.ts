/**
 * Constants for the search toolkit
 */

import { Axis } from './types.js';

// Default search options (the key function defaults to stateKey)
export const DEFAULT_SEARCH_OPTIONS = {
  validate: false,
};

// Grid map defaults
export const DEFAULT_GRID_OPTIONS = {
  wall: '#',
  diagonal: false,
};

// Default CLI markers
export const DEFAULT_START_CHAR = 'S';
export const DEFAULT_GOAL_CHAR = 'E';

// Character drawn on grid cells a path crosses
export const PATH_MARKER = '*';

// Blank-line separator between records in puzzle input
export const RECORD_SEPARATOR = '\n\n';

export const DEFAULT_AXIS: Axis = 'Z';

// Display names for the search algorithms
export const ALGORITHM_NAMES = {
  dfs: 'DFS',
  bfs: 'BFS',
  dijkstra: 'Dijkstra',
  astar: 'A*',
} as const;
