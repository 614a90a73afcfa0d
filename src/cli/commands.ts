/**
 * puzzle-search commands. Each returns the text to print.
 */

import { SEARCH_ALGORITHMS } from '../domain/types.js';
import { GridMap } from '../grid/grid-map.js';
import { Vec2D } from '../measure/vec2d.js';
import { PathFinder } from '../search/path-finder.js';
import { AlgorithmRun, formatComparison, formatGrid, formatResult, formatResultJSON } from '../io/path-formatter.js';
import { CLIOptions } from './args.js';

interface LoadedProblem {
  grid: GridMap;
  start: Vec2D;
  goal: Vec2D;
  finder: PathFinder<Vec2D>;
}

export function loadProblem(options: CLIOptions): LoadedProblem {
  if (options.input === undefined) {
    throw new Error('Must provide --input');
  }

  const grid = GridMap.parse(options.input, { wall: options.wall, diagonal: options.diagonal });
  const start = locate(grid, options.start, 'Start');
  const goal = locate(grid, options.goal, 'Goal');
  const finder = new PathFinder(grid.toGraph(goal), { validate: options.validate });

  return { grid, start, goal, finder };
}

function locate(grid: GridMap, marker: string, label: string): Vec2D {
  const [position] = grid.find(marker);
  if (position === undefined) {
    throw new Error(`${label} marker "${marker}" not found in input`);
  }
  return position;
}

export function runSearch(options: CLIOptions): string {
  const { grid, start, goal, finder } = loadProblem(options);
  const run: AlgorithmRun = {
    algorithm: options.algorithm,
    result: finder.find(options.algorithm, start, grid.heuristic(goal)),
  };

  if (options.outputFormat === 'json') {
    return formatResultJSON(run);
  }

  const lines = [formatResult(run)];
  if (run.result !== null) {
    lines.push('', formatGrid(grid, run.result.path));
  }
  return lines.join('\n');
}

export function runCompare(options: CLIOptions): string {
  const { grid, start, goal, finder } = loadProblem(options);
  const heuristic = grid.heuristic(goal);

  const runs: AlgorithmRun[] = SEARCH_ALGORITHMS.map(algorithm => ({
    algorithm,
    result: finder.find(algorithm, start, heuristic),
  }));

  if (options.outputFormat === 'json') {
    return `[${runs.map(formatResultJSON).join(',\n')}]`;
  }

  return formatComparison(runs);
}
