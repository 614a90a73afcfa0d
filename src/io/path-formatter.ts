/**
 * Format search results for human-readable output
 */

import { SearchAlgorithm, WeightedPathResult } from '../domain/types.js';
import { ALGORITHM_NAMES, PATH_MARKER } from '../domain/constants.js';
import { Vec2D } from '../measure/vec2d.js';
import { GridMap } from '../grid/grid-map.js';

export interface AlgorithmRun {
  algorithm: SearchAlgorithm;
  result: WeightedPathResult<Vec2D> | null;
}

/**
 * Render the grid, marking the cells a path passes through.
 * The path's own endpoints keep their characters.
 */
export function formatGrid(grid: GridMap, path: readonly Vec2D[] = []): string {
  const marked = new Set(path.slice(1, -1).map(position => position.key()));
  const lines: string[] = [];

  for (let y = 0; y < grid.rows; y++) {
    let line = '';
    for (let x = 0; x < grid.cols; x++) {
      const position = new Vec2D(x, y);
      const char = grid.at(position);
      if (char === null) break;
      line += marked.has(position.key()) ? PATH_MARKER : char;
    }
    lines.push(line);
  }

  return lines.join('\n');
}

/**
 * Format one search result
 */
export function formatResult(run: AlgorithmRun): string {
  const lines: string[] = [];
  const { algorithm, result } = run;

  lines.push('=== SEARCH RESULT ===');
  lines.push(`Algorithm: ${ALGORITHM_NAMES[algorithm]}`);

  if (result === null) {
    lines.push('Path found: no');
    return lines.join('\n');
  }

  lines.push('Path found: yes');
  lines.push(`Cost: ${result.cost}`);
  lines.push(`Steps: ${result.path.length - 1}`);
  lines.push(`Explored: ${result.explored}`);
  lines.push(`Path: ${result.path.map(position => position.toString()).join(' -> ')}`);

  return lines.join('\n');
}

/**
 * Side-by-side summary of several runs on the same input
 */
export function formatComparison(runs: readonly AlgorithmRun[]): string {
  const header = ['Algorithm', 'Cost', 'Steps', 'Explored'];
  const rows = runs.map(({ algorithm, result }) =>
    result === null
      ? [ALGORITHM_NAMES[algorithm], '-', '-', '-']
      : [
          ALGORITHM_NAMES[algorithm],
          String(result.cost),
          String(result.path.length - 1),
          String(result.explored),
        ]
  );

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map(row => row[column].length))
  );
  const formatRow = (cells: string[]): string =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join('  ').trimEnd();

  return [formatRow(header), formatRow(widths.map(width => '-'.repeat(width))), ...rows.map(formatRow)]
    .join('\n');
}

/**
 * Format a result as JSON
 */
export function formatResultJSON(run: AlgorithmRun): string {
  const { algorithm, result } = run;

  return JSON.stringify(
    {
      algorithm,
      found: result !== null,
      cost: result?.cost ?? null,
      steps: result === null ? null : result.path.length - 1,
      explored: result?.explored ?? null,
      path: result?.path.map(position => position.toTuple()) ?? [],
    },
    null,
    2
  );
}
