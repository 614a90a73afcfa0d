/**
 * Command line parsing for puzzle-search
 */

import { SearchAlgorithm, isSearchAlgorithm } from '../domain/types.js';
import { DEFAULT_GOAL_CHAR, DEFAULT_GRID_OPTIONS, DEFAULT_START_CHAR } from '../domain/constants.js';

export interface CLIOptions {
  command: 'search' | 'compare' | 'help';
  input?: string;
  algorithm: SearchAlgorithm;
  outputFormat: 'text' | 'json';
  start: string;
  goal: string;
  wall: string;
  diagonal: boolean;
  validate: boolean;
}

export function parseArgs(args: readonly string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    algorithm: 'astar',
    outputFormat: 'text',
    start: DEFAULT_START_CHAR,
    goal: DEFAULT_GOAL_CHAR,
    wall: DEFAULT_GRID_OPTIONS.wall,
    diagonal: DEFAULT_GRID_OPTIONS.diagonal,
    validate: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    // Value following a flag
    const value = (): string => {
      const next = args[++i];
      if (next === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      return next;
    };

    switch (arg) {
      case 'search':
      case 'compare':
      case 'help':
        options.command = arg;
        break;

      case '-i':
      case '--input':
        options.input = value();
        break;

      case '-a':
      case '--algorithm': {
        const algorithm = value().toLowerCase();
        if (!isSearchAlgorithm(algorithm)) {
          throw new Error(`Unknown algorithm "${algorithm}" (expected dfs, bfs, dijkstra or astar)`);
        }
        options.algorithm = algorithm;
        break;
      }

      case '-f':
      case '--format': {
        const format = value().toLowerCase();
        if (format !== 'text' && format !== 'json') {
          throw new Error(`Unknown format "${format}" (expected text or json)`);
        }
        options.outputFormat = format;
        break;
      }

      case '--start':
        options.start = singleChar(arg, value());
        break;

      case '--goal':
        options.goal = singleChar(arg, value());
        break;

      case '--wall':
        options.wall = singleChar(arg, value());
        break;

      case '-d':
      case '--diagonal':
        options.diagonal = true;
        break;

      case '--validate':
        options.validate = true;
        break;

      case '-h':
      case '--help':
        options.command = 'help';
        break;

      default:
        throw new Error(`Unknown argument "${arg}"`);
    }
  }

  return options;
}

function singleChar(flag: string, value: string): string {
  if (Array.from(value).length !== 1) {
    throw new Error(`${flag} expects a single character, got "${value}"`);
  }
  return value;
}

export const HELP_TEXT = `
Puzzle Search
=============

Shortest paths over character grids.

USAGE:
  puzzle-search <command> [options]

COMMANDS:
  search      Find a path with one algorithm
  compare     Run every algorithm on the same input
  help        Show this help message

OPTIONS:
  -i, --input <file|text>   Grid file, or the grid text itself
  -a, --algorithm <name>    dfs, bfs, dijkstra or astar (default: astar)
  -f, --format <type>       Output format: text (default) or json
  --start <char>            Start marker (default: ${DEFAULT_START_CHAR})
  --goal <char>             Goal marker (default: ${DEFAULT_GOAL_CHAR})
  --wall <char>             Impassable cell (default: ${DEFAULT_GRID_OPTIONS.wall})
  -d, --diagonal            Allow diagonal steps
  --validate                Check edge costs and heuristic while searching
  -h, --help                Show help

GRID FORMAT:
  Digits cost their value to enter, walls cannot be entered and any
  other character costs 1.

    S..#....
    .#.#.##.
    .#...#E.

EXAMPLES:
  puzzle-search search -i maze.txt
  puzzle-search search -i maze.txt -a bfs --diagonal
  puzzle-search compare -i maze.txt
`;
