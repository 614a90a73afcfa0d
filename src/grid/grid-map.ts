/**
 * Character grid exposed as a search space.
 *
 * Wall characters are impassable, digits cost their value to enter and
 * every other character costs 1.
 */

import { GridBounds, Heuristic, WeightedGraph } from '../domain/types.js';
import { DEFAULT_GRID_OPTIONS } from '../domain/constants.js';
import { Vec2D } from '../measure/vec2d.js';
import { CARDINALS, COMPASS, inBounds, neighborsOf } from '../measure/direction.js';
import { readGrid } from '../io/reader.js';

export interface GridOptions {
  wall: string;
  diagonal: boolean; // allow the four ordinal steps as well
}

export class GridMap {
  readonly rows: number;
  readonly cols: number;
  private readonly options: GridOptions;
  private cheapestStep: number | null = null;

  constructor(private readonly cells: readonly (readonly string[])[], options: Partial<GridOptions> = {}) {
    this.options = { ...DEFAULT_GRID_OPTIONS, ...options };
    this.rows = cells.length;
    this.cols = cells.reduce((widest, row) => Math.max(widest, row.length), 0);
  }

  /**
   * Parse a grid from a file path or literal text
   */
  static parse(source: string, options: Partial<GridOptions> = {}): GridMap {
    return new GridMap(readGrid(source), options);
  }

  get bounds(): GridBounds {
    return { rows: this.rows, cols: this.cols };
  }

  get diagonal(): boolean {
    return this.options.diagonal;
  }

  /**
   * Character at a position, or null off the grid (including past the
   * end of a short row)
   */
  at(position: Vec2D): string | null {
    if (!this.inBounds(position)) return null;
    return this.cells[position.y][position.x] ?? null;
  }

  inBounds(position: Vec2D): boolean {
    return inBounds(position, this.bounds);
  }

  isPassable(position: Vec2D): boolean {
    const char = this.at(position);
    return char !== null && char !== this.options.wall;
  }

  /**
   * Cost of stepping onto a cell
   */
  cost(position: Vec2D): number {
    const char = this.at(position);
    if (char !== null && char >= '0' && char <= '9') {
      return Number(char);
    }
    return 1;
  }

  /**
   * Positions holding `char`, in reading order
   */
  find(char: string): Vec2D[] {
    const found: Vec2D[] = [];

    for (let y = 0; y < this.rows; y++) {
      for (let x = 0; x < this.cells[y].length; x++) {
        if (this.cells[y][x] === char) {
          found.push(new Vec2D(x, y));
        }
      }
    }

    return found;
  }

  neighbors(position: Vec2D): Vec2D[] {
    const directions = this.options.diagonal ? COMPASS : CARDINALS;
    return neighborsOf(position, directions, this.bounds).filter(next => this.isPassable(next));
  }

  weightedNeighbors(position: Vec2D): Array<[Vec2D, number]> {
    return this.neighbors(position).map((next): [Vec2D, number] => [next, this.cost(next)]);
  }

  /**
   * Cheapest entry cost of any passable cell; 0 on a grid without one
   */
  minStepCost(): number {
    if (this.cheapestStep === null) {
      let cheapest = Infinity;
      for (let y = 0; y < this.rows; y++) {
        for (let x = 0; x < this.cells[y].length; x++) {
          const position = new Vec2D(x, y);
          if (this.isPassable(position)) {
            cheapest = Math.min(cheapest, this.cost(position));
          }
        }
      }
      this.cheapestStep = Number.isFinite(cheapest) ? cheapest : 0;
    }
    return this.cheapestStep;
  }

  /**
   * Step-count distance to `goal` scaled by the cheapest step, which keeps
   * it admissible and consistent for this grid
   */
  heuristic(goal: Vec2D): Heuristic<Vec2D> {
    const perStep = this.minStepCost();
    return this.options.diagonal
      ? position => position.chebyshev(goal) * perStep
      : position => position.manhattan(goal) * perStep;
  }

  toGraph(goal: Vec2D): WeightedGraph<Vec2D> {
    return {
      moves: position => this.neighbors(position),
      isDone: position => position.equals(goal),
      weight: (_from, to) => this.cost(to),
    };
  }
}
