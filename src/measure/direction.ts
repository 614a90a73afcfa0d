/**
 * Direction sets for stepping across a grid
 */

import { GridBounds } from '../domain/types.js';
import { Vec2D } from './vec2d.js';

// N, E, S, W
export const CARDINALS: readonly Vec2D[] = [
  new Vec2D(0, -1),
  new Vec2D(1, 0),
  new Vec2D(0, 1),
  new Vec2D(-1, 0),
];

// NE, SE, SW, NW
export const ORDINALS: readonly Vec2D[] = [
  new Vec2D(1, -1),
  new Vec2D(1, 1),
  new Vec2D(-1, 1),
  new Vec2D(-1, -1),
];

// N, NE, E, SE, S, SW, W, NW
export const COMPASS: readonly Vec2D[] = [
  CARDINALS[0],
  ORDINALS[0],
  CARDINALS[1],
  ORDINALS[1],
  CARDINALS[2],
  ORDINALS[2],
  CARDINALS[3],
  ORDINALS[3],
];

export function inBounds(position: Vec2D, bounds: GridBounds): boolean {
  return position.x >= 0 && position.x < bounds.cols && position.y >= 0 && position.y < bounds.rows;
}

/**
 * Positions one step away in each direction, dropping any outside `bounds`
 */
export function neighborsOf(
  from: Vec2D,
  directions: readonly Vec2D[] = CARDINALS,
  bounds?: GridBounds
): Vec2D[] {
  const result: Vec2D[] = [];

  for (const direction of directions) {
    const next = from.add(direction);
    if (bounds === undefined || inBounds(next, bounds)) {
      result.push(next);
    }
  }

  return result;
}
