/**
 * Immutable 2D vector. On grids `x` is the column and `y` the row,
 * with `y` growing downwards.
 */

import { Axis, Keyed } from '../domain/types.js';
import { DEFAULT_AXIS } from '../domain/constants.js';
import { InputParseError } from '../domain/errors.js';
import { Vec3D } from './vec3d.js';

export class Vec2D implements Keyed {
  readonly x: number;
  readonly y: number;

  constructor(x: number, y: number) {
    // + 0 turns -0 into 0 so equal vectors print and key the same
    this.x = x + 0;
    this.y = y + 0;
  }

  static from([x, y]: readonly [number, number]): Vec2D {
    return new Vec2D(x, y);
  }

  /**
   * Collect exactly two values into a vector
   */
  static fromIterable(values: Iterable<number>): Vec2D {
    const components = [...values];
    if (components.length !== 2) {
      throw new RangeError(`Vec2D needs exactly 2 components, got ${components.length}`);
    }
    return new Vec2D(components[0], components[1]);
  }

  /**
   * Unit step for a direction character: N U ^, S D v, E R >, W L <
   */
  static fromDirection(char: string): Vec2D {
    switch (char) {
      case 'N':
      case 'U':
      case '^':
        return new Vec2D(0, -1);
      case 'S':
      case 'D':
      case 'v':
        return new Vec2D(0, 1);
      case 'E':
      case 'R':
      case '>':
        return new Vec2D(1, 0);
      case 'W':
      case 'L':
      case '<':
        return new Vec2D(-1, 0);
      default:
        throw new InputParseError('Unknown direction', char);
    }
  }

  add(other: Vec2D): Vec2D {
    return new Vec2D(this.x + other.x, this.y + other.y);
  }

  sub(other: Vec2D): Vec2D {
    return new Vec2D(this.x - other.x, this.y - other.y);
  }

  scale(factor: number): Vec2D {
    return new Vec2D(this.x * factor, this.y * factor);
  }

  neg(): Vec2D {
    return new Vec2D(-this.x, -this.y);
  }

  /** Taxicab distance */
  manhattan(other: Vec2D): number {
    return Math.abs(this.x - other.x) + Math.abs(this.y - other.y);
  }

  /** King-move distance */
  chebyshev(other: Vec2D): number {
    return Math.max(Math.abs(this.x - other.x), Math.abs(this.y - other.y));
  }

  /** Straight-line distance */
  distanceTo(other: Vec2D): number {
    return Math.hypot(this.x - other.x, this.y - other.y);
  }

  dot(other: Vec2D): number {
    return this.x * other.x + this.y * other.y;
  }

  /**
   * Cross product of the two vectors lifted into the z = 0 plane
   */
  cross(other: Vec2D): Vec3D {
    return new Vec3D(0, 0, this.x * other.y - this.y * other.x);
  }

  /**
   * Embed in the plane normal to `normal`, that axis set to 0.
   * Inverse of Vec3D.planar.
   */
  toVec3D(normal: Axis = DEFAULT_AXIS): Vec3D {
    switch (normal) {
      case 'X':
        return new Vec3D(0, this.x, this.y);
      case 'Y':
        return new Vec3D(this.x, 0, this.y);
      case 'Z':
        return new Vec3D(this.x, this.y, 0);
    }
  }

  equals(other: Vec2D): boolean {
    return this.x === other.x && this.y === other.y;
  }

  key(): string {
    return `${this.x},${this.y}`;
  }

  toTuple(): [number, number] {
    return [this.x, this.y];
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}
