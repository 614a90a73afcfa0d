/**
 * Immutable 3D vector
 */

import { Axis, Keyed } from '../domain/types.js';
import { DEFAULT_AXIS } from '../domain/constants.js';
import { Vec2D } from './vec2d.js';

export class Vec3D implements Keyed {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  constructor(x: number, y: number, z: number) {
    this.x = x + 0;
    this.y = y + 0;
    this.z = z + 0;
  }

  static from([x, y, z]: readonly [number, number, number]): Vec3D {
    return new Vec3D(x, y, z);
  }

  static fromVec2D(v: Vec2D, normal: Axis = DEFAULT_AXIS): Vec3D {
    return v.toVec3D(normal);
  }

  static fromIterable(values: Iterable<number>): Vec3D {
    const components = [...values];
    if (components.length !== 3) {
      throw new RangeError(`Vec3D needs exactly 3 components, got ${components.length}`);
    }
    return new Vec3D(components[0], components[1], components[2]);
  }

  add(other: Vec3D): Vec3D {
    return new Vec3D(this.x + other.x, this.y + other.y, this.z + other.z);
  }

  sub(other: Vec3D): Vec3D {
    return new Vec3D(this.x - other.x, this.y - other.y, this.z - other.z);
  }

  scale(factor: number): Vec3D {
    return new Vec3D(this.x * factor, this.y * factor, this.z * factor);
  }

  manhattan(other: Vec3D): number {
    return Math.abs(this.x - other.x) + Math.abs(this.y - other.y) + Math.abs(this.z - other.z);
  }

  distanceTo(other: Vec3D): number {
    return Math.hypot(this.x - other.x, this.y - other.y, this.z - other.z);
  }

  dot(other: Vec3D): number {
    return this.x * other.x + this.y * other.y + this.z * other.z;
  }

  cross(other: Vec3D): Vec3D {
    return new Vec3D(
      this.y * other.z - this.z * other.y,
      this.z * other.x - this.x * other.z,
      this.x * other.y - this.y * other.x
    );
  }

  /**
   * Project onto the plane normal to `normal`:
   * X gives (y, z), Y gives (x, z), Z gives (x, y)
   */
  planar(normal: Axis = DEFAULT_AXIS): Vec2D {
    switch (normal) {
      case 'X':
        return new Vec2D(this.y, this.z);
      case 'Y':
        return new Vec2D(this.x, this.z);
      case 'Z':
        return new Vec2D(this.x, this.y);
    }
  }

  equals(other: Vec3D): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }

  key(): string {
    return `${this.x},${this.y},${this.z}`;
  }

  toTuple(): [number, number, number] {
    return [this.x, this.y, this.z];
  }

  toString(): string {
    return `(${this.x}, ${this.y}, ${this.z})`;
  }
}
