import { type Point } from '../types/vertex.js';

/**
 * Immutable 2D point with the rigid-motion primitives the kernel is built on.
 * Every operation returns a new Vertex.
 */
export class Vertex implements Point {
  readonly x: number;
  readonly y: number;

  constructor(x: number = 0, y: number = 0) {
    this.x = x;
    this.y = y;
    Object.freeze(this);
  }

  /**
   * Copies any `{ x, y }` value into a Vertex. Returns the argument itself if it already is one.
   */
  static from(point: Point): Vertex {
    return point instanceof Vertex ? point : new Vertex(point.x, point.y);
  }

  /**
   * Unit-length vector pointing at `angle` radians (0 = +X, π/2 = +Y).
   */
  static unitVector(angle: number): Vertex {
    return new Vertex(Math.cos(angle), Math.sin(angle));
  }

  /**
   * Vertices of a regular polygon centered on the origin, counterclockwise from `startAngle`.
   * Returns an empty array for fewer than 3 sides.
   */
  static regularPolygon(sides: number, radius: number, startAngle: number = 0): Vertex[] {
    if (!Number.isInteger(sides) || sides < 3) {
      return [];
    }

    const step = (2 * Math.PI) / sides;
    return Array.from({ length: sides }, (_, i) => {
      const angle = startAngle + i * step;
      return new Vertex(radius * Math.cos(angle), radius * Math.sin(angle));
    });
  }

  translated(dx: number, dy: number): Vertex {
    return new Vertex(this.x + dx, this.y + dy);
  }

  /**
   * Translates by another point's coordinates, treated as an offset.
   */
  translatedBy(offset: Point): Vertex {
    return this.translated(offset.x, offset.y);
  }

  /**
   * Rotates about `pivot` by `angle` radians; positive angles turn counterclockwise.
   */
  rotatedAround(pivot: Point, angle: number): Vertex {
    const dx = this.x - pivot.x;
    const dy = this.y - pivot.y;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);

    return new Vertex(dx * cos - dy * sin + pivot.x, dx * sin + dy * cos + pivot.y);
  }

  rotated(angle: number): Vertex {
    return this.rotatedAround(ORIGIN, angle);
  }

  /**
   * Moves the point along the ray from `origin` so its distance is multiplied by `factor`.
   */
  scaledFrom(origin: Point, factor: number): Vertex {
    return new Vertex(origin.x + (this.x - origin.x) * factor, origin.y + (this.y - origin.y) * factor);
  }

  distanceTo(other: Point): number {
    return Math.sqrt(this.squaredDistanceTo(other));
  }

  squaredDistanceTo(other: Point): number {
    const dx = other.x - this.x;
    const dy = other.y - this.y;
    return dx * dx + dy * dy;
  }

  midpointWith(other: Point): Vertex {
    return new Vertex((this.x + other.x) / 2, (this.y + other.y) / 2);
  }

  isWithinDistance(threshold: number, other: Point): boolean {
    return this.distanceTo(other) <= threshold;
  }

  /**
   * Tolerance equality: true iff both coordinate deltas are at most `tolerance`.
   */
  matches(other: Point, tolerance: number): boolean {
    return Math.abs(this.x - other.x) <= tolerance && Math.abs(this.y - other.y) <= tolerance;
  }

  /**
   * Grid cell of this point on a lattice of spacing `tolerance`, as a string key.
   *
   * Points that `matches` each other land in the same cell or in adjacent cells
   * (never further apart), which is what VertexSet relies on.
   */
  hashKey(tolerance: number): string {
    const [col, row] = this.gridCell(tolerance);
    return cellKey(col, row);
  }

  gridCell(tolerance: number): [number, number] {
    // `+ 0` folds -0 into 0 so mirrored cells share a key
    return [Math.round(this.x / tolerance) + 0, Math.round(this.y / tolerance) + 0];
  }

  equals(other: Point): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toJSON(): Point {
    return { x: this.x, y: this.y };
  }

  toString(): string {
    return `Vertex(x: ${this.x.toFixed(2)}, y: ${this.y.toFixed(2)})`;
  }
}

export function cellKey(col: number, row: number): string {
  return `${String(col)},${String(row)}`;
}

export const ORIGIN = new Vertex(0, 0);
