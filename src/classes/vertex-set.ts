import { type Point } from '../types/vertex.js';
import { Vertex, cellKey } from './vertex.js';

/**
 * A set of vertices under tolerance equality.
 *
 * Vertices are bucketed by `Vertex.gridCell(tolerance)`. Since two matching
 * points are at most one cell apart on each axis, lookups scan the 3×3
 * neighbourhood of the probe's cell and compare with `Vertex.matches`.
 */
export class VertexSet {
  private readonly _cells: Map<string, Vertex[]> = new Map();
  private _size = 0;

  constructor(
    readonly tolerance: number,
    vertices: Iterable<Point> = [],
  ) {
    for (const v of vertices) {
      this.add(v);
    }
  }

  get size(): number {
    return this._size;
  }

  /**
   * Returns the stored vertex that matches `point`, if any.
   */
  find(point: Point): Vertex | undefined {
    const probe = Vertex.from(point);
    const [col, row] = probe.gridCell(this.tolerance);

    for (let dc = -1; dc <= 1; dc++) {
      for (let dr = -1; dr <= 1; dr++) {
        const bucket = this._cells.get(cellKey(col + dc, row + dr));
        const hit = bucket?.find((v) => v.matches(probe, this.tolerance));
        if (hit) {
          return hit;
        }
      }
    }
    return undefined;
  }

  has(point: Point): boolean {
    return this.find(point) !== undefined;
  }

  /**
   * Adds `point` unless a matching vertex is already present.
   * Returns true if the set grew.
   */
  add(point: Point): boolean {
    if (this.has(point)) {
      return false;
    }

    const vertex = Vertex.from(point);
    const key = vertex.hashKey(this.tolerance);
    const bucket = this._cells.get(key);
    if (bucket) {
      bucket.push(vertex);
    } else {
      this._cells.set(key, [vertex]);
    }
    this._size++;
    return true;
  }

  *values(): IterableIterator<Vertex> {
    for (const bucket of this._cells.values()) {
      yield* bucket;
    }
  }

  [Symbol.iterator](): IterableIterator<Vertex> {
    return this.values();
  }
}
