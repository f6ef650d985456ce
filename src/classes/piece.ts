import { randomUUID } from 'node:crypto';
import { type Point } from '../types/vertex.js';
import { type Rect } from '../types/rect.js';
import { type ShapeKind, shapeDisplayName } from '../types/shape-kind.js';
import { type PieceColor, decodePieceColor } from '../types/piece-color.js';
import { type PieceData, pieceDataSchema } from '../types/piece.js';
import { type Configuration } from '../config.js';
import { localVertices } from '../algorithms/shape-catalog.js';
import { boundingBox } from '../algorithms/polygon.js';
import { Vertex, ORIGIN } from './vertex.js';
import * as errors from '../errors.js';

/**
 * Rotations closer than this to their snapped value are left untouched.
 * Fixed, independent of the configured vertex tolerance.
 */
export const SNAP_EPSILON = 0.001;

export interface PieceInit {
  kind: ShapeKind;
  position: Point;
  /** Radians. Defaults to 0. */
  rotation?: number;
  color: PieceColor;
  /** Preserved identity, e.g. when restoring from storage. A fresh UUID is minted if omitted. */
  id?: string;
}

interface PieceFields {
  id: string;
  kind: ShapeKind;
  position: Vertex;
  rotation: number;
  color: PieceColor;
  unit: number;
}

/**
 * A tangram shape instance: kind + pose + display color.
 *
 * Pieces are values. Every transform returns a new Piece with the same `id`;
 * nothing is mutated in place. World-space vertices are derived on each call
 * from (kind, position, rotation) and never cached.
 */
export class Piece {
  readonly id: string;
  readonly kind: ShapeKind;
  readonly position: Vertex;
  /** Radians, counterclockwise, about the shape's local anchor. */
  readonly rotation: number;
  readonly color: PieceColor;
  /** Scale the local vertices were generated with (Configuration.unit). */
  readonly unit: number;

  private constructor(fields: PieceFields) {
    this.id = fields.id;
    this.kind = fields.kind;
    this.position = fields.position;
    this.rotation = fields.rotation;
    this.color = fields.color;
    this.unit = fields.unit;
    Object.freeze(this);
  }

  static create(init: PieceInit, config: Pick<Configuration, 'unit'>): Piece {
    return new Piece({
      id: init.id ?? randomUUID(),
      kind: init.kind,
      position: Vertex.from(init.position),
      rotation: init.rotation ?? 0,
      color: init.color,
      unit: config.unit,
    });
  }

  private with(changes: Partial<Omit<PieceFields, 'id' | 'kind' | 'unit'>>): Piece {
    return new Piece({
      id: this.id,
      kind: this.kind,
      position: changes.position ?? this.position,
      rotation: changes.rotation ?? this.rotation,
      color: changes.color ?? this.color,
      unit: this.unit,
    });
  }

  // ------------------------------------------------------------------------
  // Geometry
  // ------------------------------------------------------------------------

  /**
   * Local vertices rotated about the local origin, then translated to `position`.
   */
  worldVertices(): Vertex[] {
    return localVertices(this.kind, this.unit).map((v) =>
      v.rotatedAround(ORIGIN, this.rotation).translated(this.position.x, this.position.y),
    );
  }

  /**
   * Axis-aligned bounds of the world vertices; a zero-size rect at `position` if there are none.
   */
  boundingBox(): Rect {
    const vertices = this.worldVertices();
    if (vertices.length === 0) {
      return { x: this.position.x, y: this.position.y, width: 0, height: 0 };
    }
    return boundingBox(vertices);
  }

  get rotationDegrees(): number {
    return (this.rotation * 180) / Math.PI;
  }

  // ------------------------------------------------------------------------
  // Transforms
  // ------------------------------------------------------------------------

  translated(dx: number, dy: number): Piece {
    return this.with({ position: this.position.translated(dx, dy) });
  }

  movedTo(position: Point): Piece {
    return this.with({ position: Vertex.from(position) });
  }

  rotatedBy(angle: number): Piece {
    return this.with({ rotation: this.rotation + angle });
  }

  rotatedTo(angle: number): Piece {
    return this.with({ rotation: angle });
  }

  /**
   * Zeroes the rotation, optionally moving to `position`.
   */
  reset(position?: Point): Piece {
    return this.with({ rotation: 0, position: position ? Vertex.from(position) : this.position });
  }

  /**
   * Rounds the rotation to the nearest multiple of `snapAngle`, with halfway
   * cases rounded away from zero so that ±snap/2 go to ±snap.
   * Returns this same instance when the rotation is already within SNAP_EPSILON of it.
   */
  snappedRotation(snapAngle: number): Piece {
    if (!(snapAngle > 0)) {
      return this;
    }
    const steps = this.rotation / snapAngle;
    const snapped = Math.sign(steps) * Math.round(Math.abs(steps)) * snapAngle + 0;
    if (Math.abs(this.rotation - snapped) <= SNAP_EPSILON) {
      return this;
    }
    return this.with({ rotation: snapped });
  }

  withColor(color: PieceColor): Piece {
    return this.with({ color });
  }

  // ------------------------------------------------------------------------
  // Comparison & display
  // ------------------------------------------------------------------------

  /**
   * Same id and kind, positions matching within `tolerance`, and rotations
   * within `tolerance / 1000`. Color is not compared.
   */
  equals(other: Piece, tolerance: number): boolean {
    return (
      this.id === other.id &&
      this.kind === other.kind &&
      this.position.matches(other.position, tolerance) &&
      Math.abs(this.rotation - other.rotation) < tolerance / 1000
    );
  }

  /** e.g. `Square at (10.0, 20.0), rotated 90.0°` */
  get description(): string {
    return `${shapeDisplayName(this.kind)} at (${this.position.x.toFixed(1)}, ${this.position.y.toFixed(1)}), rotated ${this.rotationDegrees.toFixed(1)}°`;
  }

  /** e.g. `square | pos: (10,20) | rot: 90.0°` */
  get statusString(): string {
    return `${this.kind} | pos: (${this.position.x.toFixed(0)},${this.position.y.toFixed(0)}) | rot: ${this.rotationDegrees.toFixed(1)}°`;
  }

  /**
   * Multi-line dump: description, id, vertex counts, bounds and every world vertex.
   */
  get debugDescription(): string {
    const vertices = this.worldVertices();
    const box = this.boundingBox();
    const lines = [
      this.description,
      `  ID: ${this.id}`,
      `  Base Vertices: ${String(localVertices(this.kind, this.unit).length)}`,
      `  Current Vertices: ${String(vertices.length)}`,
      `  Bounding Box: (${box.x.toFixed(1)}, ${box.y.toFixed(1)}) - ${box.width.toFixed(1)}×${box.height.toFixed(1)}`,
    ];
    if (vertices.length > 0) {
      lines.push('  Vertices:');
      vertices.forEach((v, i) => {
        lines.push(`    [${String(i)}]: (${v.x.toFixed(2)}, ${v.y.toFixed(2)})`);
      });
    }
    return lines.join('\n');
  }

  // ------------------------------------------------------------------------
  // Serialization
  // ------------------------------------------------------------------------

  toJSON(): PieceData {
    return {
      id: this.id,
      type: this.kind,
      position: { x: this.position.x, y: this.position.y },
      rotation: this.rotation,
      colorData: this.color,
    };
  }

  /**
   * Restores a piece from its persisted form, keeping the stored id.
   * Throws `InvalidPieceData` for structurally invalid input; an unknown
   * color tag falls back to the default color instead of failing.
   */
  static fromJSON(data: unknown, config: Pick<Configuration, 'unit'>): Piece {
    const result = pieceDataSchema.safeParse(data);
    if (!result.success) {
      throw errors.invalidPieceData(errors.describeIssues(result.error));
    }
    return Piece.fromData(result.data, config);
  }

  /**
   * Builds a piece from already-validated persisted data.
   */
  static fromData(data: PieceData, config: Pick<Configuration, 'unit'>): Piece {
    return Piece.create(
      {
        id: data.id,
        kind: data.type,
        position: data.position,
        rotation: data.rotation,
        color: decodePieceColor(data.colorData),
      },
      config,
    );
  }
}
