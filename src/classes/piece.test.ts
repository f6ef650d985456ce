import { describe, it, expect } from 'vitest';
import { Piece } from './piece.js';
import { GeometryError } from '../errors.js';
import { PIECE_COLORS } from '../types/piece-color.js';

const config = { unit: 50 };
const PIECE_ID = '00000000-0000-4000-8000-000000000001';
const OTHER_ID = '00000000-0000-4000-8000-000000000002';

function makePiece(overrides: Partial<Parameters<typeof Piece.create>[0]> = {}): Piece {
  return Piece.create(
    {
      kind: 'large_triangle_1',
      position: { x: 100, y: 100 },
      color: 'red',
      id: PIECE_ID,
      ...overrides,
    },
    config,
  );
}

describe('Piece', () => {
  describe('worldVertices', () => {
    it('translates the local vertices to the position', () => {
      const points = makePiece().worldVertices().map((v) => v.toJSON());
      expect(points).toEqual([
        { x: 100, y: 100 },
        { x: 200, y: 100 },
        { x: 100, y: 200 },
      ]);
    });

    it('rotates about the local anchor before translating', () => {
      const vertices = makePiece({ rotation: Math.PI / 2 }).worldVertices();
      const expected = [[100, 100], [100, 200], [0, 100]];
      expect(vertices).toHaveLength(3);
      vertices.forEach((v, i) => {
        expect(v.x).toBeCloseTo(expected[i][0], 9);
        expect(v.y).toBeCloseTo(expected[i][1], 9);
      });
    });
  });

  it('boundingBox covers the world vertices', () => {
    const square = makePiece({ kind: 'square', position: { x: 0, y: 0 } });
    const box = square.boundingBox();
    const h = (50 * Math.SQRT2) / 2;
    expect(box.x).toBeCloseTo(-h, 9);
    expect(box.y).toBeCloseTo(-h, 9);
    expect(box.width).toBeCloseTo(2 * h, 9);
    expect(box.height).toBeCloseTo(2 * h, 9);
  });

  describe('transforms', () => {
    it('return new pieces that keep id, kind and color', () => {
      const piece = makePiece();
      const moved = piece.translated(5, -5).rotatedBy(0.5).movedTo({ x: 1, y: 2 });

      expect(moved).not.toBe(piece);
      expect(moved.id).toBe(PIECE_ID);
      expect(moved.kind).toBe('large_triangle_1');
      expect(moved.color).toBe('red');
      expect(moved.position.toJSON()).toEqual({ x: 1, y: 2 });
      expect(moved.rotation).toBe(0.5);

      // Original is untouched
      expect(piece.position.toJSON()).toEqual({ x: 100, y: 100 });
      expect(piece.rotation).toBe(0);
    });

    it('composes rotations additively', () => {
      const piece = makePiece({ rotation: 0.2 });
      const twice = piece.rotatedBy(0.3).rotatedBy(0.4);
      const once = piece.rotatedBy(0.7);
      expect(twice.rotation).toBeCloseTo(once.rotation, 12);
      expect(twice.equals(once, 1)).toBe(true);
    });

    it('rotatedTo sets an absolute rotation', () => {
      expect(makePiece({ rotation: 1 }).rotatedTo(0.25).rotation).toBe(0.25);
    });

    it('reset zeroes rotation and optionally moves', () => {
      const piece = makePiece({ rotation: 1.5 });
      const reset = piece.reset();
      expect(reset.rotation).toBe(0);
      expect(reset.position.toJSON()).toEqual({ x: 100, y: 100 });

      const moved = piece.reset({ x: 5, y: 6 });
      expect(moved.rotation).toBe(0);
      expect(moved.position.toJSON()).toEqual({ x: 5, y: 6 });
    });

    it('withColor changes only the color', () => {
      const recolored = makePiece().withColor('green');
      expect(recolored.color).toBe('green');
      expect(recolored.id).toBe(PIECE_ID);
    });
  });

  describe('snappedRotation', () => {
    const snap = Math.PI / 12;

    it('rounds to the nearest snap increment', () => {
      const snapped = makePiece({ rotation: 0.27 }).snappedRotation(snap);
      expect(snapped.rotation).toBeCloseTo(snap, 12);
    });

    it('is idempotent and returns the same instance once snapped', () => {
      const once = makePiece({ rotation: 0.27 }).snappedRotation(snap);
      expect(once.snappedRotation(snap)).toBe(once);
    });

    it('leaves rotations within the snap epsilon untouched', () => {
      const piece = makePiece({ rotation: snap + 0.0005 });
      expect(piece.snappedRotation(snap)).toBe(piece);
    });

    it('rounds halfway rotations away from zero in both directions', () => {
      expect(makePiece({ rotation: snap / 2 }).snappedRotation(snap).rotation).toBe(snap);
      expect(makePiece({ rotation: -snap / 2 }).snappedRotation(snap).rotation).toBe(-snap);
    });

    it('snaps small negative rotations to positive zero', () => {
      const snapped = makePiece({ rotation: -0.1 }).snappedRotation(snap);
      expect(Object.is(snapped.rotation, 0)).toBe(true);
    });

    it('ignores a non-positive snap angle', () => {
      const piece = makePiece({ rotation: 0.27 });
      expect(piece.snappedRotation(0)).toBe(piece);
    });
  });

  describe('equals', () => {
    it('compares id, kind, position within tolerance and rotation within tolerance / 1000', () => {
      const piece = makePiece({ rotation: 1 });
      expect(piece.equals(piece.translated(0.5, -0.5), 1)).toBe(true);
      expect(piece.equals(piece.translated(2, 0), 1)).toBe(false);
      expect(piece.equals(piece.rotatedBy(0.0005), 1)).toBe(true);
      expect(piece.equals(piece.rotatedBy(0.002), 1)).toBe(false);
      expect(piece.equals(makePiece({ id: OTHER_ID, rotation: 1 }), 1)).toBe(false);
    });

    it('ignores color', () => {
      const piece = makePiece();
      expect(piece.equals(piece.withColor('pink'), 0.1)).toBe(true);
    });
  });

  it('formats a description and a status line', () => {
    const piece = makePiece({ kind: 'square', position: { x: 10, y: 20 }, rotation: Math.PI / 2 });
    expect(piece.description).toBe('Square at (10.0, 20.0), rotated 90.0°');
    expect(piece.statusString).toBe('square | pos: (10,20) | rot: 90.0°');
  });

  it('dumps every world vertex in the debug description', () => {
    const piece = makePiece({ kind: 'small_triangle_1', position: { x: 10, y: 20 } });
    expect(piece.debugDescription).toBe(
      [
        'Small Triangle 1 at (10.0, 20.0), rotated 0.0°',
        `  ID: ${PIECE_ID}`,
        '  Base Vertices: 3',
        '  Current Vertices: 3',
        '  Bounding Box: (10.0, 20.0) - 50.0×50.0',
        '  Vertices:',
        '    [0]: (10.00, 20.00)',
        '    [1]: (60.00, 20.00)',
        '    [2]: (10.00, 70.00)',
      ].join('\n'),
    );
  });

  it('mints distinct UUIDs when no id is given', () => {
    const a = Piece.create({ kind: 'square', position: { x: 0, y: 0 }, color: 'blue' }, config);
    const b = Piece.create({ kind: 'square', position: { x: 0, y: 0 }, color: 'blue' }, config);
    expect(a.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(a.id).not.toBe(b.id);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(makePiece())).toBe(true);
  });

  describe('serialization', () => {
    it('round-trips every color', () => {
      for (const color of PIECE_COLORS) {
        const piece = makePiece({ kind: 'parallelogram', rotation: 0.75, color });
        const restored = Piece.fromJSON(JSON.parse(JSON.stringify(piece)), config);
        expect(restored.id).toBe(PIECE_ID);
        expect(restored.kind).toBe('parallelogram');
        expect(restored.position.toJSON()).toEqual({ x: 100, y: 100 });
        expect(restored.rotation).toBe(0.75);
        expect(restored.color).toBe(color);
      }
    });

    it('writes the persisted field names', () => {
      expect(makePiece({ rotation: 0.5 }).toJSON()).toEqual({
        id: PIECE_ID,
        type: 'large_triangle_1',
        position: { x: 100, y: 100 },
        rotation: 0.5,
        colorData: 'red',
      });
    });

    it('falls back to blue for an unknown color', () => {
      const restored = Piece.fromJSON(
        { id: PIECE_ID, type: 'square', position: { x: 0, y: 0 }, rotation: 0, colorData: 'magenta' },
        config,
      );
      expect(restored.color).toBe('blue');
    });

    it('rejects an unknown shape type', () => {
      const data = { id: PIECE_ID, type: 'hexagon', position: { x: 0, y: 0 }, rotation: 0, colorData: 'red' };
      expect(() => Piece.fromJSON(data, config)).toThrow(GeometryError);
      expect(() => Piece.fromJSON(data, config)).toThrow(/^Invalid piece data: type: /);
    });

    it('rejects an id that is not a UUID', () => {
      const data = { id: 'piece-1', type: 'square', position: { x: 0, y: 0 }, rotation: 0, colorData: 'red' };
      expect(() => Piece.fromJSON(data, config)).toThrow(/^Invalid piece data: id: /);
    });

    it('reports the InvalidPieceData kind for missing fields', () => {
      try {
        Piece.fromJSON({ id: PIECE_ID, type: 'square', position: { x: 0, y: 0 }, colorData: 'red' }, config);
        expect.unreachable('fromJSON should have thrown');
      } catch (e) {
        expect(e).toBeInstanceOf(GeometryError);
        if (e instanceof GeometryError) {
          expect(e.kind).toBe('InvalidPieceData');
          expect(e.message).toBe('Invalid piece data: rotation: Required');
        }
      }
    });
  });
});
