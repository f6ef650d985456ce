import { type ShapeKind, SHAPE_KINDS } from '../types/shape-kind.js';
import { type Size } from '../types/rect.js';
import { Vertex } from '../classes/vertex.js';
import { polygonArea, boundingBox, DEGENERATE_AREA } from './polygon.js';
import * as errors from '../errors.js';

/**
 * Total area of the canonical seven-piece set, in unit². The assembled set is a
 * square with side 2√2 · unit.
 */
export const CANONICAL_SET_AREA = 8;

/** Sanity bounds on a single shape's area, in unit². */
export const MIN_SHAPE_AREA = 0.1;
export const MAX_SHAPE_AREA = 10;

/**
 * Returns the local-space vertex loop of a shape, counterclockwise.
 *
 * Triangles and the parallelogram have their anchor corner at (0, 0); the
 * square is a diamond centered on the origin. The anchor is also the pivot a
 * Piece rotates about.
 */
export function localVertices(kind: ShapeKind, unit: number): Vertex[] {
    switch (kind) {
        case 'large_triangle_1':
        case 'large_triangle_2':
            return rightTriangle(2 * unit);
        case 'medium_triangle':
            return rightTriangle(unit * Math.SQRT2);
        case 'small_triangle_1':
        case 'small_triangle_2':
            return rightTriangle(unit);
        case 'square': {
            const h = (unit * Math.SQRT2) / 2;
            return [new Vertex(0, -h), new Vertex(h, 0), new Vertex(0, h), new Vertex(-h, 0)];
        }
        case 'parallelogram': {
            // Long edges match a small triangle's hypotenuse, slanted edges a square side
            const long = unit * Math.SQRT2;
            const slant = unit / Math.SQRT2;
            return [new Vertex(0, 0), new Vertex(long, 0), new Vertex(long + slant, slant), new Vertex(slant, slant)];
        }
    }
}

function rightTriangle(leg: number): Vertex[] {
    return [new Vertex(0, 0), new Vertex(leg, 0), new Vertex(0, leg)];
}

export function shapeArea(kind: ShapeKind, unit: number): number {
    return polygonArea(localVertices(kind, unit));
}

export function vertexCount(kind: ShapeKind): number {
    return localVertices(kind, 1).length;
}

/**
 * Width and height of the shape's unrotated local extent.
 */
export function frameSize(kind: ShapeKind, unit: number): Size {
    const { width, height } = boundingBox(localVertices(kind, unit));
    return { width: Math.abs(width), height: Math.abs(height) };
}

/**
 * Sum of all seven shape areas; `CANONICAL_SET_AREA * unit²` for a valid set.
 */
export function totalArea(unit: number): number {
    return SHAPE_KINDS.reduce((sum, kind) => sum + shapeArea(kind, unit), 0);
}

/**
 * Checks one shape definition: at least 3 vertices, positive area, and an
 * area within [MIN_SHAPE_AREA, MAX_SHAPE_AREA] × unit².
 */
export function validateShape(kind: ShapeKind, unit: number): errors.ValidationResult {
    const vertices = localVertices(kind, unit);
    if (vertices.length < 3) {
        return errors.invalid(errors.tooFewVertices(vertices.length));
    }

    const area = polygonArea(vertices);
    if (area <= DEGENERATE_AREA) {
        return errors.invalid(errors.nonPositiveArea(area));
    }

    const unitSquared = unit * unit;
    const min = MIN_SHAPE_AREA * unitSquared;
    const max = MAX_SHAPE_AREA * unitSquared;
    if (area < min || area > max) {
        return errors.invalid(errors.areaOutOfBounds(kind, area, min, max));
    }
    return errors.VALID;
}

/**
 * Validates every shape and the canonical-set total (within `tolerance` unit²).
 * Meant for startup checks and tests.
 */
export function validateCatalog(unit: number, tolerance: number = 0.01): errors.ValidationResult {
    for (const kind of SHAPE_KINDS) {
        const result = validateShape(kind, unit);
        if (!result.ok) {
            return result;
        }
    }

    const unitSquared = unit * unit;
    const total = totalArea(unit);
    const expected = CANONICAL_SET_AREA * unitSquared;
    if (Math.abs(total - expected) > tolerance * unitSquared) {
        return errors.invalid(errors.totalAreaMismatch(total, expected));
    }
    return errors.VALID;
}
