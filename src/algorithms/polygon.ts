import { type Point } from '../types/vertex.js';
import { type Rect } from '../types/rect.js';
import { type Configuration } from '../config.js';
import { Vertex, ORIGIN } from '../classes/vertex.js';
import { type Logger, silentLogger } from '../logger.js';
import * as errors from '../errors.js';

/**
 * Areas at or below this are treated as zero when a formula divides by area.
 */
export const DEGENERATE_AREA = 1e-9;

/**
 * Smallest area `validatePolygon` accepts, in squared coordinate units.
 */
export const MIN_POLYGON_AREA = 1;

/**
 * Twice the signed area of a polygon (shoelace sum). Positive for counterclockwise loops.
 */
function doubledSignedArea(vertices: readonly Point[]): number {
    let sum = 0;
    const n = vertices.length;
    for (let i = 0; i < n; i++) {
        const current = vertices[i];
        const next = vertices[(i + 1) % n];
        sum += current.x * next.y - next.x * current.y;
    }
    return sum;
}

/**
 * Calculates the area of a simple polygon with the shoelace formula.
 *
 * @param vertices The polygon's vertex loop, in order (either winding).
 * @returns The absolute area, or 0 for fewer than 3 vertices.
 */
export function polygonArea(vertices: readonly Point[], logger: Logger = silentLogger): number {
    if (vertices.length < 3) {
        logger.debug('polygonArea: fewer than 3 vertices, area is 0', { count: vertices.length });
        return 0;
    }
    return Math.abs(doubledSignedArea(vertices)) / 2;
}

/**
 * Arithmetic mean of the vertices.
 */
export function vertexAverage(vertices: readonly Point[]): Vertex {
    if (vertices.length === 0) {
        return ORIGIN;
    }
    let sumX = 0;
    let sumY = 0;
    for (const v of vertices) {
        sumX += v.x;
        sumY += v.y;
    }
    return new Vertex(sumX / vertices.length, sumY / vertices.length);
}

/**
 * Calculates the centroid of a polygon.
 *
 * - 0 vertices: the origin.
 * - 1 vertex: that vertex.
 * - 2 vertices: their midpoint.
 * - 3+ vertices: the area-weighted centroid, or the vertex average when the
 *   polygon has (near) zero area.
 */
export function polygonCentroid(vertices: readonly Point[], logger: Logger = silentLogger): Vertex {
    if (vertices.length === 0) {
        logger.debug('polygonCentroid: empty vertex list, using origin');
        return ORIGIN;
    }
    if (vertices.length === 1) {
        return Vertex.from(vertices[0]);
    }
    if (vertices.length === 2) {
        return Vertex.from(vertices[0]).midpointWith(vertices[1]);
    }

    const doubled = doubledSignedArea(vertices);
    if (Math.abs(doubled) / 2 <= DEGENERATE_AREA) {
        logger.debug('polygonCentroid: degenerate polygon, using vertex average', { count: vertices.length });
        return vertexAverage(vertices);
    }

    let cx = 0;
    let cy = 0;
    const n = vertices.length;
    for (let i = 0; i < n; i++) {
        const current = vertices[i];
        const next = vertices[(i + 1) % n];
        const cross = current.x * next.y - next.x * current.y;
        cx += (current.x + next.x) * cross;
        cy += (current.y + next.y) * cross;
    }

    // Signed area keeps the result correct for clockwise loops too
    const factor = 1 / (3 * doubled);
    return new Vertex(cx * factor, cy * factor);
}

/**
 * Axis-aligned bounding box of the vertices. An empty list yields a zero rect at the origin.
 */
export function boundingBox(vertices: readonly Point[]): Rect {
    if (vertices.length === 0) {
        return { x: 0, y: 0, width: 0, height: 0 };
    }

    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const { x, y } of vertices) {
        if (x < minX) minX = x;
        if (y < minY) minY = y;
        if (x > maxX) maxX = x;
        if (y > maxY) maxY = y;
    }
    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

export function translateAll(vertices: readonly Point[], offset: Point): Vertex[] {
    return vertices.map((v) => Vertex.from(v).translatedBy(offset));
}

export function rotateAll(vertices: readonly Point[], pivot: Point, angle: number): Vertex[] {
    return vertices.map((v) => Vertex.from(v).rotatedAround(pivot, angle));
}

export function scaleAll(vertices: readonly Point[], origin: Point, factor: number): Vertex[] {
    return vertices.map((v) => Vertex.from(v).scaledFrom(origin, factor));
}

export interface PolygonTransform {
    /** Offset applied first. Defaults to no offset. */
    translation?: Point;
    /** Radians, applied about the translated polygon's own centroid. Defaults to 0. */
    rotation?: number;
    /** Uniform factor, applied about the rotated polygon's own centroid. Defaults to 1. */
    scale?: number;
}

/**
 * Composite transform: translate, then rotate about the current centroid,
 * then scale about the (recomputed) centroid. Each step sees the previous
 * step's output. Rotation 0 and scale 1 are skipped.
 */
export function transformPolygon(vertices: readonly Point[], transform: PolygonTransform): Vertex[] {
    const { translation = ORIGIN, rotation = 0, scale = 1 } = transform;

    let result = translateAll(vertices, translation);
    if (rotation !== 0) {
        result = rotateAll(result, polygonCentroid(result), rotation);
    }
    if (scale !== 1) {
        result = scaleAll(result, polygonCentroid(result), scale);
    }
    return result;
}

/**
 * Checks that a vertex loop describes a usable piece outline: at least 3
 * vertices, every edge at least `minVertexSeparation` long, and an area of
 * at least MIN_POLYGON_AREA. A zero-area loop is reported as `DegenerateGeometry`.
 */
export function validatePolygon(
    vertices: readonly Point[],
    config: Pick<Configuration, 'minVertexSeparation'>,
): errors.ValidationResult {
    if (vertices.length < 3) {
        return errors.invalid(errors.tooFewVertices(vertices.length));
    }

    const n = vertices.length;
    for (let i = 0; i < n; i++) {
        const next = (i + 1) % n;
        const distance = Vertex.from(vertices[i]).distanceTo(vertices[next]);
        if (distance < config.minVertexSeparation) {
            return errors.invalid(errors.verticesTooClose(i, next, distance, config.minVertexSeparation));
        }
    }

    const area = polygonArea(vertices);
    if (area <= DEGENERATE_AREA) {
        return errors.invalid(errors.zeroAreaPolygon(n));
    }
    if (area < MIN_POLYGON_AREA) {
        return errors.invalid(errors.areaTooSmall(area, MIN_POLYGON_AREA));
    }
    return errors.VALID;
}
