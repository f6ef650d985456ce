import { type Point } from '../types/vertex.js';
import { type Rect, rectMaxX, rectMaxY } from '../types/rect.js';
import { type Configuration } from '../config.js';
import { Vertex } from '../classes/vertex.js';
import { VertexSet } from '../classes/vertex-set.js';
import { type Piece } from '../classes/piece.js';
import { type Logger, silentLogger } from '../logger.js';

/**
 * Tests whether a horizontal ray from `origin` towards +X crosses the edge a→b.
 * The edge must straddle the ray's Y (one end above, the other at or below).
 */
function rayCrossesEdge(origin: Point, a: Point, b: Point): boolean {
    if ((a.y > origin.y) === (b.y > origin.y)) {
        return false;
    }
    const intersectionX = a.x + ((origin.y - a.y) * (b.x - a.x)) / (b.y - a.y);
    return intersectionX > origin.x;
}

/**
 * Ray-casting containment test: inside iff a +X ray from `point` crosses an odd number of edges.
 * Polygons with fewer than 3 vertices contain nothing.
 */
export function pointInPolygon(point: Point, vertices: readonly Point[]): boolean {
    if (vertices.length < 3) {
        return false;
    }

    let crossings = 0;
    const n = vertices.length;
    for (let i = 0; i < n; i++) {
        if (rayCrossesEdge(point, vertices[i], vertices[(i + 1) % n])) {
            crossings++;
        }
    }
    return crossings % 2 === 1;
}

/**
 * Shortest distance from `point` to the segment start→end.
 *
 * The projection parameter is clamped to [0, 1]. Segments no longer than
 * `minVertexSeparation` are treated as the single point `start`.
 */
export function segmentDistance(
    point: Point,
    start: Point,
    end: Point,
    config: Pick<Configuration, 'minVertexSeparation'>,
    logger: Logger = silentLogger,
): number {
    const from = Vertex.from(start);
    const length = from.distanceTo(end);
    if (length <= config.minVertexSeparation) {
        logger.debug('segmentDistance: segment shorter than minimum separation, measuring to its start', { length });
        return from.distanceTo(point);
    }

    const dx = end.x - start.x;
    const dy = end.y - start.y;
    const t = ((point.x - start.x) * dx + (point.y - start.y) * dy) / (length * length);
    const clamped = Math.max(0, Math.min(1, t));

    return new Vertex(start.x + clamped * dx, start.y + clamped * dy).distanceTo(point);
}

/**
 * Axis-aligned overlap test. Boxes that only share an edge or corner do not intersect.
 */
export function boxesIntersect(a: Rect, b: Rect): boolean {
    return a.x < rectMaxX(b) && b.x < rectMaxX(a) && a.y < rectMaxY(b) && b.y < rectMaxY(a);
}

/**
 * True if the circle's center lies inside the polygon or any edge comes within `radius` of it.
 */
export function circleIntersectsPolygon(
    center: Point,
    radius: number,
    vertices: readonly Point[],
    config: Pick<Configuration, 'minVertexSeparation'>,
    logger: Logger = silentLogger,
): boolean {
    if (pointInPolygon(center, vertices)) {
        return true;
    }

    const n = vertices.length;
    for (let i = 0; i < n; i++) {
        if (segmentDistance(center, vertices[i], vertices[(i + 1) % n], config, logger) <= radius) {
            return true;
        }
    }
    return false;
}

/**
 * Broad-phase filter: pieces whose `position` (not outline) is within `maxDistance` of `point`.
 * Input order is preserved.
 */
export function piecesNearPoint(pieces: readonly Piece[], point: Point, maxDistance: number): Piece[] {
    return pieces.filter((piece) => piece.position.distanceTo(point) <= maxDistance);
}

/**
 * Vertices of `a` that match some vertex of `b` within `tolerance`, in `a`'s order.
 * Used to find corners two pieces have in common when snapping.
 */
export function sharedVertices(a: readonly Point[], b: readonly Point[], tolerance: number): Vertex[] {
    const lookup = new VertexSet(tolerance, b);
    return a.filter((v) => lookup.has(v)).map((v) => Vertex.from(v));
}
