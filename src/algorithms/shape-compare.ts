import { type Point } from '../types/vertex.js';
import { Vertex, ORIGIN } from '../classes/vertex.js';
import { type Logger, silentLogger } from '../logger.js';
import { polygonArea, polygonCentroid, boundingBox, rotateAll, translateAll } from './polygon.js';
import { pointInPolygon } from './collision.js';

/**
 * Grid resolution never drops below this many samples per axis.
 */
export const MIN_GRID_SAMPLES = 10;

/**
 * Samples along the longer axis used by `findOptimalAlignment` when none is given.
 */
export const DEFAULT_ALIGNMENT_DENSITY = 50;

/**
 * Centers the polygon on the origin and scales it to unit area.
 */
function normalize(vertices: readonly Point[], area: number): Vertex[] {
    const centroid = polygonCentroid(vertices);
    const factor = 1 / Math.sqrt(area);
    return vertices.map((v) => new Vertex((v.x - centroid.x) * factor, (v.y - centroid.y) * factor));
}

function angleOf(v: Point): number {
    return v.x === 0 && v.y === 0 ? 0 : Math.atan2(v.y, v.x);
}

/**
 * Tests whether two polygons have the same shape up to translation, rotation and uniform scale.
 *
 * Both outlines are normalized to unit area about their own centroid. Since
 * neither the starting corner nor the orientation is canonical, every cyclic
 * offset of the second loop is tried: for offset k the second shape is turned
 * so its vertex k points the same way as the first shape's vertex 0, then all
 * corresponding vertices must lie within `tolerance`. Mirror images are not similar.
 *
 * Requires equal vertex counts of at least 3 and both areas above `tolerance`.
 */
export function shapesSimilar(
    first: readonly Point[],
    second: readonly Point[],
    tolerance: number,
    logger: Logger = silentLogger,
): boolean {
    const count = first.length;
    if (count < 3 || second.length !== count) {
        return false;
    }

    const areaA = polygonArea(first);
    const areaB = polygonArea(second);
    if (areaA <= tolerance || areaB <= tolerance) {
        logger.debug('shapesSimilar: area too small to compare', { areaA, areaB });
        return false;
    }

    const a = normalize(first, areaA);
    const b = normalize(second, areaB);
    const anchorAngle = angleOf(a[0]);

    for (let offset = 0; offset < count; offset++) {
        const turn = anchorAngle - angleOf(b[offset]);
        let matched = true;
        for (let i = 0; i < count; i++) {
            const candidate = b[(i + offset) % count].rotatedAround(ORIGIN, turn);
            if (candidate.distanceTo(a[i]) > tolerance) {
                matched = false;
                break;
            }
        }
        if (matched) {
            return true;
        }
    }
    return false;
}

/**
 * Estimates the fraction of the first polygon's area that the second covers.
 *
 * Samples cell centers of a regular grid over the union bounding box. The
 * longer axis gets `sampleDensity` samples and the shorter one proportionally
 * fewer, with at least MIN_GRID_SAMPLES on each. The result is
 * `samples in both / samples in first`, or 0 when no sample lands in the first.
 * This is an approximation whose error shrinks with the grid cell size.
 */
export function shapeOverlap(first: readonly Point[], second: readonly Point[], sampleDensity: number): number {
    if (first.length < 3 || second.length < 3) {
        return 0;
    }

    const box = boundingBox([...first, ...second]);
    const longer = Math.max(box.width, box.height);
    if (!(longer > 0)) {
        return 0;
    }

    const density = Math.max(MIN_GRID_SAMPLES, Math.floor(sampleDensity));
    const cols = Math.max(MIN_GRID_SAMPLES, Math.ceil((density * box.width) / longer));
    const rows = Math.max(MIN_GRID_SAMPLES, Math.ceil((density * box.height) / longer));
    const stepX = box.width / cols;
    const stepY = box.height / rows;

    let inFirst = 0;
    let inBoth = 0;
    for (let row = 0; row < rows; row++) {
        const y = box.y + (row + 0.5) * stepY;
        for (let col = 0; col < cols; col++) {
            const sample = { x: box.x + (col + 0.5) * stepX, y };
            if (pointInPolygon(sample, first)) {
                inFirst++;
                if (pointInPolygon(sample, second)) {
                    inBoth++;
                }
            }
        }
    }

    return inFirst === 0 ? 0 : inBoth / inFirst;
}

/**
 * Searches `angleSteps` evenly spaced rotations in [0, 2π) for the one that
 * makes the second polygon cover the first best. At each step the second
 * polygon is rotated about its own centroid and moved so the centroids coincide.
 *
 * @returns The best angle in radians; the earliest angle wins ties. 0 if `angleSteps` < 1.
 */
export function findOptimalAlignment(
    first: readonly Point[],
    second: readonly Point[],
    angleSteps: number,
    sampleDensity: number = DEFAULT_ALIGNMENT_DENSITY,
): number {
    const steps = Math.floor(angleSteps);
    if (steps < 1) {
        return 0;
    }

    const target = polygonCentroid(first);
    const pivot = polygonCentroid(second);

    let bestAngle = 0;
    let bestOverlap = -1;
    for (let i = 0; i < steps; i++) {
        const angle = (i * 2 * Math.PI) / steps;
        const rotated = rotateAll(second, pivot, angle);
        const center = polygonCentroid(rotated);
        const aligned = translateAll(rotated, { x: target.x - center.x, y: target.y - center.y });

        const overlap = shapeOverlap(first, aligned, sampleDensity);
        if (overlap > bestOverlap) {
            bestOverlap = overlap;
            bestAngle = angle;
        }
    }
    return bestAngle;
}
