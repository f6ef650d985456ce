/**
 * Core types for 2D coordinates.
 *
 * Kernel functions accept any `{ x, y }` value as input and return `Vertex`
 * instances (see classes/vertex.ts) as output.
 */

/**
 * A 2D coordinate in the kernel's math convention (positive angles turn counterclockwise).
 */
export interface Point {
    readonly x: number;
    readonly y: number;
}
