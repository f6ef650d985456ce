import { z } from 'zod';
import { pieceDataSchema } from '../types/piece.js';
import { type Vertex } from '../classes/vertex.js';

/**
 * Zod fragments shared by the tool input schemas.
 */
export const pointSchema = z.object({
    x: z.number(),
    y: z.number(),
});

export const verticesSchema = z.array(pointSchema);

export const rectSchema = z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
});

export { pieceDataSchema };

/**
 * Successful tool response carrying a JSON payload as text.
 */
export function jsonResult(payload: unknown) {
    return {
        content: [{
            type: 'text' as const,
            text: JSON.stringify(payload),
        }],
    };
}

/**
 * Plain `{x, y}` pairs for a response body.
 */
export function plainPoints(vertices: readonly Vertex[]): Array<{ x: number; y: number }> {
    return vertices.map((v) => v.toJSON());
}
