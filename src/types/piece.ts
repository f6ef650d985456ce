import { z } from 'zod';
import { SHAPE_KINDS } from './shape-kind.js';

/**
 * Persisted form of a piece.
 *
 * Key names match the layout files written by earlier versions of the game:
 * the shape kind is stored under `type` and the color tag under `colorData`.
 */
export const pieceDataSchema = z.object({
    id: z.string().uuid(),
    type: z.enum(SHAPE_KINDS),
    position: z.object({
        x: z.number().finite(),
        y: z.number().finite(),
    }),
    rotation: z.number().finite(),
    colorData: z.string(),
});

export type PieceData = z.infer<typeof pieceDataSchema>;

/**
 * A named collection of pieces, as stored in a layout file.
 */
export const pieceLayoutSchema = z.object({
    name: z.string(),
    pieces: z.array(pieceDataSchema),
});

export type PieceLayoutData = z.infer<typeof pieceLayoutSchema>;
