/**
 * Symbolic display colors for pieces.
 *
 * The kernel never interprets a color; it only carries the tag so the renderer
 * and persistence layers can agree on a closed set of names.
 */

export const PIECE_COLORS = [
    'red',
    'blue',
    'green',
    'yellow',
    'orange',
    'purple',
    'cyan',
    'black',
    'white',
    'gray',
    'pink',
    'brown',
] as const;

export type PieceColor = (typeof PIECE_COLORS)[number];

/**
 * Color used when a stored tag is not one of PIECE_COLORS.
 */
export const FALLBACK_PIECE_COLOR: PieceColor = 'blue';

const COLOR_SET: ReadonlySet<string> = new Set(PIECE_COLORS);

export function isPieceColor(value: unknown): value is PieceColor {
    return typeof value === 'string' && COLOR_SET.has(value);
}

/**
 * Reads a stored color tag. Unknown tags decode to FALLBACK_PIECE_COLOR; this never fails.
 */
export function decodePieceColor(value: string): PieceColor {
    return isPieceColor(value) ? value : FALLBACK_PIECE_COLOR;
}
