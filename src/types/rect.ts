/**
 * An axis-aligned rectangle.
 */
export interface Rect {
    /** Minimum X */
    x: number;
    /** Minimum Y */
    y: number;
    width: number;
    height: number;
}

/**
 * Width and height of a shape's local-space extent.
 */
export interface Size {
    width: number;
    height: number;
}

export function rectMaxX(rect: Rect): number {
    return rect.x + rect.width;
}

export function rectMaxY(rect: Rect): number {
    return rect.y + rect.height;
}
