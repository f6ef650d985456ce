/**
 * Core types for the seven tangram shapes.
 *
 * Each kind is identified by a stable string id, which is also its serialized form.
 */

export const ShapeKind = {
    LargeTriangleA: 'large_triangle_1',
    LargeTriangleB: 'large_triangle_2',
    MediumTriangle: 'medium_triangle',
    SmallTriangleA: 'small_triangle_1',
    SmallTriangleB: 'small_triangle_2',
    Square: 'square',
    Parallelogram: 'parallelogram',
} as const;

export type ShapeKind = (typeof ShapeKind)[keyof typeof ShapeKind];

/**
 * All shape kinds in catalog order.
 */
export const SHAPE_KINDS = [
    ShapeKind.LargeTriangleA,
    ShapeKind.LargeTriangleB,
    ShapeKind.MediumTriangle,
    ShapeKind.SmallTriangleA,
    ShapeKind.SmallTriangleB,
    ShapeKind.Square,
    ShapeKind.Parallelogram,
] as const;

const DISPLAY_NAMES: Record<ShapeKind, string> = {
    large_triangle_1: 'Large Triangle 1',
    large_triangle_2: 'Large Triangle 2',
    medium_triangle: 'Medium Triangle',
    small_triangle_1: 'Small Triangle 1',
    small_triangle_2: 'Small Triangle 2',
    square: 'Square',
    parallelogram: 'Parallelogram',
};

export function shapeDisplayName(kind: ShapeKind): string {
    return DISPLAY_NAMES[kind];
}

export function isShapeKind(value: unknown): value is ShapeKind {
    return typeof value === 'string' && Object.hasOwn(DISPLAY_NAMES, value);
}

/**
 * Looks up a shape kind by id. Returns undefined for unknown ids.
 */
export function parseShapeKind(value: string): ShapeKind | undefined {
    return isShapeKind(value) ? value : undefined;
}
