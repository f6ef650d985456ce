import { describe, it, expect } from 'vitest';
import { registerCollisionTool } from './collision.js';
import { DEFAULT_CONFIGURATION } from '../config.js';
import { silentLogger } from '../logger.js';

// Capture tool callback
type ToolCallback = (args: Record<string, unknown>) => unknown;
type ToolResult = { isError?: boolean; content: Array<{ type: string; text: string }> };

function captureToolCallback(registerFn: (server: any) => void): ToolCallback {
    let cb: ToolCallback | null = null;
    const mockServer = {
        registerTool(_name: string, _config: unknown, callback: ToolCallback) {
            cb = callback;
        },
    };
    registerFn(mockServer);
    if (!cb) throw new Error('registerTool callback not captured');
    return cb;
}

const handler = captureToolCallback((server) => registerCollisionTool(server, DEFAULT_CONFIGURATION, silentLogger));

function call(args: Record<string, unknown>): ToolResult {
    return handler(args) as ToolResult;
}

function payload(args: Record<string, unknown>): any {
    const result = call(args);
    expect(result.isError).toBeUndefined();
    return JSON.parse(result.content[0].text);
}

const box = [
    { x: 0, y: 0 },
    { x: 10, y: 0 },
    { x: 10, y: 10 },
    { x: 0, y: 10 },
];

const NEAR_ID = '00000000-0000-4000-8000-000000000041';
const FAR_ID = '00000000-0000-4000-8000-000000000042';
const ORIGIN_ID = '00000000-0000-4000-8000-000000000043';

function pieceData(id: string, x: number, y: number) {
    return { id, type: 'square', position: { x, y }, rotation: 0, colorData: 'red' };
}

describe('collision tool', () => {
    it('point_in_polygon', () => {
        expect(payload({ action: 'point_in_polygon', point: { x: 5, y: 5 }, vertices: box })).toEqual({ inside: true });
        expect(payload({ action: 'point_in_polygon', point: { x: 15, y: 5 }, vertices: box })).toEqual({ inside: false });
    });

    it('point_in_polygon requires a point', () => {
        const result = call({ action: 'point_in_polygon', vertices: box });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Invalid argument: collision point_in_polygon requires "point".');
    });

    it('segment_distance', () => {
        expect(
            payload({ action: 'segment_distance', point: { x: 5, y: 5 }, start: { x: 0, y: 0 }, end: { x: 10, y: 0 } }),
        ).toEqual({ distance: 5 });
    });

    it('segment_distance requires an end', () => {
        const result = call({ action: 'segment_distance', point: { x: 5, y: 5 }, start: { x: 0, y: 0 } });
        expect(result.content[0].text).toBe('Invalid argument: collision segment_distance requires "end".');
    });

    it('boxes_intersect', () => {
        const boxA = { x: 0, y: 0, width: 10, height: 10 };
        expect(payload({ action: 'boxes_intersect', box_a: boxA, box_b: { x: 5, y: 5, width: 2, height: 2 } })).toEqual({
            intersects: true,
        });
        expect(payload({ action: 'boxes_intersect', box_a: boxA, box_b: { x: 10, y: 0, width: 2, height: 2 } })).toEqual({
            intersects: false,
        });
    });

    it('circle_intersects_polygon', () => {
        expect(
            payload({ action: 'circle_intersects_polygon', point: { x: 12, y: 5 }, radius: 2.5, vertices: box }),
        ).toEqual({ intersects: true });
        expect(
            payload({ action: 'circle_intersects_polygon', point: { x: 12, y: 5 }, radius: 1, vertices: box }),
        ).toEqual({ intersects: false });
    });

    it('pieces_near_point returns ids in input order', () => {
        const pieces = [pieceData(NEAR_ID, 3, 4), pieceData(FAR_ID, 300, 400), pieceData(ORIGIN_ID, 0, 0)];
        expect(payload({ action: 'pieces_near_point', pieces, point: { x: 0, y: 0 }, max_distance: 5 })).toEqual({
            ids: [NEAR_ID, ORIGIN_ID],
        });
    });

    it('pieces_near_point reports invalid piece data', () => {
        const pieces = [{ ...pieceData(NEAR_ID, 0, 0), type: 'hexagon' }];
        const result = call({ action: 'pieces_near_point', pieces, point: { x: 0, y: 0 }, max_distance: 5 });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toMatch(/^Invalid piece data: type: /);
    });

    it('shared_vertices uses the configured tolerance by default', () => {
        const other = [
            { x: 14, y: -4 },
            { x: 30, y: 0 },
            { x: 10, y: 20 },
        ];
        expect(payload({ action: 'shared_vertices', vertices: box, other_vertices: other })).toEqual({
            vertices: [{ x: 10, y: 0 }],
        });
        expect(payload({ action: 'shared_vertices', vertices: box, other_vertices: other, tolerance: 1 })).toEqual({
            vertices: [],
        });
    });
});
