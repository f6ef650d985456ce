import { describe, it, expect } from 'vitest';
import { registerPieceTool } from './piece.js';
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

const handler = captureToolCallback((server) => registerPieceTool(server, DEFAULT_CONFIGURATION, silentLogger));

function call(args: Record<string, unknown>): ToolResult {
    return handler(args) as ToolResult;
}

function payload(args: Record<string, unknown>): any {
    const result = call(args);
    expect(result.isError).toBeUndefined();
    return JSON.parse(result.content[0].text);
}

const storedSquare = {
    id: '00000000-0000-4000-8000-000000000031',
    type: 'square',
    position: { x: 10, y: 20 },
    rotation: 0,
    colorData: 'red',
};

describe('piece tool', () => {
    describe('create', () => {
        it('creates a piece at the origin with the fallback color', () => {
            const { piece } = payload({ action: 'create', kind: 'medium_triangle' });
            expect(typeof piece.id).toBe('string');
            expect(piece.id.length).toBeGreaterThan(0);
            expect(piece).toMatchObject({
                type: 'medium_triangle',
                position: { x: 0, y: 0 },
                rotation: 0,
                colorData: 'blue',
            });
        });

        it('decodes the color tag', () => {
            expect(payload({ action: 'create', kind: 'square', color: 'green' }).piece.colorData).toBe('green');
            expect(payload({ action: 'create', kind: 'square', color: 'magenta' }).piece.colorData).toBe('blue');
        });

        it('requires a kind', () => {
            const result = call({ action: 'create' });
            expect(result.isError).toBe(true);
            expect(result.content[0].text).toBe('Invalid argument: piece create requires "kind".');
        });
    });

    it('requires a piece for every other action', () => {
        const result = call({ action: 'vertices' });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe('Invalid argument: piece vertices requires "piece".');
    });

    it('reports invalid piece data', () => {
        const result = call({ action: 'vertices', piece: { ...storedSquare, rotation: 'sideways' } });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toMatch(/^Invalid piece data: rotation: /);
    });

    it('vertices returns world coordinates', () => {
        const piece = { ...storedSquare, type: 'small_triangle_1' };
        expect(payload({ action: 'vertices', piece })).toEqual({
            vertices: [
                { x: 10, y: 20 },
                { x: 60, y: 20 },
                { x: 10, y: 70 },
            ],
        });
    });

    it('bounding_box', () => {
        const piece = { ...storedSquare, type: 'large_triangle_1' };
        expect(payload({ action: 'bounding_box', piece })).toEqual({
            bounding_box: { x: 10, y: 20, width: 100, height: 100 },
        });
    });

    it('translate keeps the id', () => {
        expect(payload({ action: 'translate', piece: storedSquare, dx: 5, dy: -5 }).piece).toEqual({
            ...storedSquare,
            position: { x: 15, y: 15 },
        });
    });

    it('translate requires dy', () => {
        const result = call({ action: 'translate', piece: storedSquare, dx: 5 });
        expect(result.content[0].text).toBe('Invalid argument: piece translate requires "dy".');
    });

    it('move_to, rotate_by and rotate_to', () => {
        expect(payload({ action: 'move_to', piece: storedSquare, position: { x: 1, y: 2 } }).piece.position).toEqual({
            x: 1,
            y: 2,
        });
        const turned = { ...storedSquare, rotation: 0.5 };
        expect(payload({ action: 'rotate_by', piece: turned, angle: 0.25 }).piece.rotation).toBe(0.75);
        expect(payload({ action: 'rotate_to', piece: turned, angle: 0.25 }).piece.rotation).toBe(0.25);
    });

    it('reset zeroes rotation and optionally moves', () => {
        const turned = { ...storedSquare, rotation: 1 };
        expect(payload({ action: 'reset', piece: turned }).piece).toEqual(storedSquare);
        expect(payload({ action: 'reset', piece: turned, position: { x: 0, y: 0 } }).piece.position).toEqual({
            x: 0,
            y: 0,
        });
    });

    it('snap_rotation uses the configured snap by default', () => {
        const result = payload({ action: 'snap_rotation', piece: { ...storedSquare, rotation: 0.27 } });
        expect(result.changed).toBe(true);
        expect(result.piece.rotation).toBeCloseTo(Math.PI / 12, 12);

        const again = payload({ action: 'snap_rotation', piece: result.piece });
        expect(again.changed).toBe(false);
    });

    it('snap_rotation accepts an explicit snap angle', () => {
        const result = payload({
            action: 'snap_rotation',
            piece: { ...storedSquare, rotation: 1.4 },
            snap_angle: Math.PI / 2,
        });
        expect(result.changed).toBe(true);
        expect(result.piece.rotation).toBe(Math.PI / 2);
    });

    it('describe', () => {
        expect(payload({ action: 'describe', piece: storedSquare })).toEqual({
            description: 'Square at (10.0, 20.0), rotated 0.0°',
            status: 'square | pos: (10,20) | rot: 0.0°',
            details: [
                'Square at (10.0, 20.0), rotated 0.0°',
                `  ID: ${storedSquare.id}`,
                '  Base Vertices: 4',
                '  Current Vertices: 4',
                '  Bounding Box: (-25.4, -15.4) - 70.7×70.7',
                '  Vertices:',
                '    [0]: (10.00, -15.36)',
                '    [1]: (45.36, 20.00)',
                '    [2]: (10.00, 55.36)',
                '    [3]: (-25.36, 20.00)',
            ].join('\n'),
        });
    });
});
